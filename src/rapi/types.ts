import { z } from "zod";

export const RAPI_CODES = ["$SC", "$FE", "$V2G", "$FS"] as const;
export type RapiCode = (typeof RAPI_CODES)[number];

const SetCurrentSchema = z.object({
  kind: z.literal("SetCurrent"),
  /** Signed target current in amperes; negative exports to the grid. */
  amps: z.number().finite(),
});

const StartChargeSchema = z.object({ kind: z.literal("StartCharge") });
const EnableBidirectionalSchema = z.object({ kind: z.literal("EnableBidirectional") });
const StopSchema = z.object({ kind: z.literal("Stop") });

export const CommandSchema = z.discriminatedUnion("kind", [
  SetCurrentSchema,
  StartChargeSchema,
  EnableBidirectionalSchema,
  StopSchema,
]);

export type Command = Readonly<z.infer<typeof CommandSchema>>;
export type CommandKind = Command["kind"];
export type CommandOf<K extends CommandKind> = Extract<Command, { kind: K }>;

/** A command as it travels on the bus. */
export interface RapiFrame {
  topic: string;
  payload: string;
}

export function describeCommand(command: Command): string {
  return command.kind === "SetCurrent"
    ? `SetCurrent(${command.amps})`
    : command.kind;
}
