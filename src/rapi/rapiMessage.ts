import type { z } from "zod";
import { err, ok, type Result } from "../result";
import type { CommandKind, CommandOf, RapiCode } from "./types";

/** What the codec needs from any RAPI command, whatever its payload shape. */
export interface RapiDecoder {
  readonly kind: CommandKind;
  readonly code: RapiCode;
  decode(payload: string): Result<CommandOf<CommandKind>, string>;
}

/**
 * One RAPI command on the `{base}/rapi/in/<code>` namespace: the schema its
 * text payload must satisfy and the mapping between that payload and the
 * typed command.
 */
export abstract class RapiMessage<
  K extends CommandKind,
  PayloadSchema extends z.ZodTypeAny,
> implements RapiDecoder
{
  constructor(
    readonly kind: K,
    readonly code: RapiCode,
    readonly payloadSchema: PayloadSchema,
  ) {}

  abstract toCommand(payload: z.output<PayloadSchema>): CommandOf<K>;

  abstract toPayload(command: CommandOf<K>): string;

  decode(payload: string): Result<CommandOf<K>, string> {
    const parsed = this.payloadSchema.safeParse(payload);
    if (!parsed.success) {
      return err(parsed.error.issues.map((issue) => issue.message).join("; "));
    }
    return ok(this.toCommand(parsed.data));
  }
}
