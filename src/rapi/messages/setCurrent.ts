import { z } from "zod";
import { RapiMessage } from "../rapiMessage";
import type { CommandOf } from "../types";

const SetCurrentPayloadSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+(\.\d+)?$/, "target current must be a decimal number of amperes")
  .transform(Number)
  .pipe(z.number().finite("target current is out of range"));
type SetCurrentPayloadType = typeof SetCurrentPayloadSchema;

class SetCurrentRapiMessage extends RapiMessage<"SetCurrent", SetCurrentPayloadType> {
  toCommand(amps: number): CommandOf<"SetCurrent"> {
    return { kind: "SetCurrent", amps };
  }

  toPayload(command: CommandOf<"SetCurrent">): string {
    return String(command.amps);
  }
}

export const setCurrentRapiMessage = new SetCurrentRapiMessage(
  "SetCurrent",
  "$SC",
  SetCurrentPayloadSchema,
);
