import { z } from "zod";
import { RapiMessage } from "../rapiMessage";
import type { CommandOf } from "../types";

const EnableBidirectionalPayloadSchema = z
  .string()
  .refine((flag) => flag === "1", { message: 'V2G enable flag must be "1"' });
type EnableBidirectionalPayloadType = typeof EnableBidirectionalPayloadSchema;

class EnableBidirectionalRapiMessage extends RapiMessage<
  "EnableBidirectional",
  EnableBidirectionalPayloadType
> {
  toCommand(): CommandOf<"EnableBidirectional"> {
    return { kind: "EnableBidirectional" };
  }

  toPayload(): string {
    return "1";
  }
}

export const enableBidirectionalRapiMessage = new EnableBidirectionalRapiMessage(
  "EnableBidirectional",
  "$V2G",
  EnableBidirectionalPayloadSchema,
);
