import { z } from "zod";
import { RapiMessage } from "../rapiMessage";
import type { CommandOf } from "../types";

// $FE carries no arguments; whatever arrives is ignored.
const StartChargePayloadSchema = z.string();
type StartChargePayloadType = typeof StartChargePayloadSchema;

class StartChargeRapiMessage extends RapiMessage<"StartCharge", StartChargePayloadType> {
  toCommand(): CommandOf<"StartCharge"> {
    return { kind: "StartCharge" };
  }

  toPayload(): string {
    return "";
  }
}

export const startChargeRapiMessage = new StartChargeRapiMessage(
  "StartCharge",
  "$FE",
  StartChargePayloadSchema,
);
