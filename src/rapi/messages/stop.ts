import { z } from "zod";
import { RapiMessage } from "../rapiMessage";
import type { CommandOf } from "../types";

const StopPayloadSchema = z.string();
type StopPayloadType = typeof StopPayloadSchema;

class StopRapiMessage extends RapiMessage<"Stop", StopPayloadType> {
  toCommand(): CommandOf<"Stop"> {
    return { kind: "Stop" };
  }

  toPayload(): string {
    return "";
  }
}

export const stopRapiMessage = new StopRapiMessage("Stop", "$FS", StopPayloadSchema);
