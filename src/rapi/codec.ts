import { MalformedCommand } from "../errors";
import { err, type Result } from "../result";
import type { TopicMap } from "../topics";
import { enableBidirectionalRapiMessage } from "./messages/enableBidirectional";
import { setCurrentRapiMessage } from "./messages/setCurrent";
import { startChargeRapiMessage } from "./messages/startCharge";
import { stopRapiMessage } from "./messages/stop";
import type { RapiDecoder } from "./rapiMessage";
import type { Command, RapiFrame } from "./types";

const decoders: ReadonlyMap<string, RapiDecoder> = new Map(
  [
    setCurrentRapiMessage,
    startChargeRapiMessage,
    enableBidirectionalRapiMessage,
    stopRapiMessage,
  ].map((message): [string, RapiDecoder] => [message.code, message]),
);

/**
 * Decodes a message received on the command namespace. Runs once, at the
 * channel boundary; everything past it works with the typed command.
 */
export function decodeCommand(
  topics: TopicMap,
  topic: string,
  payload: string,
): Result<Command, MalformedCommand> {
  if (!topic.startsWith(topics.commandPrefix)) {
    return err(new MalformedCommand(topic, payload, "outside the command namespace"));
  }

  const code = topic.slice(topics.commandPrefix.length);
  const decoder = decoders.get(code);
  if (!decoder) {
    return err(new MalformedCommand(topic, payload, `unknown command "${code}"`));
  }

  const decoded = decoder.decode(payload);
  if (!decoded.ok) {
    return err(new MalformedCommand(topic, payload, decoded.error));
  }
  return decoded;
}

export function encodeCommand(topics: TopicMap, command: Command): RapiFrame {
  switch (command.kind) {
    case "SetCurrent":
      return {
        topic: topics.command(setCurrentRapiMessage.code),
        payload: setCurrentRapiMessage.toPayload(command),
      };
    case "StartCharge":
      return {
        topic: topics.command(startChargeRapiMessage.code),
        payload: startChargeRapiMessage.toPayload(),
      };
    case "EnableBidirectional":
      return {
        topic: topics.command(enableBidirectionalRapiMessage.code),
        payload: enableBidirectionalRapiMessage.toPayload(),
      };
    case "Stop":
      return {
        topic: topics.command(stopRapiMessage.code),
        payload: stopRapiMessage.toPayload(),
      };
  }
}
