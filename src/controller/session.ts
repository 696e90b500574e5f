import type { ChannelConnector } from "../channel/messageChannel";
import type { RetryPolicy } from "../channel/retry";
import { createLogger } from "../logger";
import type { TopicMap } from "../topics";
import { CommandSequencer, type SessionResult } from "./commandSequencer";
import type { SessionStep } from "./sessionScript";
import { StatusObserver } from "./statusObserver";

const log = createLogger("CONTROLLER");

export interface ControllerSessionOptions {
  connect: ChannelConnector;
  address: string;
  clientId: string;
  username?: string;
  password?: string;
  topics: TopicMap;
  script: readonly SessionStep[];
  retry?: RetryPolicy;
  ackTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface ControllerSessionReport extends SessionResult {
  statuses: string[];
}

/**
 * Connect, subscribe to the charger's topics, run the script, disconnect.
 *
 * @throws ConnectionError when the broker cannot be reached
 */
export async function runControllerSession(
  options: ControllerSessionOptions,
): Promise<ControllerSessionReport> {
  const channel = await options.connect({
    address: options.address,
    clientId: options.clientId,
    cleanSession: true,
    username: options.username,
    password: options.password,
  });

  const observer = new StatusObserver(options.topics);
  try {
    const subscribed = await observer.attach(channel);
    if (!subscribed.ok) {
      // Still usable for sending; the session just runs blind.
      log.warn(subscribed.error.message);
    }

    const sequencer = new CommandSequencer(channel, {
      topics: options.topics,
      retry: options.retry,
      signal: options.signal,
      observer: subscribed.ok ? observer : undefined,
      ackTimeoutMs: options.ackTimeoutMs,
    });
    const result = await sequencer.run(options.script);
    return { ...result, statuses: observer.statusMessages() };
  } finally {
    observer.detach();
    await channel.disconnect();
    log.info("Disconnected from broker");
  }
}
