import type { PublishFailure, SubscribeFailure } from "../errors";
import type { Result } from "../result";

export type QualityOfService = 0 | 1 | 2;

/**
 * Called once per delivered message. A returned promise is awaited by
 * channels that track delivery (the in-process broker); rejections are
 * logged by the channel.
 */
export type MessageHandler = (topic: string, payload: string) => void | Promise<void>;

export interface ConnectOptions {
  address: string;
  clientId: string;
  cleanSession: boolean;
  username?: string;
  password?: string;
  connectTimeoutMs?: number;
}

/**
 * Publish/subscribe bus as the charger and controller see it. Delivery is
 * at-least-once with no ordering across topics and no request/response
 * correlation.
 */
export interface MessageChannel {
  readonly clientId: string;
  subscribe(pattern: string, qos?: QualityOfService): Promise<Result<void, SubscribeFailure>>;
  publish(topic: string, payload: string): Promise<Result<void, PublishFailure>>;
  /** Registers a handler for every delivered message; returns its remover. */
  onMessage(handler: MessageHandler): () => void;
  disconnect(): Promise<void>;
}

/** Opens a channel; rejects with `ConnectionError`. */
export type ChannelConnector = (options: ConnectOptions) => Promise<MessageChannel>;
