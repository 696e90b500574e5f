import { ConnectionError, PublishFailure, SubscribeFailure } from "../errors";
import { createLogger } from "../logger";
import { err, ok, type Result } from "../result";
import { topicMatches } from "../topics";
import type {
  ConnectOptions,
  MessageChannel,
  MessageHandler,
  QualityOfService,
} from "./messageChannel";

const log = createLogger("BROKER");

export interface BrokerMessage {
  from: string;
  topic: string;
  payload: string;
}

/**
 * In-process stand-in for an MQTT broker. Deliveries are queued as
 * microtasks, so a publisher never observes its subscribers running inside
 * `publish`. Used by the tests and by the single-process simulation.
 */
export class MemoryBroker {
  private readonly clients = new Map<string, MemoryChannel>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly published: BrokerMessage[] = [];
  private refusing = false;

  /** Every message accepted by the broker, in publish order. */
  get history(): readonly BrokerMessage[] {
    return this.published;
  }

  /** Payloads published to `topic`, in order. */
  payloadsOn(topic: string): string[] {
    return this.published.filter((message) => message.topic === topic).map((message) => message.payload);
  }

  /** Makes subsequent `connect` calls fail, as an unreachable broker would. */
  refuseConnections(refuse = true) {
    this.refusing = refuse;
  }

  connect = async (options: ConnectOptions): Promise<MemoryChannel> => {
    if (this.refusing) {
      throw new ConnectionError(options.address, new Error("connection refused"));
    }
    const existing = this.clients.get(options.clientId);
    if (existing) {
      // Same client id takes over the session, like MQTT.
      existing.drop();
    }
    const channel = new MemoryChannel(this, options.clientId);
    this.clients.set(options.clientId, channel);
    log.debug(`${options.clientId} connected`);
    return channel;
  };

  /** @internal */
  release(channel: MemoryChannel) {
    if (this.clients.get(channel.clientId) === channel) {
      this.clients.delete(channel.clientId);
    }
  }

  /** @internal */
  route(from: string, topic: string, payload: string) {
    this.published.push({ from, topic, payload });

    for (const client of this.clients.values()) {
      if (!client.isSubscribedTo(topic)) continue;

      const delivery = Promise.resolve().then(() => client.deliver(topic, payload));
      this.inFlight.add(delivery);
      void delivery.finally(() => this.inFlight.delete(delivery));
    }
  }

  /**
   * Resolves once every queued delivery, and every delivery those handlers
   * caused in turn, has been handled.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}

export class MemoryChannel implements MessageChannel {
  private readonly subscriptions = new Map<string, QualityOfService>();
  private readonly handlers = new Set<MessageHandler>();
  private connected = true;
  private failingPublishes = 0;

  constructor(
    private readonly broker: MemoryBroker,
    readonly clientId: string,
  ) {}

  get isConnected(): boolean {
    return this.connected;
  }

  /** Makes the next `count` publishes fail at the transport level. */
  failNextPublishes(count: number) {
    this.failingPublishes = count;
  }

  isSubscribedTo(topic: string): boolean {
    for (const pattern of this.subscriptions.keys()) {
      if (topicMatches(pattern, topic)) return true;
    }
    return false;
  }

  async subscribe(pattern: string, qos: QualityOfService = 1): Promise<Result<void, SubscribeFailure>> {
    if (!this.connected) {
      return err(new SubscribeFailure(pattern, new Error("channel is disconnected")));
    }
    this.subscriptions.set(pattern, qos);
    return ok(undefined);
  }

  async publish(topic: string, payload: string): Promise<Result<void, PublishFailure>> {
    if (!this.connected) {
      return err(new PublishFailure(topic, 1, new Error("channel is disconnected")));
    }
    if (this.failingPublishes > 0) {
      this.failingPublishes--;
      return err(new PublishFailure(topic, 1, new Error("simulated transport failure")));
    }
    this.broker.route(this.clientId, topic, payload);
    return ok(undefined);
  }

  onMessage(handler: MessageHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** @internal */
  async deliver(topic: string, payload: string): Promise<void> {
    if (!this.connected) return;
    const results = [...this.handlers].map(async (handler) => {
      try {
        await handler(topic, payload);
      } catch (error) {
        log.error(`${this.clientId}: handler for ${topic} failed:`, error);
      }
    });
    await Promise.all(results);
  }

  /** @internal */
  drop() {
    this.connected = false;
    this.subscriptions.clear();
    this.handlers.clear();
  }

  async disconnect(): Promise<void> {
    this.drop();
    this.broker.release(this);
  }
}
