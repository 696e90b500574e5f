import type { MessageChannel } from "../channel/messageChannel";
import type { SubscribeFailure } from "../errors";
import { createLogger } from "../logger";
import { ok, type Result } from "../result";
import { observedTopics, type TopicMap } from "../topics";

const log = createLogger("CONTROLLER");

export interface ObservedMessage {
  topic: string;
  payload: string;
  receivedAt: Date;
}

export interface PendingStatus {
  /** `true` once the status arrived, `false` on timeout, abort or cancel. */
  readonly arrived: Promise<boolean>;
  cancel(): void;
}

interface StatusWaiter {
  message: string;
  settle(arrived: boolean): void;
}

/**
 * Watches the charger's status and telemetry topics. Observations are
 * logged and kept; nothing here judges them.
 */
export class StatusObserver {
  private readonly observed: ObservedMessage[] = [];
  private waiters: StatusWaiter[] = [];
  private removeHandler: (() => void) | null = null;

  constructor(private readonly topics: TopicMap) {}

  async attach(channel: MessageChannel): Promise<Result<void, SubscribeFailure>> {
    this.removeHandler?.();
    this.removeHandler = channel.onMessage((topic, payload) => this.observe(topic, payload));

    for (const topic of observedTopics(this.topics)) {
      const subscribed = await channel.subscribe(topic, 1);
      if (!subscribed.ok) return subscribed;
    }
    return ok(undefined);
  }

  detach() {
    this.removeHandler?.();
    this.removeHandler = null;
    for (const waiter of this.waiters) waiter.settle(false);
    this.waiters = [];
  }

  history(): readonly ObservedMessage[] {
    return [...this.observed];
  }

  statusMessages(): string[] {
    return this.observed
      .filter((message) => message.topic === this.topics.status)
      .map((message) => message.payload);
  }

  observe(topic: string, payload: string) {
    if (!observedTopics(this.topics).includes(topic)) return;

    log.info(`Received: ${topic} -> ${payload}`);
    this.observed.push({ topic, payload, receivedAt: new Date() });

    if (topic !== this.topics.status) return;
    const index = this.waiters.findIndex((waiter) => waiter.message === payload);
    if (index >= 0) {
      const [waiter] = this.waiters.splice(index, 1);
      waiter.settle(true);
    }
  }

  /**
   * Waits for the next status equal to `message`. Register before
   * publishing the command it answers; statuses seen earlier do not count.
   */
  waitForStatus(message: string, timeoutMs: number, signal?: AbortSignal): PendingStatus {
    let finish: (arrived: boolean) => void = () => {};

    const arrived = new Promise<boolean>((resolve) => {
      const waiter: StatusWaiter = { message, settle: (value) => finish(value) };
      const onAbort = () => finish(false);
      const timer = setTimeout(onAbort, timeoutMs);

      finish = (value) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
        resolve(value);
      };

      if (signal?.aborted) {
        finish(false);
        return;
      }
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });

    return { arrived, cancel: () => finish(false) };
  }
}
