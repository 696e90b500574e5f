import type { MessageChannel } from "../channel/messageChannel";
import { DEFAULT_RETRY_POLICY, publishWithRetry, type RetryPolicy } from "../channel/retry";
import { acceptedStatus } from "../charger/chargerState";
import { delay } from "../delay";
import { AckTimeout, type PublishFailure } from "../errors";
import { createLogger } from "../logger";
import { encodeCommand } from "../rapi/codec";
import { describeCommand } from "../rapi/types";
import type { TopicMap } from "../topics";
import type { SessionStep } from "./sessionScript";
import type { StatusObserver } from "./statusObserver";

const log = createLogger("CONTROLLER");

export type SessionOutcome = "completed" | "aborted" | "failed";

export interface SessionResult {
  outcome: SessionOutcome;
  stepsCompleted: number;
  commandsSent: number;
  error?: PublishFailure | AckTimeout;
}

export interface CommandSequencerOptions {
  topics: TopicMap;
  retry?: RetryPolicy;
  signal?: AbortSignal;
  /**
   * With an observer and a timeout, each command waits for its status
   * before the script moves on. Without them, only the script's waits order
   * the commands.
   */
  observer?: StatusObserver;
  ackTimeoutMs?: number;
}

/**
 * Walks a session script step by step. Each publish completes before the
 * next step starts; whether the charger acted on it is not known unless
 * acknowledgement mode is on.
 */
export class CommandSequencer {
  private step = 0;
  private readonly retry: RetryPolicy;

  constructor(
    private readonly channel: MessageChannel,
    private readonly options: CommandSequencerOptions,
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  /** Index of the step being run, or the number of steps once finished. */
  currentStep(): number {
    return this.step;
  }

  async run(script: readonly SessionStep[]): Promise<SessionResult> {
    const { signal } = this.options;
    let commandsSent = 0;
    this.step = 0;

    const finish = (outcome: SessionOutcome, error?: PublishFailure | AckTimeout): SessionResult => {
      if (outcome === "aborted") log.warn(`Session aborted at step ${this.step + 1}/${script.length}`);
      if (error) log.error(error.message);
      return { outcome, stepsCompleted: this.step, commandsSent, error };
    };

    for (const step of script) {
      if (signal?.aborted) return finish("aborted");

      switch (step.kind) {
        case "wait": {
          log.info(`Waiting ${step.ms}ms${step.reason ? ` (${step.reason})` : ""}`);
          if (!(await delay(step.ms, signal))) return finish("aborted");
          break;
        }
        case "send": {
          const failure = await this.send(step);
          if (failure === "aborted") return finish("aborted");
          if (failure) return finish("failed", failure);
          commandsSent++;
          break;
        }
      }

      this.step++;
    }

    log.info(`Session complete: ${commandsSent} command(s) sent`);
    return finish("completed");
  }

  private async send(
    step: Extract<SessionStep, { kind: "send" }>,
  ): Promise<PublishFailure | AckTimeout | "aborted" | null> {
    const { topics, observer, ackTimeoutMs, signal } = this.options;
    const { topic, payload } = encodeCommand(topics, step.command);
    const expected = acceptedStatus(step.command);

    const pending =
      observer && ackTimeoutMs !== undefined
        ? observer.waitForStatus(expected, ackTimeoutMs, signal)
        : null;

    log.info(`Publishing: ${topic} -> ${payload} (${describeCommand(step.command)})`);
    const published = await publishWithRetry(this.channel, topic, payload, this.retry, signal);
    if (!published.ok) {
      pending?.cancel();
      return signal?.aborted ? "aborted" : published.error;
    }

    if (!pending || ackTimeoutMs === undefined) return null;

    if (await pending.arrived) {
      log.info(`Acknowledged: ${expected}`);
      return null;
    }
    return signal?.aborted ? "aborted" : new AckTimeout(expected, ackTimeoutMs);
  }
}
