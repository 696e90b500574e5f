import { delay } from "../delay";
import { PublishFailure } from "../errors";
import { createLogger } from "../logger";
import { err, type Result } from "../result";
import type { MessageChannel } from "./messageChannel";

const log = createLogger("RETRY");

export interface RetryPolicy {
  /** Total publish attempts, including the first. */
  attempts: number;
  /** Wait before the second attempt; doubles for each one after. */
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 3, baseDelayMs: 200 };

export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  return policy.baseDelayMs * 2 ** (failedAttempt - 1);
}

/**
 * Publishes with bounded exponential backoff. Resolves with the final
 * `PublishFailure` instead of throwing; an abort during a backoff wait ends
 * the retries early.
 */
export async function publishWithRetry(
  channel: MessageChannel,
  topic: string,
  payload: string,
  policy: RetryPolicy,
  signal?: AbortSignal,
): Promise<Result<void, PublishFailure>> {
  let lastFailure: PublishFailure | undefined;
  let attempt = 0;

  while (attempt < policy.attempts) {
    attempt++;
    const result = await channel.publish(topic, payload);
    if (result.ok) return result;

    lastFailure = result.error;
    if (attempt >= policy.attempts) break;

    const wait = backoffDelay(policy, attempt);
    log.warn(`Publish to ${topic} failed (attempt ${attempt}/${policy.attempts}), retrying in ${wait}ms`);
    if (!(await delay(wait, signal))) break;
  }

  return err(new PublishFailure(topic, attempt, lastFailure?.cause ?? lastFailure));
}
