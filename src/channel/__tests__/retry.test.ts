/**
 * Tests for publishWithRetry and the backoff schedule.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { PublishFailure } from "../../errors";
import { MemoryBroker } from "../memoryBroker";
import { backoffDelay, publishWithRetry } from "../retry";

const policy = { attempts: 3, baseDelayMs: 100 };

async function flakyChannel(failures: number) {
  const broker = new MemoryBroker();
  const channel = await broker.connect({ address: "memory://test", clientId: "retry", cleanSession: true });
  channel.failNextPublishes(failures);
  return { broker, channel };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("backoffDelay", () => {
  it("doubles after each failed attempt", () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([100, 200, 400, 800]);
  });
});

describe("publishWithRetry", () => {
  it("publishes on the first attempt when the channel is healthy", async () => {
    const { broker, channel } = await flakyChannel(0);

    const result = await publishWithRetry(channel, "t", "x", policy);

    expect(result.ok).toBe(true);
    expect(broker.payloadsOn("t")).toEqual(["x"]);
  });

  it("waits out the backoff before retrying", async () => {
    vi.useFakeTimers();
    const { broker, channel } = await flakyChannel(2);

    const pending = publishWithRetry(channel, "t", "x", policy);
    await vi.advanceTimersByTimeAsync(100);
    expect(broker.payloadsOn("t")).toEqual([]);

    await vi.advanceTimersByTimeAsync(200);
    const result = await pending;

    expect(result.ok).toBe(true);
    expect(broker.payloadsOn("t")).toEqual(["x"]);
  });

  it("gives up after the last attempt", async () => {
    vi.useFakeTimers();
    const { broker, channel } = await flakyChannel(5);

    const pending = publishWithRetry(channel, "t", "x", policy);
    await vi.advanceTimersByTimeAsync(300);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PublishFailure);
      expect(result.error.attempts).toBe(3);
      expect(result.error.message).toBe("Publish to t failed after 3 attempt(s): simulated transport failure");
    }
    expect(broker.payloadsOn("t")).toEqual([]);
  });

  it("stops retrying when aborted during a backoff", async () => {
    vi.useFakeTimers();
    const { channel } = await flakyChannel(5);
    const controller = new AbortController();

    const pending = publishWithRetry(channel, "t", "x", policy, controller.signal);
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.attempts).toBe(1);
  });
});
