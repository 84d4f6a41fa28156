import { describe, it, expect, vi } from "vitest";
import { computeBackoffMs, DeadlineExceededError, sleep, withDeadline, withRetry } from "./retry";

describe("computeBackoffMs", () => {
  it("should double the delay per attempt for exponential backoff", () => {
    expect(computeBackoffMs(0, "exponential", 100)).toBe(100);
    expect(computeBackoffMs(1, "exponential", 100)).toBe(200);
    expect(computeBackoffMs(2, "exponential", 100)).toBe(400);
  });

  it("should keep the delay constant for fixed backoff", () => {
    expect(computeBackoffMs(0, "fixed", 100)).toBe(100);
    expect(computeBackoffMs(2, "fixed", 100)).toBe(100);
  });
});

describe("withRetry", () => {
  const options = { maxRetries: 2, backoff: "fixed" as const, baseDelayMs: 1 };

  it("should return the first successful result", async () => {
    const operation = vi.fn(async () => "done");

    await expect(withRetry(operation, { ...options, isRetryable: () => true })).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should retry retryable errors and report each retry", async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error(`attempt ${attempt}`);
      return attempt;
    });

    const result = await withRetry(operation, { ...options, isRetryable: () => true, onRetry });

    expect(result).toBe(2);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, new Error("attempt 0"), 1);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, new Error("attempt 1"), 1);
  });

  it("should stop after maxRetries extra attempts", async () => {
    const operation = vi.fn(async () => {
      throw new Error("still failing");
    });

    await expect(withRetry(operation, { ...options, isRetryable: () => true })).rejects.toThrow("still failing");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("should not retry errors that are not retryable", async () => {
    const operation = vi.fn(async () => {
      throw new Error("fatal");
    });

    await expect(withRetry(operation, { ...options, isRetryable: () => false })).rejects.toThrow("fatal");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("sleep", () => {
  it("should reject when the signal aborts", async () => {
    const controller = new AbortController();
    const promise = sleep(10_000, controller.signal);

    controller.abort(new Error("stop"));

    await expect(promise).rejects.toThrow("stop");
  });

  it("should reject immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("already stopped"));

    await expect(sleep(10, controller.signal)).rejects.toThrow("already stopped");
  });
});

describe("withDeadline", () => {
  it("should resolve with the operation's value", async () => {
    await expect(withDeadline(async () => 42, 1_000)).resolves.toBe(42);
  });

  it("should reject with DeadlineExceededError when the operation hangs", async () => {
    let received: AbortSignal | undefined;
    const promise = withDeadline((signal) => {
      received = signal;
      return new Promise<never>(() => {});
    }, 10);

    await expect(promise).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(promise).rejects.toThrow("Deadline of 10ms exceeded");
    expect(received?.aborted).toBe(true);
  });

  it("should follow the parent signal", async () => {
    const parent = new AbortController();
    const promise = withDeadline(() => new Promise<never>(() => {}), 10_000, parent.signal);

    parent.abort(new Error("caller went away"));

    await expect(promise).rejects.toThrow("caller went away");
  });

  it("should pass operation errors through", async () => {
    await expect(
      withDeadline(async () => {
        throw new Error("boom");
      }, 1_000)
    ).rejects.toThrow("boom");
  });
});
