import { describe, it, expect, vi } from "vitest";
import { attemptsOf, retryWithAttempts } from "../utils/retry.js";

const immediate = { baseDelayMs: 0, maxDelayMs: 0 };

describe("retryWithAttempts", () => {
  it("returns the value and how many attempts it took", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    const result = await retryWithAttempts(fn, immediate);

    expect(result).toEqual({ value: "ok", attempts: 2 });
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it("stops at maxAttempts and tags the last error", async () => {
    const fn = vi.fn(async () => {
      throw new Error("down");
    });

    const error = await retryWithAttempts(fn, { ...immediate, maxAttempts: 3 }).then(
      () => undefined,
      (err: unknown) => err
    );

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(Error);
    expect(attemptsOf(error)).toBe(3);
  });

  it("rethrows at once when shouldRetry declines", async () => {
    const fn = vi.fn(async () => {
      throw new Error("bad request");
    });

    await expect(
      retryWithAttempts(fn, { ...immediate, shouldRetry: () => false })
    ).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("backs off exponentially up to maxDelayMs", async () => {
    const delays: number[] = [];
    vi.useFakeTimers();
    try {
      const pending = retryWithAttempts(
        async () => {
          throw new Error("throttled");
        },
        {
          maxAttempts: 4,
          baseDelayMs: 100,
          maxDelayMs: 250,
          onRetry: (_err, _attempt, delayMs) => delays.push(delayMs),
        }
      ).catch((err: unknown) => err);

      await vi.runAllTimersAsync();
      await pending;
    } finally {
      vi.useRealTimers();
    }

    expect(delays).toEqual([100, 200, 250]);
  });
});

describe("attemptsOf", () => {
  it("defaults to a single attempt", () => {
    expect(attemptsOf(new Error("x"))).toBe(1);
    expect(attemptsOf("x")).toBe(1);
  });
});
