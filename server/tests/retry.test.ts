import { describe, expect, it, vi } from "vitest";
import { withRetry } from "../src/core/retry";

const noSleep = vi.fn(async (_ms: number) => undefined);

describe("withRetry", () => {
  it("never makes more than two attempts, whatever the policy says", async () => {
    const task = vi.fn(async (_attempt: number): Promise<string> => {
      throw new Error("down");
    });

    await expect(
      withRetry(task, {
        policy: { maxAttempts: 5, delayMs: 10 },
        shouldRetry: () => true,
        sleep: noSleep,
      }),
    ).rejects.toThrow("down");

    expect(task).toHaveBeenCalledTimes(2);
    expect(task.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it("rethrows immediately when the error is not retryable", async () => {
    const task = vi.fn(async (_attempt: number): Promise<string> => {
      throw new Error("bad request");
    });
    const onRetry = vi.fn();

    await expect(
      withRetry(task, {
        policy: { maxAttempts: 2, delayMs: 10 },
        shouldRetry: () => false,
        sleep: noSleep,
        onRetry,
      }),
    ).rejects.toThrow("bad request");

    expect(task).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it("returns the first successful value", async () => {
    const task = vi.fn(async (attempt: number) => `attempt ${attempt}`);

    await expect(
      withRetry(task, {
        policy: { maxAttempts: 2, delayMs: 10 },
        shouldRetry: () => true,
        sleep: noSleep,
      }),
    ).resolves.toBe("attempt 1");
  });
});
