import { describe, expect, it } from "vitest";
import { retryWithBackoff } from "@/lib/utils/retry";

describe("retryWithBackoff", () => {
  it("retries until the operation succeeds", async () => {
    let calls = 0;
    const attempts: number[] = [];

    const result = await retryWithBackoff(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw new Error(`fail ${calls}`);
        }
        return "ok";
      },
      { baseDelayMs: 1, onRetry: (attempt) => attempts.push(attempt) },
    );

    expect(result).toBe("ok");
    expect(attempts).toEqual([1, 2]);
  });

  it("rethrows the last error once retries run out", async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls += 1;
          throw new Error(`fail ${calls}`);
        },
        { maxRetries: 1, baseDelayMs: 1 },
      ),
    ).rejects.toThrow("fail 2");
    expect(calls).toBe(2);
  });
});
