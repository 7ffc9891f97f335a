import { describe, it, expect, vi } from "vitest";
import { jitteredDelay, retry } from "../../src/utils/retry.js";

describe("retry", () => {
  it("returns on first success", async () => {
    const result = await retry(async () => "ok");
    expect(result).toBe("ok");
  });

  it("retries on failure then succeeds", async () => {
    let attempt = 0;
    const result = await retry(
      async () => {
        attempt++;
        if (attempt < 3) throw new Error("fail");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 10 },
    );
    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("throws after max attempts", async () => {
    await expect(
      retry(
        async () => {
          throw new Error("always fails");
        },
        { maxAttempts: 2, baseDelayMs: 10 },
      ),
    ).rejects.toThrow("always fails");
  });

  it("respects abort signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      retry(
        async () => {
          throw new Error("fail");
        },
        { maxAttempts: 5, baseDelayMs: 10, signal: controller.signal },
      ),
    ).rejects.toThrow();
  });

  it("passes attempt number to function", async () => {
    const attempts: number[] = [];
    await retry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new Error("fail");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 10 },
    );
    expect(attempts).toEqual([0, 1, 2]);
  });

  it("reports each failed attempt before backing off", async () => {
    const seen: Array<[string, number]> = [];
    await expect(
      retry(
        async () => {
          throw new Error("store down");
        },
        {
          maxAttempts: 3,
          baseDelayMs: 1,
          onRetry: (err, attempt) => {
            seen.push([err instanceof Error ? err.message : "?", attempt]);
          },
        },
      ),
    ).rejects.toThrow("store down");
    // No callback after the final attempt
    expect(seen).toEqual([
      ["store down", 0],
      ["store down", 1],
    ]);
  });

  it("rethrows at once when shouldRetry rejects the error", async () => {
    let calls = 0;
    const onRetry = vi.fn();
    await expect(
      retry(
        async () => {
          calls++;
          throw new TypeError("bad row");
        },
        { maxAttempts: 3, baseDelayMs: 1, shouldRetry: (err) => !(err instanceof TypeError), onRetry },
      ),
    ).rejects.toThrow("bad row");
    expect(calls).toBe(1);
    expect(onRetry).not.toHaveBeenCalled();
  });
});

describe("jitteredDelay", () => {
  it("stays between half and all of the capped exponential delay", () => {
    for (let i = 0; i < 20; i++) {
      const delay = jitteredDelay(100, 2, 10_000);
      expect(delay).toBeGreaterThanOrEqual(200);
      expect(delay).toBeLessThanOrEqual(400);
    }
  });

  it("caps at the maximum", () => {
    const delay = jitteredDelay(100, 20, 1_000);
    expect(delay).toBeLessThanOrEqual(1_000);
    expect(delay).toBeGreaterThanOrEqual(500);
  });
});
