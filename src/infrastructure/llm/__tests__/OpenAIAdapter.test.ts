import { describe, expect, it, vi } from "vitest";

import { isRetryableError, withRetry } from "@infrastructure/llm/OpenAIAdapter";

const NO_WAIT = [0, 0, 0];

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("isRetryableError", () => {
  it("should retry transient network failures and throttling", () => {
    expect(isRetryableError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(
      isRetryableError(new Error("wrapped", { cause: { code: "ETIMEDOUT" } }))
    ).toBe(true);
    expect(isRetryableError(httpError(429))).toBe(true);
    expect(isRetryableError(httpError(503))).toBe(true);
    expect(
      isRetryableError(Object.assign(new Error("bad gateway"), { response: { status: 502 } }))
    ).toBe(true);
  });

  it("should not retry client errors or unknown values", () => {
    expect(isRetryableError(httpError(400))).toBe(false);
    expect(isRetryableError(new Error("plain"))).toBe(false);
    expect(isRetryableError({ status: 503 })).toBe(false);
  });
});

describe("withRetry", () => {
  it("should retry until a call succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, "test.op", NO_WAIT)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should give up after one attempt per backoff entry", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(429));

    await expect(withRetry(fn, "test.op", NO_WAIT)).rejects.toThrow("HTTP 429");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should fail fast on errors that are not transient", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(401));

    await expect(withRetry(fn, "test.op", NO_WAIT)).rejects.toThrow("HTTP 401");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
