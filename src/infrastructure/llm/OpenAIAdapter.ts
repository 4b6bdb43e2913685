/**
 * OpenAI client construction and retry policy for outbound model calls.
 */
import OpenAI from "openai";

import type { AppConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";

export function createOpenAIClient(openai: AppConfig["openai"]): OpenAI {
  return new OpenAI({
    apiKey: openai.key,
    baseURL: openai.baseUrl,
    timeout: openai.timeoutMs,
  });
}

export const DEFAULT_BACKOFF_MS: readonly number[] = [0, 200, 500];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function numberProp(source: unknown, key: string): number | undefined {
  if (!source || typeof source !== "object") {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" ? value : undefined;
}

function stringProp(source: unknown, key: string): string | undefined {
  if (!source || typeof source !== "object") {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

export function isRetryableError(error: unknown): boolean {
  const retryableCodes = new Set(["ECONNRESET", "ETIMEDOUT"]);
  const retryableStatuses = new Set([429, 500, 502, 503]);

  if (!(error instanceof Error)) {
    return false;
  }

  const cause: unknown = Reflect.get(error, "cause");
  const code = stringProp(error, "code") ?? stringProp(cause, "code");
  if (code && retryableCodes.has(code)) {
    return true;
  }

  const response: unknown = Reflect.get(error, "response");
  const status =
    numberProp(error, "statusCode") ??
    numberProp(error, "status") ??
    numberProp(response, "status");

  return typeof status === "number" && retryableStatuses.has(status);
}

/**
 * Runs `fn`, retrying transient network and 429/5xx failures with the given
 * backoff schedule. One attempt per schedule entry.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  backoffDelays: readonly number[] = DEFAULT_BACKOFF_MS
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= backoffDelays.length; attempt += 1) {
    if (attempt > 1) {
      await delay(backoffDelays[attempt - 1] ?? 0);
    }

    try {
      return await fn();
    } catch (e: unknown) {
      lastError = e;

      if (!isRetryableError(e) || attempt === backoffDelays.length) {
        throw e;
      }

      logger.log("warn", "OPENAI_RETRY", {
        attempt,
        error: e instanceof Error ? e.message : String(e),
        operation,
      });
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`${operation} failed after retries.`);
}
