import type { z } from "zod";

import { ValidationError } from "@typesLocal/errors";

export type RequestPart = "body" | "query" | "params";

/**
 * Parses one part of a request, turning zod issues into a 400 ValidationError.
 */
export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  part: RequestPart = "body"
): T {
  const parsed = schema.safeParse(value);

  if (!parsed.success) {
    throw new ValidationError(`Invalid request ${part}`, {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}
