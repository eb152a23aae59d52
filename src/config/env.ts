import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { BooksError } from "../domain/models/errors.ts";
import { GOOGLE_BOOKS_BASE_URL } from "../domain/services/QueryBuilder.ts";

/**
 * Client settings resolved from the environment
 */
export interface ClientConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

const envSchema = z.object({
  GOOGLE_BOOKS_API_KEY: z.string().min(1).optional(),
  GOOGLE_BOOKS_BASE_URL: z.string().url().optional(),
  GOOGLE_BOOKS_TIMEOUT_MS: z.string().regex(/^[1-9]\d*$/, "must be a positive integer").optional(),
});

/**
 * Load client settings from environment variables
 * @param env Variables to read, `process.env` by default
 */
export function loadClientConfig(
  env: Record<string, string | undefined> = process.env,
): Result<ClientConfig, BooksError> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    return err({
      type: "invalidArgument",
      message: parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    });
  }

  const vars = parsed.data;

  return ok({
    baseUrl: vars.GOOGLE_BOOKS_BASE_URL ?? GOOGLE_BOOKS_BASE_URL,
    apiKey: vars.GOOGLE_BOOKS_API_KEY,
    timeoutMs: vars.GOOGLE_BOOKS_TIMEOUT_MS ? parseInt(vars.GOOGLE_BOOKS_TIMEOUT_MS) : undefined,
  });
}
