import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS } from "@botwire/transport";
import { z } from "zod";
import { ConfigurationError } from "../errors/configuration-error";

const LOG_LEVEL = ["debug", "info", "warn", "error", "silent"] as const;

// Retry opens every attempt up front, one payload snapshot each.
const MAX_RETRY_ATTEMPTS = 10;

const TOKEN_PATTERN = /^\d+:[A-Za-z0-9_-]+$/;

export const ThrottleSchema = z.object({
  globalLimit: z.number().int().positive().optional().default(30),
  globalWindowMs: z.number().int().positive().optional().default(1_000),
  /** Per target chat. */
  chatLimit: z.number().int().positive().optional().default(20),
  chatWindowMs: z.number().int().positive().optional().default(60_000),
});

export const RetrySchema = z.object({
  /** Total attempts, including the first. */
  maxAttempts: z.number().int().min(1).max(MAX_RETRY_ATTEMPTS).optional().default(3),
  baseDelayMs: z.number().int().nonnegative().optional().default(500),
  maxDelayMs: z.number().int().nonnegative().optional().default(10_000),
});

export const BotConfigSchema = z.object({
  token: z.string().regex(TOKEN_PATTERN, "Must look like '123456:ABC-DEF'"),
  apiUrl: z.url().optional().default(DEFAULT_API_URL),
  timeoutMs: z.number().int().positive().optional().default(DEFAULT_TIMEOUT_MS),
  logLevel: z.enum(LOG_LEVEL).optional().default("warn"),
  cacheMe: z.boolean().optional().default(true),
  throttle: ThrottleSchema.optional(),
  retry: RetrySchema.optional(),
});

function formatZodIssues(issues: ReadonlyArray<z.core.$ZodIssue>): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  - ${path}: ${issue.message}`;
    })
    .join("\n");
}

export function validateConfig(
  input: unknown,
): z.output<typeof BotConfigSchema> {
  const result = BotConfigSchema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw new ConfigurationError(
    "invalid_config",
    `Invalid Botwire configuration:\n${formatZodIssues(result.error.issues)}`,
  );
}
