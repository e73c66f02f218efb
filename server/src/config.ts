import { z } from "zod";

export const DEFAULT_AAVE_API_URL = "https://api.v3.aave.com/graphql";

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RetryPolicy {
  // Total attempts, including the first one. Capped at 2.
  maxAttempts: number;
  delayMs: number;
}

export interface AppConfig {
  apiUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
  logLevel: LogLevel;
}

const envSchema = z.object({
  AAVE_API_URL: z.string().url().default(DEFAULT_AAVE_API_URL),
  AAVE_API_TIMEOUT_MS: z.coerce.number().int().min(1000).max(60_000).default(12_000),
  AAVE_API_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(2).default(2),
  AAVE_API_RETRY_DELAY_MS: z.coerce.number().int().min(0).max(10_000).default(500),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// Blank values are treated as unset so `FOO=` in an env file falls back to
// the default instead of failing coercion.
const withoutBlanks = (
  env: Record<string, string | undefined>,
): Record<string, string> => {
  const out: Record<string, string> = {};

  for (const [key, value] of Object.entries(env)) {
    if (value != null && value.trim() !== "") out[key] = value;
  }

  return out;
};

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): AppConfig => {
  const parsed = envSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const vars = parsed.data;

  return {
    apiUrl: vars.AAVE_API_URL,
    timeoutMs: vars.AAVE_API_TIMEOUT_MS,
    retry: {
      maxAttempts: vars.AAVE_API_RETRY_ATTEMPTS,
      delayMs: vars.AAVE_API_RETRY_DELAY_MS,
    },
    logLevel: vars.LOG_LEVEL,
  };
};
