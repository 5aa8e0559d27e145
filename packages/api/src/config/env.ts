/**
 * Environment Configuration
 *
 * Loads `.env` from the working directory (variables already present in the
 * process environment win) and validates everything with zod.
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const envSchema = z.object({
  RSS_READER_ENDPOINT: z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: "RSS reader API endpoint must be provided" })
      .url("must be an absolute URL")
  ),
  RSS_READER_API_KEY: z.preprocess(
    blankToUndefined,
    z.string({ required_error: "RSS reader API key must be provided" })
  ),
  SINGLE_URL_MODE: z.preprocess(
    (value) =>
      typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value,
    z
      .enum(["true", "false"], {
        errorMap: () => ({ message: 'must be "true" or "false"' }),
      })
      .default("false")
      .transform((value) => value === "true")
  ),
  WEB_HOST: z.preprocess(blankToUndefined, z.string().default("127.0.0.1")),
  WEB_PORT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(65535).default(8080)
  ),
  SCAN_CONCURRENCY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().optional()
  ),
  SENTRY_DSN: z.preprocess(blankToUndefined, z.string().url().optional()),
  SENTRY_ENVIRONMENT: optionalString,
  SENTRY_RELEASE: optionalString,
  NODE_ENV: optionalString,
});

export interface AppConfig {
  readonly readerEndpoint: string;
  readonly readerApiKey: string;
  /** Default discovery mode when a request does not choose one */
  readonly singleUrlMode: boolean;
  readonly webHost: string;
  readonly webPort: number;
  /** Probe ceiling for traversal scans; unbounded when undefined */
  readonly scanConcurrency?: number;
  readonly sentryDsn?: string;
  readonly sentryEnvironment?: string;
  readonly sentryRelease?: string;
  readonly nodeEnv?: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Validate an environment map into an {@link AppConfig}.
 *
 * @throws {ConfigError} Listing every invalid or missing key
 */
export function parseConfig(
  env: Record<string, string | undefined>
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const parsed = result.data;
  return Object.freeze({
    readerEndpoint: parsed.RSS_READER_ENDPOINT.replace(/\/+$/, ""),
    readerApiKey: parsed.RSS_READER_API_KEY,
    singleUrlMode: parsed.SINGLE_URL_MODE,
    webHost: parsed.WEB_HOST,
    webPort: parsed.WEB_PORT,
    scanConcurrency: parsed.SCAN_CONCURRENCY,
    sentryDsn: parsed.SENTRY_DSN,
    sentryEnvironment: parsed.SENTRY_ENVIRONMENT,
    sentryRelease: parsed.SENTRY_RELEASE,
    nodeEnv: parsed.NODE_ENV,
  });
}

/**
 * Load `.env` (if present) into `process.env`, then parse it.
 */
export function loadConfig(): AppConfig {
  loadDotenv();
  return parseConfig(process.env);
}
