/**
 * Sentry Configuration
 *
 * Builds `Sentry.init` options from the application config. Sentry is
 * optional: without a DSN nothing is reported.
 */

import * as Sentry from "@sentry/node";
import type { NodeOptions } from "@sentry/node";
import type { Logger } from "@feedseeker/scout";
import type { SentryHub } from "@/utils/sentry-adapter";
import type { AppConfig } from "./env";

type SentrySettings = Pick<
  AppConfig,
  "sentryDsn" | "sentryEnvironment" | "sentryRelease" | "nodeEnv"
>;

/**
 * Common Sentry configuration options
 *
 * Includes:
 * - Tracing configuration (100% in development, 10% elsewhere)
 * - beforeSendSpan callback for global span attributes
 */
export function getSentryConfig(config: SentrySettings): NodeOptions | null {
  const dsn = config.sentryDsn;
  if (!dsn) {
    return null; // Sentry is optional
  }

  const environment =
    config.sentryEnvironment || config.nodeEnv || "development";
  const release = config.sentryRelease;

  return {
    dsn,
    environment,
    release,
    tracesSampleRate: environment === "development" ? 1.0 : 0.1,

    // Debug mode (verbose logging - useful for development)
    debug: environment === "development",

    /**
     * beforeSendSpan callback
     *
     * Adds global context to all spans (traces)
     */
    beforeSendSpan: (span) => {
      span.data = {
        ...span.data,
        runtime: "nodejs",
        "app.environment": environment,
        ...(release ? { "app.version": release } : {}),
      };
      return span;
    },
  };
}

/**
 * Initialize the Node SDK when a DSN is configured.
 *
 * @returns The SDK for reporting, or undefined when Sentry is off
 */
export function initSentry(
  config: SentrySettings,
  logger: Logger
): SentryHub | undefined {
  const sentryConfig = getSentryConfig(config);
  if (!sentryConfig) {
    return undefined;
  }

  Sentry.init({
    ...sentryConfig,
    integrations: [
      Sentry.httpIntegration(),
      Sentry.nativeNodeFetchIntegration(),
    ],
  });
  logger.info("✅ Sentry initialized");
  return Sentry;
}
