/**
 * API Package Entry Point
 *
 * Configuration, the feed-reader client, the subscription runner and the
 * HTTP service, for embedding without the CLI.
 */

export { loadConfig, parseConfig, ConfigError } from "./config/env";
export type { AppConfig } from "./config/env";
export { getSentryConfig, initSentry } from "./config/sentry";

export {
  MinifluxClient,
  FeedReaderError,
  CategoryNotFoundError,
} from "./services/reader-client";
export type {
  Category,
  FeedReaderClient,
  MinifluxClientOptions,
} from "./services/reader-client";

export {
  runSubscription,
  resolveSingleUrlMode,
  CategoryResolutionError,
} from "./services/subscription-runner";
export type {
  RunOutcome,
  SubscriptionDeps,
  SubscriptionRequest,
} from "./services/subscription-runner";

export { RateLimiter, getClientIP } from "./services/rate-limiter";
export { createHonoApp } from "./hono/app";
export type { App, HonoAppConfig, SubmitResponse } from "./hono/app";
export { startServer } from "./entries/node";
export type { ServeOptions } from "./entries/node";
export { createSentryTelemetry } from "./utils/sentry-adapter";
export type { SentryHub } from "./utils/sentry-adapter";
