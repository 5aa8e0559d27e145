/**
 * `feedseeker <pageUrl>`: discover feeds from a page and subscribe them.
 */

import {
  createConsoleLogger,
  type Logger,
  type TelemetryAdapter,
} from "@feedseeker/scout";
import { loadConfig, type AppConfig } from "@/config/env";
import { initSentry } from "@/config/sentry";
import {
  MinifluxClient,
  type FeedReaderClient,
} from "@/services/reader-client";
import { runSubscription } from "@/services/subscription-runner";
import { createSentryTelemetry } from "@/utils/sentry-adapter";

export interface SubscribeCommandOptions {
  category?: string;
  debug?: boolean;
  clearCategoryFeeds?: boolean;
  /** Undefined unless -s or --no-single-url-mode was given */
  singleUrlMode?: boolean;
  concurrency?: number;
}

export interface SubscribeCommandDeps {
  loadConfigFn: () => AppConfig;
  createLoggerFn: (debug: boolean) => Logger;
  createClientFn: (config: AppConfig) => FeedReaderClient;
  createTelemetryFn: (
    config: AppConfig,
    logger: Logger
  ) => TelemetryAdapter | undefined;
  runSubscriptionFn: typeof runSubscription;
}

const defaultDeps: SubscribeCommandDeps = {
  loadConfigFn: loadConfig,
  createLoggerFn: (debug) =>
    createConsoleLogger({ level: debug ? "debug" : "info" }),
  createClientFn: (config) => MinifluxClient.fromConfig(config),
  createTelemetryFn: (config, logger) => {
    const sentry = initSentry(config, logger);
    return sentry ? createSentryTelemetry(sentry) : undefined;
  },
  runSubscriptionFn: runSubscription,
};

/**
 * Accept only absolute http(s) URLs as the seed page.
 */
export function parsePageUrl(input: string): string | null {
  if (!/^https?:\/\//i.test(input.trim())) {
    return null;
  }
  try {
    return new URL(input.trim()).toString();
  } catch {
    return null;
  }
}

export async function runSubscribeCommand(
  pageUrlInput: string,
  options: SubscribeCommandOptions,
  deps: Partial<SubscribeCommandDeps> = {}
): Promise<{ exitCode: number }> {
  const resolved = { ...defaultDeps, ...deps };
  const debug = options.debug === true;
  const logger = resolved.createLoggerFn(debug);

  const pageUrl = parsePageUrl(pageUrlInput);
  if (!pageUrl) {
    logger.error(
      `Invalid URL input: ${pageUrlInput} (expected an absolute http:// or https:// URL)`
    );
    return { exitCode: 1 };
  }

  const category = options.category?.trim();
  if (!category) {
    logger.error("A category is required (-c, --category <name>)");
    return { exitCode: 1 };
  }

  try {
    const loaded = resolved.loadConfigFn();
    const config: AppConfig = {
      ...loaded,
      scanConcurrency: options.concurrency ?? loaded.scanConcurrency,
    };

    const outcome = await resolved.runSubscriptionFn(
      {
        pageUrl,
        category,
        debug,
        clearCategoryFeeds: options.clearCategoryFeeds === true,
        singleUrlMode: options.singleUrlMode,
      },
      {
        config,
        client: resolved.createClientFn(config),
        logger,
        telemetry: resolved.createTelemetryFn(config, logger),
      }
    );

    const failures = outcome.failed > 0 ? `, ${outcome.failed} failed` : "";
    logger.info(
      `✅ ${outcome.mode} mode: found ${outcome.discovered.length} feed(s), subscribed ${outcome.subscribed}${failures}`
    );
    return { exitCode: 0 };
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return { exitCode: 1 };
  }
}
