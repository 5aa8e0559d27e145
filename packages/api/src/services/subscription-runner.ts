/**
 * Subscription Runner
 *
 * One end-to-end run: resolve the category, optionally clear it, discover
 * feeds in single or traversal mode, then subscribe what was found.
 *
 * Fatal problems (unknown category, unreachable seed page) are thrown;
 * per-feed problems are logged and counted.
 */

import {
  discoverFeeds,
  type DiscoveryMode,
  type Logger,
  type ScanOptions,
  type TelemetryAdapter,
} from "@feedseeker/scout";
import type { AppConfig } from "@/config/env";
import type { FeedReaderClient } from "./reader-client";

export interface SubscriptionRequest {
  pageUrl: string;
  category: string;
  /** Dry run: count feeds as subscribed without calling the reader */
  debug: boolean;
  /** Delete every feed in the category before subscribing */
  clearCategoryFeeds: boolean;
  /** Explicit mode choice; undefined falls back to the configured default */
  singleUrlMode?: boolean;
}

export interface SubscriptionDeps {
  config: Pick<AppConfig, "singleUrlMode" | "scanConcurrency">;
  client: FeedReaderClient;
  logger: Logger;
  telemetry?: TelemetryAdapter;
  /** Transport overrides passed to discovery (fetch, resolver, timeouts) */
  discovery?: Omit<ScanOptions, "logger" | "telemetry" | "concurrency">;
}

export interface RunOutcome {
  mode: DiscoveryMode;
  categoryId: number;
  /** Feed URLs found, at most one per domain */
  discovered: string[];
  /** Feeds subscribed (or counted, in a dry run) */
  subscribed: number;
  /** Subscribe calls that failed */
  failed: number;
}

export class CategoryResolutionError extends Error {
  constructor(
    public readonly category: string,
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Error getting category ID for category ${category}${reason}`);
    this.name = "CategoryResolutionError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Decide the discovery mode. An explicit flag wins in either direction.
 */
export function resolveSingleUrlMode(
  flag: boolean | undefined,
  config: Pick<AppConfig, "singleUrlMode">
): boolean {
  return flag ?? config.singleUrlMode;
}

async function clearCategory(
  categoryId: number,
  client: FeedReaderClient,
  logger: Logger
): Promise<void> {
  // Listing failures propagate: the caller asked for a clean category
  const feedIds = await client.listCategoryFeeds(categoryId);
  logger.info(`Deleting ${feedIds.length} feed(s) from category ${categoryId}`);

  for (const feedId of feedIds) {
    logger.debug(`Deleting feed ${feedId}`);
    try {
      await client.deleteFeed(feedId);
    } catch (error) {
      logger.error(`Error deleting feed ${feedId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Run discovery and subscription for one seed page.
 *
 * @throws {CategoryResolutionError} When the category cannot be resolved
 * @throws {FeedReaderError} When clearing is requested and listing fails
 * @throws {DomainExtractionError} Single mode, seed has no hostname
 * @throws {UnsafeUrlError | PageFetchError} Traversal mode, seed unusable
 *
 * @example
 * const outcome = await runSubscription(
 *   { pageUrl, category: "Tech", debug: false, clearCategoryFeeds: false },
 *   { config, client, logger }
 * );
 */
export async function runSubscription(
  request: SubscriptionRequest,
  deps: SubscriptionDeps
): Promise<RunOutcome> {
  const { client, logger, telemetry } = deps;

  let categoryId: number;
  try {
    categoryId = await client.resolveCategory(request.category);
  } catch (error) {
    throw new CategoryResolutionError(request.category, { cause: error });
  }
  logger.debug(`Resolved category ${request.category} to ID ${categoryId}`);

  if (request.clearCategoryFeeds) {
    await clearCategory(categoryId, client, logger);
  }

  const mode: DiscoveryMode = resolveSingleUrlMode(
    request.singleUrlMode,
    deps.config
  )
    ? "single"
    : "traversal";

  const { feeds } = await discoverFeeds(request.pageUrl, {
    ...deps.discovery,
    mode,
    logger,
    telemetry,
    concurrency: deps.config.scanConcurrency,
  });

  let subscribed = 0;
  let failed = 0;
  for (const feed of feeds) {
    if (request.debug) {
      logger.debug(`Debug mode enabled, pretending to subscribe to feed: ${feed}`);
      subscribed++;
      continue;
    }

    try {
      await client.subscribe(categoryId, feed);
      logger.info(`Successfully subscribed to feed: ${feed}`);
      subscribed++;
    } catch (error) {
      logger.error(`Error subscribing to feed ${feed}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      failed++;
    }
  }

  logger.info(
    `Successfully processed ${subscribed} out of ${feeds.length} feed(s)`
  );

  return { mode, categoryId, discovered: feeds, subscribed, failed };
}
