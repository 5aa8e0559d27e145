/**
 * Discovery entry point
 *
 * Chooses between the two discovery modes and returns the feeds found.
 */

import { silentLogger } from "./logger";
import { withSpan } from "./telemetry";
import type { Domain } from "./types";
import { scanDomains, type ScanOptions } from "../services/domain-scanner";
import { findFeed, FEED_PATTERNS } from "../services/feed-probe";
import { harvestDomains } from "../services/link-harvester";
import { extractDomain } from "../utils/domain-extractor";

/**
 * - `single`: probe only the seed URL's own domain; the page is never fetched
 * - `traversal`: harvest every domain linked from the seed page, then scan
 *   them all
 */
export type DiscoveryMode = "single" | "traversal";

export interface DiscoveryResult {
  mode: DiscoveryMode;
  /** Domains that were probed */
  domains: Domain[];
  /** Feed URLs found, at most one per domain */
  feeds: string[];
}

/**
 * Discover feeds reachable from a seed URL.
 *
 * **Single mode:** `extractDomain(seed)` then one {@link findFeed}; zero or
 * one result.
 *
 * **Traversal mode:** {@link harvestDomains} on the seed, then
 * {@link scanDomains} across the harvested set.
 *
 * @throws {DomainExtractionError} Single mode, when the seed has no hostname
 * @throws {UnsafeUrlError} Traversal mode, when the seed is unsafe to fetch
 * @throws {PageFetchError} Traversal mode, when the seed page cannot be fetched
 *
 * @example
 * const { feeds } = await discoverFeeds("https://news.example.com", {
 *   mode: "traversal",
 *   concurrency: 16,
 * });
 */
export async function discoverFeeds(
  seedUrl: string,
  options: ScanOptions & { mode: DiscoveryMode }
): Promise<DiscoveryResult> {
  const { mode, ...scanOptions } = options;
  const logger = scanOptions.logger ?? silentLogger;

  return withSpan(
    scanOptions.telemetry,
    {
      op: "feed.discovery",
      name: "Feed Discovery",
      attributes: { seed_url: seedUrl, mode },
    },
    async (): Promise<DiscoveryResult> => {
      if (mode === "single") {
        const domain = extractDomain(seedUrl);
        logger.info(`Using single URL mode for domain: ${domain}`);

        const probe = scanOptions.probe ?? findFeed;
        const feed = await probe(domain, scanOptions);
        if (!feed) {
          logger.info(`No feeds found on domain ${domain}`, {
            patterns: [...FEED_PATTERNS],
          });
        }
        return { mode, domains: [domain], feeds: feed ? [feed] : [] };
      }

      logger.info(`Using traversal mode, collecting domains linked from ${seedUrl}`);
      const domains = [...(await harvestDomains(seedUrl, scanOptions))];
      logger.info(`Found ${domains.length} unique domains to check for feeds`);

      if (domains.length === 0) {
        logger.warn(`No domains found on page ${seedUrl}`);
        return { mode, domains, feeds: [] };
      }

      const feeds = await scanDomains(domains, scanOptions);
      logger.info(
        `Found ${feeds.length} feed(s) across ${domains.length} domain(s)`
      );
      return { mode, domains, feeds };
    }
  );
}
