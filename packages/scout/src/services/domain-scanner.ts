/**
 * Concurrent Domain Scanner
 *
 * Fans the feed probe out over a set of domains and collects at most one
 * feed per domain.
 */

import pLimit from "p-limit";
import { silentLogger } from "../core/logger";
import { breadcrumb, withSpan } from "../core/telemetry";
import type { Domain } from "../core/types";
import { findFeed, type FeedProbeOptions } from "./feed-probe";

export interface ScanOptions extends FeedProbeOptions {
  /**
   * Maximum domains probed at once. Defaults to Infinity (one concurrent
   * probe per domain); set a ceiling for pages with very many links.
   */
  concurrency?: number;
  /** Probe used per domain, defaults to {@link findFeed} */
  probe?: (domain: Domain, options: FeedProbeOptions) => Promise<string | null>;
}

/**
 * Result set shared by the scan workers.
 *
 * `accept` checks membership and records the feed in one synchronous step,
 * so no two workers can both publish for the same domain.
 */
export class ScanResultSet {
  private readonly byDomain = new Map<Domain, string>();
  private readonly ordered: string[] = [];

  accept(domain: Domain, feedUrl: string): boolean {
    if (this.byDomain.has(domain)) return false;
    this.byDomain.set(domain, feedUrl);
    this.ordered.push(feedUrl);
    return true;
  }

  get size(): number {
    return this.ordered.length;
  }

  /** Fresh array in completion order */
  snapshot(): string[] {
    return [...this.ordered];
  }
}

/**
 * Probe every domain for its preferred feed.
 *
 * @param domains - Hostnames to probe
 * @returns Discovered feed URLs in completion order (callers must not rely
 *   on the order)
 *
 * @example
 * const feeds = await scanDomains(new Set(["a.example", "b.example"]), {
 *   concurrency: 8,
 * });
 */
export async function scanDomains(
  domains: Iterable<Domain>,
  options: ScanOptions = {}
): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const {
    concurrency = Number.POSITIVE_INFINITY,
    probe = findFeed,
    ...probeOptions
  } = options;
  const targets = [...new Set(domains)];

  return withSpan(
    options.telemetry,
    {
      op: "feed.scan",
      name: "Scan Domains",
      attributes: {
        domain_count: targets.length,
        concurrency: Number.isFinite(concurrency) ? concurrency : -1,
      },
    },
    async () => {
      const limit = pLimit(concurrency);
      const results = new ScanResultSet();

      await Promise.all(
        targets.map((domain) =>
          limit(async () => {
            try {
              const feedUrl = await probe(domain, probeOptions);
              if (feedUrl && results.accept(domain, feedUrl)) {
                logger.debug(`Accepted feed for ${domain}: ${feedUrl}`);
              }
            } catch (error) {
              logger.warn(`Probe for ${domain} failed unexpectedly`, {
                error: error instanceof Error ? error.message : String(error),
              });
              options.telemetry?.captureException?.(
                error instanceof Error ? error : new Error(String(error)),
                {
                  level: "warning",
                  tags: { operation: "feed_scan" },
                  extra: { domain },
                }
              );
            }
          })
        )
      );

      breadcrumb(
        options.telemetry,
        `Scan found ${results.size} feed(s) across ${targets.length} domain(s)`,
        { feeds_found: results.size, domain_count: targets.length }
      );

      return results.snapshot();
    }
  );
}
