/**
 * Feed Probe Engine
 *
 * Tries a fixed, ordered list of well-known feed paths on one domain and
 * returns the first that serves XML/RSS content. This is a preference order,
 * not an exhaustive search: a domain with several feeds yields one.
 */

import { silentLogger } from "../core/logger";
import { breadcrumb, withSpan } from "../core/telemetry";
import type { DiscoveryOptions, Domain, FetchLike, Logger } from "../core/types";
import { createUrlValidator } from "../validators/url-safety";
import {
  DEFAULT_TIMEOUT_MS,
  MAX_REDIRECTS,
  USER_AGENT,
  fetchWithRedirectCap,
} from "./http";

/**
 * Feed paths in precedence order.
 */
export const FEED_PATTERNS = [
  "/index.xml",
  "/feed",
  "/feed.xml",
  "/rss",
  "/rss.xml",
  "/atom.xml",
  "/?format=rss",
] as const;

/**
 * Permissive feed check: substring match on the raw header, no MIME parsing.
 */
export function isFeedContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  return contentType.includes("xml") || contentType.includes("rss");
}

/**
 * Build the candidate URLs for a domain, in precedence order.
 */
export function feedCandidates(domain: Domain): string[] {
  return FEED_PATTERNS.map((pattern) => `https://${domain}${pattern}`);
}

export interface FeedProbeOptions extends DiscoveryOptions {
  /** Redirect hops followed before the last response is accepted */
  maxRedirects?: number;
}

async function checkCandidate(
  feedUrl: string,
  fetchImpl: FetchLike,
  validateUrl: (url: string) => Promise<void>,
  logger: Logger,
  options: FeedProbeOptions
): Promise<boolean> {
  try {
    await validateUrl(feedUrl);
  } catch (error) {
    logger.debug(`Skipping unsafe feed URL ${feedUrl}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
    return false;
  }

  try {
    const response = await fetchWithRedirectCap(feedUrl, {
      fetch: fetchImpl,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      headers: {
        "User-Agent": USER_AGENT,
        Accept:
          "application/rss+xml, application/atom+xml, application/xml, text/xml, */*",
      },
      maxRedirects: options.maxRedirects ?? MAX_REDIRECTS,
      // The first hop was validated above; redirect targets are checked here
      beforeRequest: (url) =>
        url === feedUrl ? Promise.resolve() : validateUrl(url),
    });

    const matched =
      response.status === 200 &&
      isFeedContentType(response.headers.get("content-type"));

    await response.body?.cancel();
    return matched;
  } catch (error) {
    logger.debug(`Probe failed for ${feedUrl}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Find the preferred feed for a domain.
 *
 * @param domain - Bare hostname, e.g. "blog.example.com"
 * @returns URL of the first matching pattern, or null when none matches
 *
 * @example
 * await findFeed("techblog.example.org");
 * // "https://techblog.example.org/feed.xml"
 */
export async function findFeed(
  domain: Domain,
  options: FeedProbeOptions = {}
): Promise<string | null> {
  const logger = options.logger ?? silentLogger;
  const fetchImpl = options.fetch ?? fetch;
  const validateUrl = createUrlValidator({ resolver: options.resolver });

  return withSpan(
    options.telemetry,
    {
      op: "feed.probe",
      name: "Probe Feed Patterns",
      attributes: { domain },
    },
    async () => {
      logger.debug(`Checking feed patterns for domain: ${domain}`);

      for (const feedUrl of feedCandidates(domain)) {
        logger.debug(`Checking feed URL: ${feedUrl}`);
        if (
          await checkCandidate(feedUrl, fetchImpl, validateUrl, logger, options)
        ) {
          logger.debug(`Valid feed found at: ${feedUrl}`);
          breadcrumb(options.telemetry, `Feed found for ${domain}`, {
            domain,
            feed_url: feedUrl,
          });
          return feedUrl;
        }
      }

      logger.debug(`No feeds found for domain: ${domain}`);
      return null;
    }
  );
}
