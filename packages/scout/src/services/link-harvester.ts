/**
 * Page Link Harvester
 *
 * Fetches one page and collects every hostname its anchors point at.
 * Single hop only: linked pages are never fetched.
 */

import { Parser } from "htmlparser2";
import { PageFetchError, UnsafeUrlError } from "../core/errors";
import { silentLogger } from "../core/logger";
import { breadcrumb, withSpan } from "../core/telemetry";
import type { DiscoveryOptions, Domain } from "../core/types";
import { bareHostname, createUrlValidator } from "../validators/url-safety";
import { MAX_HOSTNAME_LENGTH } from "../utils/domain-extractor";
import { DEFAULT_TIMEOUT_MS, USER_AGENT, fetchWithRedirectCap } from "./http";

/**
 * Hostname an anchor `href` points at, or null when it has none.
 *
 * Only absolute URLs carry a host; protocol-relative `//host/path` links are
 * read as https. Relative links, `mailto:` and `javascript:` yield null, as
 * do hostnames longer than DNS allows.
 */
export function hostnameFromHref(href: string): string | null {
  const value = href.trim();
  if (!value) return null;

  try {
    const url = new URL(value.startsWith("//") ? `https:${value}` : value);
    const hostname = bareHostname(url.hostname);
    if (!hostname || hostname.length > MAX_HOSTNAME_LENGTH) return null;
    return hostname;
  } catch {
    return null;
  }
}

/**
 * Stream an HTML body through the tokenizer, collecting anchor hostnames.
 *
 * A read error ends the scan; whatever was collected up to that point is
 * returned.
 */
export async function collectAnchorHostnames(
  body: ReadableStream<Uint8Array>,
  onReadError?: (error: unknown) => void
): Promise<Set<Domain>> {
  const domains = new Set<Domain>();

  const parser = new Parser(
    {
      onopentag(name, attributes) {
        if (name !== "a") return;
        const href = attributes["href"];
        if (href === undefined) return;
        const hostname = hostnameFromHref(href);
        if (hostname) domains.add(hostname);
      },
    },
    { decodeEntities: true }
  );

  const decoder = new TextDecoder();
  const reader = body.getReader();

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      parser.write(decoder.decode(value, { stream: true }));
    }
    parser.write(decoder.decode());
  } catch (error) {
    onReadError?.(error);
  } finally {
    reader.releaseLock();
  }

  parser.end();
  return domains;
}

/**
 * Fetch a page and return the unique hostnames linked from its anchors.
 *
 * @param pageUrl - Seed page; must pass URL safety validation
 * @returns Set of hostnames (may be empty)
 * @throws {UnsafeUrlError} When the seed URL is unsafe to fetch
 * @throws {PageFetchError} When the request itself fails
 *
 * @example
 * const domains = await harvestDomains("https://news.example.com");
 * // Set { "techblog.example.org", "sports.example.net" }
 */
export async function harvestDomains(
  pageUrl: string,
  options: DiscoveryOptions = {}
): Promise<Set<Domain>> {
  const logger = options.logger ?? silentLogger;
  const fetchImpl = options.fetch ?? fetch;
  const validateUrl = createUrlValidator({ resolver: options.resolver });

  return withSpan(
    options.telemetry,
    {
      op: "feed.harvest",
      name: "Harvest Page Links",
      attributes: { page_url: pageUrl },
    },
    async () => {
      await validateUrl(pageUrl);

      let response: Response;
      try {
        response = await fetchWithRedirectCap(pageUrl, {
          fetch: fetchImpl,
          headers: {
            "User-Agent": USER_AGENT,
            Accept: "text/html,application/xhtml+xml",
          },
          signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
          // The seed was validated above; redirect targets are checked here
          beforeRequest: (url) =>
            url === pageUrl ? Promise.resolve() : validateUrl(url),
        });
      } catch (error) {
        const reason =
          error instanceof UnsafeUrlError
            ? `redirect blocked: ${error.message}`
            : error instanceof Error
              ? error.message
              : String(error);
        throw new PageFetchError(
          `Failed to fetch page ${pageUrl}: ${reason}`,
          pageUrl,
          { cause: error }
        );
      }

      if (!response.ok) {
        logger.warn(`Page ${pageUrl} answered HTTP ${response.status}`, {
          status: response.status,
        });
      }

      if (!response.body) {
        return new Set<Domain>();
      }

      const domains = await collectAnchorHostnames(response.body, (error) => {
        logger.debug(`Stopped reading ${pageUrl} early`, {
          error: error instanceof Error ? error.message : String(error),
        });
      });

      breadcrumb(options.telemetry, `Harvested ${domains.size} domains`, {
        page_url: pageUrl,
        domain_count: domains.size,
      });
      logger.debug(`Harvested ${domains.size} unique domains from ${pageUrl}`);

      return domains;
    }
  );
}
