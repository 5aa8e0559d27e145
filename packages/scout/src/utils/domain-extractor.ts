/**
 * Domain Extraction Utility
 *
 * Turns loose user input ("example.com:8080/feed", "https://a.b/c") into the
 * bare hostname used as the probing unit.
 */

import { DomainExtractionError } from "../core/errors";
import { bareHostname } from "../validators/url-safety";

/** Maximum hostname length allowed by DNS */
export const MAX_HOSTNAME_LENGTH = 253;

const SCHEME_PREFIX = /^https?:\/\//i;

/**
 * Extract the hostname from a URL or bare domain string.
 *
 * Input without an `http://` or `https://` prefix is treated as
 * `https://{input}`, so the port and any path are dropped.
 *
 * @param input - URL or domain-like string
 * @returns Lower-cased hostname without port or IPv6 brackets
 * @throws {DomainExtractionError} When no usable hostname can be extracted
 *
 * @example
 * extractDomain("https://example.com/blog/post") // "example.com"
 * extractDomain("example.com:8080/feed") // "example.com"
 * extractDomain("not-a-url") // "not-a-url"
 */
export function extractDomain(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new DomainExtractionError("URL cannot be empty", "EMPTY_URL", input);
  }

  const candidate = SCHEME_PREFIX.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new DomainExtractionError(
      `Invalid URL format '${input}'`,
      "INVALID_FORMAT",
      input
    );
  }

  const hostname = bareHostname(url.hostname);
  if (!hostname) {
    throw new DomainExtractionError(
      `No valid hostname found in URL '${input}'`,
      "NO_HOSTNAME",
      input
    );
  }

  if (hostname.length > MAX_HOSTNAME_LENGTH) {
    throw new DomainExtractionError(
      `Hostname too long (max ${MAX_HOSTNAME_LENGTH} characters)`,
      "TOO_LONG",
      input
    );
  }

  return hostname;
}
