/**
 * HTTP helpers shared by the discovery services.
 */

import type { FetchLike } from "../core/types";

export const USER_AGENT = "feedseeker/1.0";
export const DEFAULT_TIMEOUT_MS = 10000;
export const MAX_REDIRECTS = 10;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * GET a URL, following at most `maxRedirects` hops by hand.
 *
 * Each hop target is passed to `beforeRequest` first (URL safety checks
 * throw from there). Once the cap is reached the last redirect response is
 * returned as-is instead of failing.
 */
export async function fetchWithRedirectCap(
  url: string,
  options: {
    fetch: FetchLike;
    signal: AbortSignal;
    headers: Record<string, string>;
    maxRedirects?: number;
    beforeRequest?: (url: string) => Promise<void>;
  }
): Promise<Response> {
  const maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
  let currentUrl = url;

  for (let hops = 0; ; hops++) {
    await options.beforeRequest?.(currentUrl);

    const response = await options.fetch(currentUrl, {
      method: "GET",
      headers: options.headers,
      redirect: "manual",
      signal: options.signal,
    });

    const location = response.headers.get("location");
    if (
      !REDIRECT_STATUSES.has(response.status) ||
      !location ||
      hops >= maxRedirects
    ) {
      return response;
    }

    await response.body?.cancel();
    currentUrl = new URL(location, currentUrl).toString();
  }
}
