/**
 * URL Safety Validator
 *
 * Guards every outbound request made by discovery. A URL is only fetched
 * when it uses http(s) and its hostname resolves exclusively to public
 * addresses, so the prober cannot be pointed at an internal network.
 */

import { lookup } from "node:dns/promises";
import { BlockList, isIP } from "node:net";
import { UnsafeUrlError } from "../core/errors";
import type { HostResolver, ResolvedAddress } from "../core/types";

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

const PRIVATE_RANGES = new BlockList();
// IPv4
PRIVATE_RANGES.addSubnet("10.0.0.0", 8, "ipv4");
PRIVATE_RANGES.addSubnet("172.16.0.0", 12, "ipv4");
PRIVATE_RANGES.addSubnet("192.168.0.0", 16, "ipv4");
PRIVATE_RANGES.addSubnet("127.0.0.0", 8, "ipv4");
PRIVATE_RANGES.addSubnet("169.254.0.0", 16, "ipv4");
// IPv6
PRIVATE_RANGES.addAddress("::1", "ipv6");
PRIVATE_RANGES.addSubnet("fe80::", 10, "ipv6");
PRIVATE_RANGES.addSubnet("fc00::", 7, "ipv6");

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/**
 * Default resolver: every A/AAAA record the system resolver returns.
 */
export const systemResolver: HostResolver = async (hostname) => {
  const records = await lookup(hostname, { all: true, verbatim: true });
  return records.map(
    (record): ResolvedAddress => ({
      address: record.address,
      family: record.family === 6 ? 6 : 4,
    })
  );
};

/**
 * Check whether an address falls in a private, loopback or link-local range.
 *
 * IPv4-mapped IPv6 addresses (`::ffff:10.0.0.1`) are checked as IPv4.
 *
 * @example
 * isPrivateAddress("192.168.1.20") // true
 * isPrivateAddress("fd12:3456::1") // true
 * isPrivateAddress("93.184.216.34") // false
 */
export function isPrivateAddress(address: string): boolean {
  const mapped = IPV4_MAPPED.exec(address);
  if (mapped?.[1]) {
    return PRIVATE_RANGES.check(mapped[1], "ipv4");
  }

  const family = isIP(address);
  if (family === 4) return PRIVATE_RANGES.check(address, "ipv4");
  if (family === 6) return PRIVATE_RANGES.check(address, "ipv6");
  return false;
}

/**
 * Strip the brackets WHATWG URL keeps around IPv6 hostnames.
 */
export function bareHostname(hostname: string): string {
  return hostname.startsWith("[") && hostname.endsWith("]")
    ? hostname.slice(1, -1)
    : hostname;
}

/**
 * Create a URL validator bound to a resolver.
 *
 * @param options.resolver - DNS resolver, defaults to {@link systemResolver}
 * @returns Async validator that resolves when the URL is safe and throws
 *   {@link UnsafeUrlError} otherwise
 */
export function createUrlValidator(options?: {
  resolver?: HostResolver;
}): (rawUrl: string) => Promise<void> {
  const resolver = options?.resolver ?? systemResolver;

  return async (rawUrl: string): Promise<void> => {
    if (!rawUrl) {
      throw new UnsafeUrlError("URL cannot be empty", "EMPTY_URL", rawUrl);
    }

    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch {
      throw new UnsafeUrlError(
        `Invalid URL format: ${rawUrl}`,
        "INVALID_FORMAT",
        rawUrl
      );
    }

    if (!ALLOWED_PROTOCOLS.has(url.protocol)) {
      throw new UnsafeUrlError(
        `Only HTTP and HTTPS schemes are allowed, got: ${url.protocol.replace(/:$/, "")}`,
        "UNSUPPORTED_SCHEME",
        rawUrl
      );
    }

    const hostname = bareHostname(url.hostname);
    if (!hostname) {
      throw new UnsafeUrlError(
        "No hostname found in URL",
        "NO_HOSTNAME",
        rawUrl
      );
    }

    let addresses: ResolvedAddress[];
    try {
      addresses = await resolver(hostname);
    } catch (error) {
      throw new UnsafeUrlError(
        `Failed to resolve hostname ${hostname}: ${error instanceof Error ? error.message : String(error)}`,
        "RESOLUTION_FAILURE",
        rawUrl
      );
    }

    if (addresses.length === 0) {
      throw new UnsafeUrlError(
        `Failed to resolve hostname ${hostname}: no addresses`,
        "RESOLUTION_FAILURE",
        rawUrl
      );
    }

    for (const { address } of addresses) {
      if (isPrivateAddress(address)) {
        throw new UnsafeUrlError(
          `Requests to private/internal IP addresses are not allowed: ${hostname} resolves to ${address}`,
          "PRIVATE_NETWORK",
          rawUrl
        );
      }
    }
  };
}

/**
 * Validate a URL with the system resolver.
 *
 * @throws {UnsafeUrlError} When the URL is unsafe to request
 */
export async function validateUrl(
  rawUrl: string,
  options?: { resolver?: HostResolver }
): Promise<void> {
  return createUrlValidator(options)(rawUrl);
}
