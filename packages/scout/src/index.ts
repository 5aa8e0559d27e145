/**
 * Scout - Feed Discovery Library
 *
 * Finds RSS/Atom feeds on a domain, or on every domain linked from a page,
 * by probing well-known feed paths. Every outbound request passes URL
 * safety validation first.
 */

// Core
export { discoverFeeds } from "./core/discovery";
export type { DiscoveryMode, DiscoveryResult } from "./core/discovery";
export type {
  Domain,
  DiscoveryOptions,
  FetchLike,
  HostResolver,
  Logger,
  LogLevel,
  ResolvedAddress,
  TelemetryAdapter,
} from "./core/types";
export {
  FeedDiscoveryError,
  UnsafeUrlError,
  DomainExtractionError,
  PageFetchError,
} from "./core/errors";
export type { UnsafeUrlCode, DomainExtractionCode } from "./core/errors";
export { createConsoleLogger, silentLogger } from "./core/logger";

// Services
export {
  harvestDomains,
  hostnameFromHref,
} from "./services/link-harvester";
export {
  findFeed,
  feedCandidates,
  isFeedContentType,
  FEED_PATTERNS,
} from "./services/feed-probe";
export type { FeedProbeOptions } from "./services/feed-probe";
export { scanDomains, ScanResultSet } from "./services/domain-scanner";
export type { ScanOptions } from "./services/domain-scanner";

// Validators
export {
  createUrlValidator,
  validateUrl,
  isPrivateAddress,
  systemResolver,
} from "./validators/url-safety";

// Utilities
export { extractDomain, MAX_HOSTNAME_LENGTH } from "./utils/domain-extractor";
