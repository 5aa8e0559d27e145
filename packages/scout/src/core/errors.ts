/**
 * Feed Discovery Errors
 *
 * Custom error classes for feed discovery operations.
 */

/**
 * Base error class for feed discovery operations
 */
export class FeedDiscoveryError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = "FeedDiscoveryError";
  }
}

export type UnsafeUrlCode =
  | "EMPTY_URL"
  | "INVALID_FORMAT"
  | "UNSUPPORTED_SCHEME"
  | "NO_HOSTNAME"
  | "PRIVATE_NETWORK"
  | "RESOLUTION_FAILURE";

/**
 * Thrown when a URL must not be fetched (bad scheme, private network, ...)
 */
export class UnsafeUrlError extends FeedDiscoveryError {
  constructor(
    message: string,
    public override code: UnsafeUrlCode,
    public url: string
  ) {
    super(message, code);
    this.name = "UnsafeUrlError";
  }
}

export type DomainExtractionCode =
  | "EMPTY_URL"
  | "INVALID_FORMAT"
  | "NO_HOSTNAME"
  | "TOO_LONG";

/**
 * Thrown when no usable hostname can be pulled out of user input
 */
export class DomainExtractionError extends FeedDiscoveryError {
  constructor(
    message: string,
    public override code: DomainExtractionCode,
    public input: string
  ) {
    super(message, code);
    this.name = "DomainExtractionError";
  }
}

/**
 * Thrown when the seed page cannot be fetched for link harvesting
 */
export class PageFetchError extends FeedDiscoveryError {
  constructor(
    message: string,
    public pageUrl: string,
    options?: { cause?: unknown }
  ) {
    super(message, "PAGE_FETCH_FAILED");
    this.name = "PageFetchError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
