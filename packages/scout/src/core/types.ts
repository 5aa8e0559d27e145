/**
 * Core Types for Feed Discovery
 *
 * Platform-agnostic contracts shared by the discovery services.
 */

/**
 * Bare hostname used as the probing unit (e.g. "blog.example.com").
 */
export type Domain = string;

/**
 * Fetch-compatible function. Injected so callers (and tests) can swap the
 * transport without touching globals.
 */
export type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

/**
 * Resolved network address for a hostname.
 */
export interface ResolvedAddress {
  address: string;
  family: 4 | 6;
}

/**
 * Resolves a hostname to every address it points at.
 */
export type HostResolver = (hostname: string) => Promise<ResolvedAddress[]>;

/**
 * Structured logger injected into every component.
 *
 * Discovery code never writes to the console directly; the caller decides
 * where output goes (console, Sentry breadcrumbs, nowhere).
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Telemetry adapter interface for optional observability.
 *
 * All methods are optional to allow partial implementations.
 * When not provided, discovery runs with zero telemetry overhead.
 */
export interface TelemetryAdapter {
  /**
   * Start a new span for distributed tracing
   *
   * @param options - Span configuration
   * @param callback - Function to execute within span
   * @returns Result of callback
   */
  startSpan?<T>(
    options: {
      /** Operation name (e.g., "feed.scan") */
      op?: string;
      /** Human-readable span name */
      name: string;
      /** Span attributes for filtering/grouping */
      attributes?: Record<string, string | number | boolean>;
    },
    callback: () => Promise<T>
  ): Promise<T>;

  addBreadcrumb?(breadcrumb: {
    message: string;
    level?: "debug" | "info" | "warning" | "error";
    category?: string;
    data?: Record<string, unknown>;
  }): void;

  captureException?(
    error: Error,
    context?: {
      level?: "debug" | "info" | "warning" | "error";
      tags?: Record<string, string>;
      extra?: Record<string, unknown>;
    }
  ): void;
}

/**
 * Options shared by every network-facing discovery component.
 */
export interface DiscoveryOptions {
  /** Transport, defaults to the global fetch */
  fetch?: FetchLike;
  /** DNS resolver used by URL safety validation */
  resolver?: HostResolver;
  /** Defaults to a silent logger */
  logger?: Logger;
  telemetry?: TelemetryAdapter;
  /** Per-request timeout in milliseconds (default 10s) */
  timeoutMs?: number;
}
