/**
 * Telemetry helpers
 *
 * Thin wrappers so services can call span/breadcrumb unconditionally and pay
 * nothing when no adapter is configured.
 */

import type { TelemetryAdapter } from "./types";

/**
 * Wrap operation in telemetry span if telemetry is provided
 */
export async function withSpan<T>(
  telemetry: TelemetryAdapter | undefined,
  options: {
    op: string;
    name: string;
    attributes?: Record<string, string | number | boolean>;
  },
  callback: () => Promise<T>
): Promise<T> {
  if (telemetry?.startSpan) {
    return telemetry.startSpan(options, callback);
  }
  return callback();
}

/**
 * Add breadcrumb if telemetry is provided
 */
export function breadcrumb(
  telemetry: TelemetryAdapter | undefined,
  message: string,
  data?: Record<string, unknown>,
  level: "debug" | "info" | "warning" | "error" = "info"
): void {
  telemetry?.addBreadcrumb?.({
    category: "feed.discovery",
    message,
    level,
    data,
  });
}
