/**
 * Sentry Telemetry Adapter
 *
 * Bridges the discovery library's optional {@link TelemetryAdapter} hooks to
 * the Sentry SDK, so probe spans and scan breadcrumbs show up in traces.
 */

import type * as SentryNode from "@sentry/node";
import type { TelemetryAdapter } from "@feedseeker/scout";

/** The slice of the Sentry SDK the adapter needs */
export type SentryHub = Pick<
  typeof SentryNode,
  "startSpan" | "addBreadcrumb" | "captureException"
>;

export function createSentryTelemetry(sentry: SentryHub): TelemetryAdapter {
  return {
    startSpan: (options, callback) =>
      sentry.startSpan(
        {
          op: options.op,
          name: options.name,
          attributes: options.attributes,
        },
        () => callback()
      ),

    addBreadcrumb: (breadcrumb) => {
      sentry.addBreadcrumb(breadcrumb);
    },

    captureException: (error, context) => {
      sentry.captureException(error, context);
    },
  };
}
