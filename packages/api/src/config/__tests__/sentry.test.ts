/**
 * Sentry Configuration Tests
 *
 * Tests for Sentry configuration functions
 */

import { describe, it, expect } from "vitest";
import { getSentryConfig } from "../sentry";

const DSN = "https://test@test.ingest.sentry.io/123";

describe("getSentryConfig", () => {
  it("should return null when DSN is not provided", () => {
    expect(getSentryConfig({})).toBeNull();
  });

  it("should return config when DSN is provided", () => {
    const config = getSentryConfig({ sentryDsn: DSN });
    expect(config).not.toBeNull();
    expect(config?.dsn).toBe(DSN);
    expect(config?.environment).toBe("development");
    // Development environment uses 1.0 for complete observability
    expect(config?.tracesSampleRate).toBe(1.0);
    expect(config?.debug).toBe(true);
  });

  it("should use SENTRY_ENVIRONMENT when provided", () => {
    const config = getSentryConfig({
      sentryDsn: DSN,
      sentryEnvironment: "production",
      nodeEnv: "development",
    });
    expect(config?.environment).toBe("production");
    // Production environment uses 0.1 to manage quota
    expect(config?.tracesSampleRate).toBe(0.1);
    expect(config?.debug).toBe(false);
  });

  it("should fallback to NODE_ENV when SENTRY_ENVIRONMENT is not provided", () => {
    const config = getSentryConfig({ sentryDsn: DSN, nodeEnv: "staging" });
    expect(config?.environment).toBe("staging");
  });

  it("should include release when provided", () => {
    const config = getSentryConfig({ sentryDsn: DSN, sentryRelease: "v1.0.0" });
    expect(config?.release).toBe("v1.0.0");
  });

  it("should add global attributes to spans", () => {
    const config = getSentryConfig({
      sentryDsn: DSN,
      sentryEnvironment: "production",
      sentryRelease: "v1.0.0",
    });

    const span = config?.beforeSendSpan?.({
      span_id: "abc",
      trace_id: "def",
      start_timestamp: 0,
      data: { existing: "value" },
    });

    expect(span?.data).toEqual({
      existing: "value",
      runtime: "nodejs",
      "app.environment": "production",
      "app.version": "v1.0.0",
    });
  });
});
