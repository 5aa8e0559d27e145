import { randomBytes, timingSafeEqual } from "node:crypto";
import { Hono, type Context } from "hono";
import { bodyLimit } from "hono/body-limit";
import { getCookie, setCookie } from "hono/cookie";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { secureHeaders } from "hono/secure-headers";
import type { Logger } from "@feedseeker/scout";
import type { AppConfig } from "@/config/env";
import type { FeedReaderClient } from "@/services/reader-client";
import { RateLimiter, getClientIP } from "@/services/rate-limiter";
import {
  runSubscription,
  type SubscriptionDeps,
} from "@/services/subscription-runner";
import {
  submissionSchema,
  toFieldErrors,
  type FieldError,
} from "@/types/validators";
import { createSentryTelemetry, type SentryHub } from "@/utils/sentry-adapter";

export const CSRF_COOKIE = "csrf_token";
export const CSRF_HEADER = "X-CSRF-Token";

/** Served when the feed reader cannot be reached */
export const FALLBACK_CATEGORIES = [
  "General",
  "News",
  "Technology",
  "Science",
  "Business",
  "Entertainment",
  "Sports",
  "Health",
  "Politics",
  "Education",
  "Travel",
  "Food",
  "Lifestyle",
  "Gaming",
  "Finance",
].map((title) => ({ id: 0, title }));

export interface HonoAppConfig {
  config: AppConfig;
  client: FeedReaderClient;
  logger: Logger;
  /** Dry-run subscriptions and verbose request logging */
  debug: boolean;
  sentry?: SentryHub;
  /** Defaults to 10 POST requests per minute per client */
  rateLimiter?: RateLimiter;
  /** Socket address of the caller, when the runtime exposes one */
  remoteAddress?: (c: Context) => string | undefined;
  /** Transport overrides for discovery */
  discovery?: SubscriptionDeps["discovery"];
}

export interface SubmitResponse {
  success: boolean;
  message: string;
  count?: number;
  error?: string;
  validation_errors?: FieldError[];
}

function tokensMatch(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

async function readSubmission(c: Context): Promise<Record<string, unknown>> {
  const contentType = c.req.header("Content-Type") ?? "";
  try {
    if (contentType.includes("application/json")) {
      const body: unknown = await c.req.json();
      if (body === null || typeof body !== "object" || Array.isArray(body)) {
        throw new Error("JSON body must be an object");
      }
      return { ...body };
    }
    return { ...(await c.req.parseBody()) };
  } catch (error) {
    throw new HTTPException(400, {
      message: "Request too large or malformed",
      cause: error,
    });
  }
}

export function createHonoApp(options: HonoAppConfig) {
  const { config, client, logger } = options;
  const app = new Hono();
  const rateLimiter =
    options.rateLimiter ?? new RateLimiter({ limit: 10, windowMs: 60_000 });
  const telemetry =
    options.sentry && config.sentryDsn
      ? createSentryTelemetry(options.sentry)
      : undefined;

  const clientIP = (c: Context): string =>
    getClientIP((name) => c.req.header(name), options.remoteAddress?.(c));

  // Logger middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    logger.debug(`📥 ${c.req.method} ${c.req.path} from ${clientIP(c)}`);
    await next();
    logger.debug(
      `📤 ${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - start}ms`
    );
  });

  // Rate limiting (POST only)
  app.use("*", async (c, next): Promise<Response | void> => {
    if (c.req.method === "POST") {
      const ip = clientIP(c);
      if (!rateLimiter.isAllowed(ip)) {
        logger.warn(`Rate limit exceeded for IP: ${ip}`);
        return c.json(
          {
            success: false,
            error: "Rate limit exceeded",
            message: "Rate limit exceeded. Please try again later.",
          },
          429
        );
      }
    }
    await next();
  });

  app.use(
    "*",
    secureHeaders({
      xFrameOptions: "DENY",
      xXssProtection: "1; mode=block",
      referrerPolicy: "strict-origin-when-cross-origin",
      contentSecurityPolicy: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", "data:"],
        fontSrc: ["'self'"],
        connectSrc: ["'self'"],
        formAction: ["'self'"],
        frameAncestors: ["'none'"],
        baseUri: ["'self'"],
      },
      permissionsPolicy: {
        geolocation: [],
        microphone: [],
        camera: [],
      },
    })
  );

  // CORS middleware (must be before routes)
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", CSRF_HEADER],
    })
  );

  // Responses carry per-user tokens and run results
  app.use("*", async (c, next) => {
    await next();
    if (!c.res.headers.has("Cache-Control")) {
      c.res.headers.set("Cache-Control", "no-cache, no-store, must-revalidate");
      c.res.headers.set("Pragma", "no-cache");
      c.res.headers.set("Expires", "0");
    }
  });

  // Error handler
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(
        {
          success: false,
          error: err.status === 400 ? "Invalid form data" : "Request failed",
          message: err.message,
        },
        err.status
      );
    }

    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, {
      error: err.message,
    });
    telemetry?.captureException?.(err, {
      tags: { path: c.req.path },
    });

    return c.json(
      {
        success: false,
        error: "Internal server error",
        message: "An internal error occurred while processing your request.",
        ...(config.nodeEnv === "development" && { stack: err.stack }),
      },
      500
    );
  });

  app.notFound((c) =>
    c.json(
      { success: false, error: "Not Found", message: `No route for ${c.req.path}` },
      404
    )
  );

  // Health check
  app.get("/health", (c) => c.json({ status: "ok" }));

  // CSRF token (double-submit cookie)
  app.get("/csrf", (c) => {
    const token = randomBytes(32).toString("base64url");
    setCookie(c, CSRF_COOKIE, token, {
      path: "/",
      maxAge: 60 * 60,
      // The page script reads it back into the header
      httpOnly: false,
      secure: new URL(c.req.url).protocol === "https:",
      sameSite: "Lax",
    });
    return c.json({ csrf_token: token });
  });

  app.post(
    "/submit",
    bodyLimit({
      maxSize: 1024 * 1024,
      onError: (c) =>
        c.json(
          {
            success: false,
            error: "Invalid form data",
            message: "Request too large or malformed",
          },
          413
        ),
    }),
    async (c) => {
      const cookieToken = getCookie(c, CSRF_COOKIE);
      const headerToken = c.req.header(CSRF_HEADER);
      if (!cookieToken || !headerToken || !tokensMatch(cookieToken, headerToken)) {
        logger.warn(`Invalid CSRF token from IP: ${clientIP(c)}`);
        return c.json(
          {
            success: false,
            error: "Invalid security token",
            message: "Please refresh the page and try again",
          },
          403
        );
      }

      const parsed = submissionSchema.safeParse(await readSubmission(c));
      if (!parsed.success) {
        const errors = toFieldErrors(parsed.error);
        return c.json(
          {
            success: false,
            error: "Validation Error",
            message:
              errors.length === 1 && errors[0]
                ? errors[0].message
                : "Please correct the following errors:",
            validation_errors: errors,
          },
          400
        );
      }

      const submission = parsed.data;
      logger.debug("Processing submission", {
        url: submission.url,
        category: submission.category,
        single_url_mode: submission.single_url_mode,
      });

      try {
        const outcome = await runSubscription(
          {
            pageUrl: submission.url,
            category: submission.category,
            debug: options.debug,
            clearCategoryFeeds: false,
            singleUrlMode: submission.single_url_mode,
          },
          { config, client, logger, telemetry, discovery: options.discovery }
        );

        return c.json({
          success: true,
          message:
            outcome.subscribed > 0
              ? `Successfully found and subscribed to ${outcome.subscribed} feed(s).`
              : "Processing complete. No new RSS feeds were subscribed.",
          count: outcome.subscribed,
        });
      } catch (error) {
        logger.error("Error processing submission", {
          error: error instanceof Error ? error.message : String(error),
        });
        telemetry?.captureException?.(
          error instanceof Error ? error : new Error(String(error)),
          { tags: { operation: "submit" } }
        );
        return c.json(
          {
            success: false,
            error: "Processing Error",
            message: "An internal error occurred while processing your request.",
          },
          500
        );
      }
    }
  );

  app.get("/categories", async (c) => {
    try {
      const categories = await client.listCategories();
      return c.json({
        success: true,
        categories: categories.map(({ id, title }) => ({ id, title })),
      });
    } catch (error) {
      logger.warn("Could not fetch categories from feed reader", {
        error: error instanceof Error ? error.message : String(error),
      });
      return c.json({ success: true, categories: FALLBACK_CATEGORIES });
    }
  });

  return app;
}

export type App = ReturnType<typeof createHonoApp>;
