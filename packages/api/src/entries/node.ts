import { serve } from "@hono/node-server";
import { getConnInfo } from "@hono/node-server/conninfo";
import type { Logger } from "@feedseeker/scout";
import { createHonoApp } from "../hono/app";
import { initSentry } from "../config/sentry";
import type { AppConfig } from "../config/env";
import { MinifluxClient } from "../services/reader-client";
import { RateLimiter } from "../services/rate-limiter";

export interface ServeOptions {
  config: AppConfig;
  logger: Logger;
  host: string;
  port: number;
  debug: boolean;
}

/**
 * Start the HTTP service and resolve once it has shut down (SIGINT/SIGTERM).
 */
export async function startServer(options: ServeOptions): Promise<void> {
  const { config, logger } = options;

  const sentry = initSentry(config, logger);

  const rateLimiter = new RateLimiter({ limit: 10, windowMs: 60_000 });
  const app = createHonoApp({
    config,
    client: MinifluxClient.fromConfig(config),
    logger,
    debug: options.debug,
    sentry,
    rateLimiter,
    remoteAddress: (c) => getConnInfo(c).remote.address,
  });

  const server = serve(
    { fetch: app.fetch, hostname: options.host, port: options.port },
    (info) => {
      logger.info(`🚀 Web server on http://${options.host}:${info.port}`);
      logger.info(`📊 Health: http://${options.host}:${info.port}/health`);
    }
  );

  await new Promise<void>((resolve, reject) => {
    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down server...`);
      rateLimiter.dispose();
      server.close((error) => {
        if (error) {
          logger.error("Server forced to shutdown", { error: error.message });
          reject(error);
          return;
        }
        logger.info("Server exited");
        resolve();
      });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    server.once("error", reject);
  });
}
