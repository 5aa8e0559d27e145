/**
 * `feedseeker serve`: run the HTTP service.
 */

import { createConsoleLogger, type Logger } from "@feedseeker/scout";
import { loadConfig, type AppConfig } from "@/config/env";
import { startServer, type ServeOptions } from "@/entries/node";

export interface ServeCommandOptions {
  host?: string;
  port?: number;
  debug?: boolean;
}

export interface ServeCommandDeps {
  loadConfigFn: () => AppConfig;
  createLoggerFn: (debug: boolean) => Logger;
  startServerFn: (options: ServeOptions) => Promise<void>;
}

const defaultDeps: ServeCommandDeps = {
  loadConfigFn: loadConfig,
  createLoggerFn: (debug) =>
    createConsoleLogger({ level: debug ? "debug" : "info" }),
  startServerFn: startServer,
};

export async function runServeCommand(
  options: ServeCommandOptions,
  deps: Partial<ServeCommandDeps> = {}
): Promise<{ exitCode: number }> {
  const resolved = { ...defaultDeps, ...deps };
  const debug = options.debug === true;
  const logger = resolved.createLoggerFn(debug);

  try {
    const config = resolved.loadConfigFn();
    await resolved.startServerFn({
      config,
      logger,
      // Flags win over WEB_HOST / WEB_PORT
      host: options.host ?? config.webHost,
      port: options.port ?? config.webPort,
      debug,
    });
    return { exitCode: 0 };
  } catch (error) {
    logger.error(
      `Failed to start: ${error instanceof Error ? error.message : String(error)}`
    );
    return { exitCode: 1 };
  }
}
