import { Command } from "commander";
import {
  runSubscribeCommand,
  type SubscribeCommandDeps,
  type SubscribeCommandOptions,
} from "./commands/subscribe";
import {
  runServeCommand,
  type ServeCommandDeps,
  type ServeCommandOptions,
} from "./commands/serve";
import {
  parsePortOption,
  parsePositiveIntOption,
} from "./option-parsers";

export const APP_VERSION = "1.0.0";

export interface ProgramDeps {
  subscribe?: Partial<SubscribeCommandDeps>;
  serve?: Partial<ServeCommandDeps>;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program
    .name("feedseeker")
    .description(
      "Find RSS/Atom feeds on a page (or on every site it links to) and subscribe to them"
    )
    .version(APP_VERSION)
    .enablePositionalOptions()
    .argument("<pageUrl>", "Page to start from (http:// or https://)")
    .option("-c, --category <name>", "Feed reader category for new feeds")
    .option("-d, --debug", "Debug logging; feeds are found but not subscribed")
    .option(
      "-r, --clear-category-feeds",
      "Delete every feed in the category before subscribing"
    )
    .option("-s, --single-url-mode", "Only check the page's own domain")
    .option(
      "--no-single-url-mode",
      "Check every domain linked from the page (overrides SINGLE_URL_MODE)"
    )
    .option(
      "--concurrency <n>",
      "Maximum domains probed at once (default: unbounded)",
      parsePositiveIntOption
    )
    .action(async (pageUrl: string, opts: SubscribeCommandOptions) => {
      const result = await runSubscribeCommand(pageUrl, opts, deps.subscribe);
      process.exitCode = result.exitCode;
    });

  program
    .command("serve")
    .description("Start the web server")
    .option("-H, --host <host>", "Host address to bind (default: WEB_HOST or 127.0.0.1)")
    .option("-p, --port <port>", "Port to listen on (default: WEB_PORT or 8080)", parsePortOption)
    .option("-d, --debug", "Debug logging; submissions are not subscribed")
    .action(async (opts: ServeCommandOptions) => {
      const result = await runServeCommand(opts, deps.serve);
      process.exitCode = result.exitCode;
    });

  return program;
}
