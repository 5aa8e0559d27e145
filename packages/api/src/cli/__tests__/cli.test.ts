/**
 * CLI Tests
 *
 * Commands run with injected config, logger, client and runner, so nothing
 * touches the network or the process environment.
 */

import { describe, it, expect, vi, afterEach, beforeEach, type Mock } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  parseIntOption,
  parsePortOption,
  parsePositiveIntOption,
} from "../option-parsers";
import {
  parsePageUrl,
  runSubscribeCommand,
  type SubscribeCommandDeps,
} from "../commands/subscribe";
import { runServeCommand, type ServeCommandDeps } from "../commands/serve";
import { createProgram } from "../program";
import { ConfigError } from "@/config/env";
import type { runSubscription, RunOutcome } from "@/services/subscription-runner";
import { FakeFeedReaderClient, TEST_CONFIG, createMockLogger } from "@/test/mocks";

const OUTCOME: RunOutcome = {
  mode: "traversal",
  categoryId: 1,
  discovered: ["https://a.example.com/feed", "https://b.example.com/rss"],
  subscribed: 1,
  failed: 1,
};

describe("option parsers", () => {
  it("should parse integers", () => {
    expect(parseIntOption("42")).toBe(42);
    expect(parseIntOption(" 7 ")).toBe(7);
  });

  it.each(["abc", "4.5", "12px", ""])("should reject %j as an integer", (value) => {
    expect(() => parseIntOption(value)).toThrow(InvalidArgumentError);
  });

  it("should require positive integers", () => {
    expect(parsePositiveIntOption("1")).toBe(1);
    expect(() => parsePositiveIntOption("0")).toThrow(
      "Expected a positive integer, got: 0"
    );
  });

  it("should require ports in range", () => {
    expect(parsePortOption("8080")).toBe(8080);
    expect(() => parsePortOption("70000")).toThrow(
      "Expected a port between 1 and 65535, got: 70000"
    );
  });
});

describe("parsePageUrl", () => {
  it("should normalize absolute http(s) URLs", () => {
    expect(parsePageUrl(" https://News.Example.com ")).toBe("https://news.example.com/");
  });

  it.each(["news.example.com", "ftp://files.example.com", "https://"])(
    "should reject %j",
    (input) => {
      expect(parsePageUrl(input)).toBeNull();
    }
  );
});

describe("runSubscribeCommand", () => {
  let logger: ReturnType<typeof createMockLogger>;
  let client: FakeFeedReaderClient;
  let runSubscriptionFn: Mock<typeof runSubscription>;
  let deps: SubscribeCommandDeps;

  beforeEach(() => {
    logger = createMockLogger();
    client = new FakeFeedReaderClient();
    runSubscriptionFn = vi.fn<typeof runSubscription>(async () => OUTCOME);
    deps = {
      loadConfigFn: () => TEST_CONFIG,
      createLoggerFn: () => logger,
      createClientFn: () => client,
      createTelemetryFn: () => undefined,
      runSubscriptionFn,
    };
  });

  it("should run a subscription and print a summary", async () => {
    const result = await runSubscribeCommand(
      "https://news.example.com",
      { category: "News", clearCategoryFeeds: true },
      deps
    );

    expect(result).toEqual({ exitCode: 0 });
    expect(runSubscriptionFn).toHaveBeenCalledWith(
      {
        pageUrl: "https://news.example.com/",
        category: "News",
        debug: false,
        clearCategoryFeeds: true,
        singleUrlMode: undefined,
      },
      expect.objectContaining({ client, logger, telemetry: undefined })
    );
    expect(logger.info).toHaveBeenCalledWith(
      "✅ traversal mode: found 2 feed(s), subscribed 1, 1 failed"
    );
  });

  it("should let --concurrency override the configured limit", async () => {
    await runSubscribeCommand(
      "https://news.example.com",
      { category: "News", concurrency: 8 },
      deps
    );

    const [, runDeps] = runSubscriptionFn.mock.calls[0] ?? [];
    expect(runDeps?.config.scanConcurrency).toBe(8);
  });

  it("should reject a seed without a protocol", async () => {
    const result = await runSubscribeCommand("news.example.com", { category: "News" }, deps);

    expect(result).toEqual({ exitCode: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      "Invalid URL input: news.example.com (expected an absolute http:// or https:// URL)"
    );
    expect(runSubscriptionFn).not.toHaveBeenCalled();
  });

  it("should require a category", async () => {
    const result = await runSubscribeCommand("https://news.example.com", { category: "  " }, deps);

    expect(result).toEqual({ exitCode: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      "A category is required (-c, --category <name>)"
    );
  });

  it("should exit 1 when the configuration is invalid", async () => {
    const result = await runSubscribeCommand(
      "https://news.example.com",
      { category: "News" },
      {
        ...deps,
        loadConfigFn: () => {
          throw new ConfigError(["RSS_READER_API_KEY: RSS reader API key must be provided"]);
        },
      }
    );

    expect(result).toEqual({ exitCode: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      "Invalid configuration:\n  - RSS_READER_API_KEY: RSS reader API key must be provided"
    );
  });

  it("should exit 1 when the run fails", async () => {
    runSubscriptionFn.mockRejectedValueOnce(new Error("Category not found: Sports"));

    const result = await runSubscribeCommand(
      "https://news.example.com",
      { category: "Sports" },
      deps
    );

    expect(result).toEqual({ exitCode: 1 });
    expect(logger.error).toHaveBeenCalledWith("Category not found: Sports");
  });
});

describe("runServeCommand", () => {
  it("should start the server on the configured address", async () => {
    const startServerFn = vi.fn<ServeCommandDeps["startServerFn"]>(async () => {});
    const logger = createMockLogger();

    const result = await runServeCommand(
      {},
      { loadConfigFn: () => TEST_CONFIG, createLoggerFn: () => logger, startServerFn }
    );

    expect(result).toEqual({ exitCode: 0 });
    expect(startServerFn).toHaveBeenCalledWith({
      config: TEST_CONFIG,
      logger,
      host: "127.0.0.1",
      port: 8080,
      debug: false,
    });
  });

  it("should prefer flags over configuration", async () => {
    const startServerFn = vi.fn<ServeCommandDeps["startServerFn"]>(async () => {});

    await runServeCommand(
      { host: "0.0.0.0", port: 9090, debug: true },
      {
        loadConfigFn: () => TEST_CONFIG,
        createLoggerFn: () => createMockLogger(),
        startServerFn,
      }
    );

    expect(startServerFn).toHaveBeenCalledWith(
      expect.objectContaining({ host: "0.0.0.0", port: 9090, debug: true })
    );
  });

  it("should exit 1 when the server cannot start", async () => {
    const logger = createMockLogger();

    const result = await runServeCommand(
      {},
      {
        loadConfigFn: () => TEST_CONFIG,
        createLoggerFn: () => logger,
        startServerFn: async () => {
          throw new Error("listen EADDRINUSE: address already in use 127.0.0.1:8080");
        },
      }
    );

    expect(result).toEqual({ exitCode: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to start: listen EADDRINUSE: address already in use 127.0.0.1:8080"
    );
  });
});

describe("createProgram", () => {
  let runSubscriptionFn: Mock<typeof runSubscription>;
  let startServerFn: Mock<ServeCommandDeps["startServerFn"]>;

  function program() {
    return createProgram({
      subscribe: {
        loadConfigFn: () => TEST_CONFIG,
        createLoggerFn: () => createMockLogger(),
        createClientFn: () => new FakeFeedReaderClient(),
        createTelemetryFn: () => undefined,
        runSubscriptionFn,
      },
      serve: {
        loadConfigFn: () => TEST_CONFIG,
        createLoggerFn: () => createMockLogger(),
        startServerFn,
      },
    });
  }

  beforeEach(() => {
    runSubscriptionFn = vi.fn<typeof runSubscription>(async () => OUTCOME);
    startServerFn = vi.fn<ServeCommandDeps["startServerFn"]>(async () => {});
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it.each([
    [[], undefined],
    [["-s"], true],
    [["--single-url-mode"], true],
    [["--no-single-url-mode"], false],
  ])("should map %j to singleUrlMode %s", async (flags, expected) => {
    await program().parseAsync(
      ["https://news.example.com", "-c", "News", ...flags],
      { from: "user" }
    );

    expect(runSubscriptionFn.mock.calls[0]?.[0].singleUrlMode).toBe(expected);
    expect(process.exitCode).toBe(0);
  });

  it("should pass the remaining subscribe flags through", async () => {
    await program().parseAsync(
      ["https://news.example.com", "-c", "News", "-d", "-r", "--concurrency", "4"],
      { from: "user" }
    );

    const [request, runDeps] = runSubscriptionFn.mock.calls[0] ?? [];
    expect(request).toEqual({
      pageUrl: "https://news.example.com/",
      category: "News",
      debug: true,
      clearCategoryFeeds: true,
      singleUrlMode: undefined,
    });
    expect(runDeps?.config.scanConcurrency).toBe(4);
  });

  it("should set a failing exit code when subscribing fails", async () => {
    await program().parseAsync(["https://news.example.com"], { from: "user" });

    expect(runSubscriptionFn).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it("should route serve options to the serve command", async () => {
    await program().parseAsync(["serve", "-p", "9090", "-d"], { from: "user" });

    expect(startServerFn).toHaveBeenCalledWith(
      expect.objectContaining({ host: "127.0.0.1", port: 9090, debug: true })
    );
    expect(runSubscriptionFn).not.toHaveBeenCalled();
  });
});
