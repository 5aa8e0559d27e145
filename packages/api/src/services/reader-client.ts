/**
 * Feed Reader Client
 *
 * Minimal client for a Miniflux-compatible REST API: categories, the feeds
 * inside a category, subscribe and unsubscribe. Authenticates with the
 * `X-Auth-Token` header.
 */

import { z } from "zod";
import type { FetchLike } from "@feedseeker/scout";
import type { AppConfig } from "@/config/env";

const REQUEST_TIMEOUT_MS = 10000;

// ============================================================================
// TYPES
// ============================================================================

const categorySchema = z.object({
  id: z.number().int(),
  title: z.string(),
  user_id: z.number().int().optional(),
});

const feedSchema = z.object({
  id: z.number().int(),
  feed_url: z.string().optional(),
  title: z.string().optional(),
});

const createdFeedSchema = z.object({
  feed_id: z.number().int(),
});

const errorBodySchema = z.object({
  error_message: z.string(),
});

export type Category = z.infer<typeof categorySchema>;

export interface FeedReaderClient {
  listCategories(): Promise<Category[]>;
  /**
   * Find a category ID by title, ignoring case.
   *
   * @throws {CategoryNotFoundError} When no category has that title
   */
  resolveCategory(name: string): Promise<number>;
  listCategoryFeeds(categoryId: number): Promise<number[]>;
  deleteFeed(feedId: number): Promise<void>;
  /** Subscribe to a feed URL inside a category, returning the new feed ID */
  subscribe(categoryId: number, feedUrl: string): Promise<number>;
}

// ============================================================================
// ERRORS
// ============================================================================

export class FeedReaderError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message);
    this.name = "FeedReaderError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class CategoryNotFoundError extends Error {
  constructor(public readonly category: string) {
    super(`Category not found: ${category}`);
    this.name = "CategoryNotFoundError";
  }
}

// ============================================================================
// MINIFLUX IMPLEMENTATION
// ============================================================================

export interface MinifluxClientOptions {
  /** API root, e.g. "https://reader.example.com" (no trailing /v1) */
  endpoint: string;
  apiKey: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export class MinifluxClient implements FeedReaderClient {
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(private readonly options: MinifluxClientOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  static fromConfig(
    config: Pick<AppConfig, "readerEndpoint" | "readerApiKey">,
    fetchImpl?: FetchLike
  ): MinifluxClient {
    return new MinifluxClient({
      endpoint: config.readerEndpoint,
      apiKey: config.readerApiKey,
      fetch: fetchImpl,
    });
  }

  async listCategories(): Promise<Category[]> {
    const body = await this.request("GET", "/v1/categories");
    return this.parse(z.array(categorySchema), body, "categories");
  }

  async resolveCategory(name: string): Promise<number> {
    const wanted = name.toLowerCase();
    const categories = await this.listCategories();
    const match = categories.find(
      (category) => category.title.toLowerCase() === wanted
    );
    if (!match) {
      throw new CategoryNotFoundError(name);
    }
    return match.id;
  }

  async listCategoryFeeds(categoryId: number): Promise<number[]> {
    const body = await this.request("GET", `/v1/categories/${categoryId}/feeds`);
    const feeds = this.parse(z.array(feedSchema), body, "category feeds");
    return feeds.map((feed) => feed.id);
  }

  async deleteFeed(feedId: number): Promise<void> {
    await this.request("DELETE", `/v1/feeds/${feedId}`);
  }

  async subscribe(categoryId: number, feedUrl: string): Promise<number> {
    const body = await this.request("POST", "/v1/feeds", {
      feed_url: feedUrl,
      category_id: categoryId,
    });
    return this.parse(createdFeedSchema, body, "created feed").feed_id;
  }

  /**
   * Send one API request and return the decoded JSON body (undefined for
   * empty responses such as 204).
   */
  private async request(
    method: "GET" | "POST" | "DELETE",
    path: string,
    payload?: unknown
  ): Promise<unknown> {
    const url = `${this.endpoint}${path}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          "X-Auth-Token": this.options.apiKey,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new FeedReaderError(
        `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }

    const text = await response.text();
    const body = text ? safeJson(text) : undefined;

    if (!response.ok) {
      const detail = errorBodySchema.safeParse(body);
      throw new FeedReaderError(
        detail.success
          ? `${method} ${path} returned ${response.status}: ${detail.data.error_message}`
          : `${method} ${path} returned ${response.status}`,
        response.status
      );
    }

    return body;
  }

  private parse<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new FeedReaderError(
        `Unexpected ${what} response from feed reader`,
        undefined,
        { cause: result.error }
      );
    }
    return result.data;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
