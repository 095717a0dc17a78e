import { z } from "zod";
import { TtlCache, type Clock } from "./cache.js";
import type { ApiErrorResponse, TopicRecord } from "./types/index.js";

// Rate limiting configuration
const MAX_REQUESTS_PER_WINDOW = 30; // Maximum requests per window
const RATE_LIMIT_WINDOW_MS = 60000; // Window size in milliseconds (1 minute)
const RETRY_AFTER_MS = 2000; // Time to wait before retrying after rate limit

export type ForumRequestErrorKind =
  | "transport"
  | "http_status"
  | "invalid_json"
  | "malformed_response";

export class ForumRequestError extends Error {
  readonly kind: ForumRequestErrorKind;
  readonly status?: number;

  constructor(
    kind: ForumRequestErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ForumRequestError";
    this.kind = kind;
    this.status = options.status;
  }
}

const timestamp = z.string().transform((value, ctx) => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid timestamp: ${value}`,
    });
    return z.NEVER;
  }
  return parsed;
});

// Unknown keys are stripped, which projects each row onto these fields.
const topicRowSchema = z.object({
  title: z.string(),
  created_at: timestamp,
  last_posted_at: timestamp.nullable().default(null),
  id: z.number().int(),
  posts_count: z.number().int(),
  reply_count: z.number().int(),
  highest_post_number: z.number().int(),
  category_id: z.number().int().nullable().default(null),
  has_accepted_answer: z.boolean().default(false),
});

const topicPageSchema = z.array(topicRowSchema);

/**
 * One page of search hits, or null once the body no longer carries `topics`.
 */
export type SearchPage = TopicRecord[] | null;

export interface SearchPageSource {
  readonly baseUrl: string;
  fetchSearchPage(query: string, page: number): Promise<SearchPage>;
}

export interface ForumClientOptions {
  baseUrl: string;
  cache?: TtlCache<SearchPage>;
  fetchImpl?: typeof fetch;
  now?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

const apiErrorSchema: z.ZodType<ApiErrorResponse> = z.object({
  errors: z.array(z.string()).optional(),
  error_type: z.string().optional(),
});

// Resolved per call so a replaced global fetch is picked up
const globalFetch: typeof fetch = (input, init) => fetch(input, init);

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Read-only client for a Discourse forum's search endpoint.
 */
export class ForumClient implements SearchPageSource {
  readonly baseUrl: string;
  private cache?: TtlCache<SearchPage>;
  private fetchImpl: typeof fetch;
  private now: Clock;
  private sleep: (ms: number) => Promise<void>;
  private requestTimestamps: number[] = []; // Track request timestamps for rate limiting

  constructor(options: ForumClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.cache = options.cache;
    this.fetchImpl = options.fetchImpl ?? globalFetch;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  searchUrl(query: string, page: number): string {
    const params = new URLSearchParams({ q: query, page: String(page) });
    return `${this.baseUrl}/search.json?${params}`;
  }

  async fetchSearchPage(query: string, page: number): Promise<SearchPage> {
    const url = this.searchUrl(query, page);
    if (!this.cache) {
      return this.requestSearchPage(url);
    }
    return this.cache.getOrLoad(url, () => this.requestSearchPage(url));
  }

  private async requestSearchPage(url: string): Promise<SearchPage> {
    const body = await this.withRateLimit(() => this.getJson(url));

    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw new ForumRequestError(
        "malformed_response",
        `Expected a JSON object from ${url}`
      );
    }

    if (!("topics" in body)) {
      return null;
    }

    const parsed = topicPageSchema.safeParse(body.topics);
    if (!parsed.success) {
      throw new ForumRequestError(
        "malformed_response",
        `Unexpected topic data from ${url}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join("; ")}`,
        { cause: parsed.error }
      );
    }

    return parsed.data;
  }

  private async getJson(url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      throw new ForumRequestError(
        "transport",
        `Failed to reach forum: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      );
    }

    if (!response.ok) {
      const detail = await this.readErrorDetail(response);
      throw new ForumRequestError(
        "http_status",
        `Forum API error: ${response.status}${detail ? ` ${detail}` : ""}`,
        { status: response.status }
      );
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new ForumRequestError(
        "invalid_json",
        `Forum returned a body that is not JSON (${url})`,
        { cause: error }
      );
    }
  }

  private async readErrorDetail(response: Response): Promise<string> {
    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return "";
    }
    const parsed = apiErrorSchema.safeParse(body);
    if (!parsed.success) {
      return "";
    }
    return parsed.data.errors?.join(", ") ?? parsed.data.error_type ?? "";
  }

  private checkRateLimit(): boolean {
    const now = this.now();
    // Remove timestamps outside the window
    this.requestTimestamps = this.requestTimestamps.filter(
      (timestamp) => now - timestamp < RATE_LIMIT_WINDOW_MS
    );

    if (this.requestTimestamps.length >= MAX_REQUESTS_PER_WINDOW) {
      return false;
    }

    this.requestTimestamps.push(now);
    return true;
  }

  private async withRateLimit<T>(
    fn: () => Promise<T>,
    retries = 3
  ): Promise<T> {
    if (!this.checkRateLimit()) {
      console.warn("[forum-client] Rate limit exceeded, waiting before retry...");
      await this.sleep(RETRY_AFTER_MS);
      return this.withRateLimit(fn, retries);
    }

    try {
      return await fn();
    } catch (error) {
      if (
        retries > 0 &&
        error instanceof ForumRequestError &&
        error.status === 429
      ) {
        console.warn("[forum-client] Rate limit hit (429), retrying after delay...");
        await this.sleep(RETRY_AFTER_MS);
        return this.withRateLimit(fn, retries - 1);
      }
      throw error;
    }
  }
}
