import { TtlCache, type Clock } from "./cache.js";
import { DEFAULT_MAX_PAGES, type ForumConfig } from "./config.js";
import {
  ForumClient,
  type SearchPage,
  type SearchPageSource,
} from "./forumClient.js";
import { buildQuery, normalizeSearchOptions } from "./queryBuilder.js";
import type {
  ExceptionDescriptor,
  ResultSet,
  SearchOptionsInput,
  SearchOutcome,
  TopicRecord,
} from "./types/index.js";

export interface TopicAggregatorOptions {
  maxPages?: number;
  cache?: TtlCache<ResultSet>;
}

/**
 * Keeps the first row seen for each topic id, in arrival order.
 */
export function dedupeById(rows: Iterable<TopicRecord>): TopicRecord[] {
  const seen = new Set<number>();
  const unique: TopicRecord[] = [];

  for (const row of rows) {
    if (seen.has(row.id)) {
      continue;
    }
    seen.add(row.id);
    unique.push(row);
  }

  return unique;
}

export function takeTop(rows: ResultSet, top: number): ResultSet {
  if (!Number.isFinite(top) || top <= 0) {
    return [];
  }
  return rows.slice(0, Math.floor(top));
}

/**
 * Walks every page of a search and merges the hits. Pages are requested one
 * after another, since a page only exists if the previous one had topics.
 */
export class TopicAggregator {
  private maxPages: number;
  private cache?: TtlCache<ResultSet>;

  constructor(
    private readonly source: SearchPageSource,
    options: TopicAggregatorOptions = {}
  ) {
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.cache = options.cache;
  }

  get baseUrl(): string {
    return this.source.baseUrl;
  }

  async fetchAllTopicPages(query: string): Promise<ResultSet> {
    if (!this.cache) {
      return this.collectPages(query);
    }
    const key = `${this.source.baseUrl}/search.json?${new URLSearchParams({
      q: query,
    })}`;
    return this.cache.getOrLoad(key, () => this.collectPages(query));
  }

  async searchTopics(query: string, top: number): Promise<ResultSet> {
    if (top <= 0) {
      return [];
    }
    return takeTop(await this.fetchAllTopicPages(query), top);
  }

  /**
   * Searches the forum for topics about an exception. Request failures are
   * reported as a `failed` outcome instead of being thrown.
   */
  async searchRelatedTopics(
    descriptor: ExceptionDescriptor,
    input: SearchOptionsInput = {}
  ): Promise<SearchOutcome> {
    const options = normalizeSearchOptions(input);
    const query = buildQuery(descriptor, options);

    let topics: ResultSet;
    try {
      topics = await this.searchTopics(query, options.top);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      console.error(`[forum-search] Search failed for "${query}":`, failure.message);
      return { kind: "failed", query, error: failure };
    }

    if (topics.length === 0) {
      return { kind: "empty", query };
    }
    return { kind: "found", query, topics };
  }

  private async collectPages(query: string): Promise<ResultSet> {
    const pages: TopicRecord[][] = [];

    for (let page = 0; ; page += 1) {
      if (page >= this.maxPages) {
        console.warn(
          `[forum-search] Stopped after ${this.maxPages} pages for "${query}"`
        );
        break;
      }

      const batch = await this.source.fetchSearchPage(query, page);
      if (batch === null) {
        break;
      }
      pages.push(batch);
    }

    return dedupeById(pages.flat());
  }
}

export interface TopicSearchDeps {
  fetchImpl?: typeof fetch;
  now?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires a client, both response caches and an aggregator from one config.
 */
export function createTopicSearch(
  config: ForumConfig,
  deps: TopicSearchDeps = {}
): TopicAggregator {
  const client = new ForumClient({
    baseUrl: config.baseUrl,
    cache: new TtlCache<SearchPage>(config.cacheTtlMs, deps.now),
    fetchImpl: deps.fetchImpl,
    now: deps.now,
    sleep: deps.sleep,
  });

  return new TopicAggregator(client, {
    maxPages: config.maxPages,
    cache: new TtlCache<ResultSet>(config.cacheTtlMs, deps.now),
  });
}
