import type { SearchPage, SearchPageSource } from "../../forumClient.js";
import type { TopicRecord } from "../../types/index.js";

export const BASE_URL = "https://forum.test";

// Raw row as the search endpoint returns it, including fields we drop
export const topicRow = (id: number, overrides: Record<string, unknown> = {}) => ({
  id,
  title: `Topic ${id}`,
  fancy_title: `Topic ${id}`,
  slug: `topic-${id}`,
  created_at: "2023-03-01T10:00:00.000Z",
  last_posted_at: "2023-03-02T12:30:00.000Z",
  posts_count: 3,
  reply_count: 2,
  highest_post_number: 3,
  category_id: 7,
  has_accepted_answer: false,
  ...overrides,
});

export const topic = (
  id: number,
  overrides: Partial<TopicRecord> = {}
): TopicRecord => ({
  title: `Topic ${id}`,
  created_at: new Date("2023-03-01T10:00:00.000Z"),
  last_posted_at: new Date("2023-03-02T12:30:00.000Z"),
  id,
  posts_count: 3,
  reply_count: 2,
  highest_post_number: 3,
  category_id: 7,
  has_accepted_answer: false,
  ...overrides,
});

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

/**
 * Serves `pages[n]` as page n; any page past the end has no `topics` key.
 */
export const pagedBodies =
  (pages: unknown[][]) =>
  async (input: string | URL | Request): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input);
    const page = Number(url.searchParams.get("page"));
    return page < pages.length
      ? jsonResponse({ topics: pages[page] })
      : jsonResponse({ posts: [], grouped_search_result: {} });
  };

export class FakePageSource implements SearchPageSource {
  readonly baseUrl = BASE_URL;
  readonly calls: Array<{ query: string; page: number }> = [];

  constructor(
    private readonly pageFor: (page: number) => SearchPage | Promise<SearchPage>
  ) {}

  static of(pages: TopicRecord[][]): FakePageSource {
    return new FakePageSource((page) => pages[page] ?? null);
  }

  async fetchSearchPage(query: string, page: number): Promise<SearchPage> {
    this.calls.push({ query, page });
    return this.pageFor(page);
  }
}
