export const ALLOWED_SORTS = ["latest", "likes", "views", "latest_topic"] as const;

export const ALLOWED_STATUSES = [
  "open",
  "closed",
  "public",
  "archived",
  "noreplies",
  "single_user",
  "solved",
  "unsolved",
] as const;

export type SearchCriteria = "broad" | "narrow";
export type SortOrder = (typeof ALLOWED_SORTS)[number];
export type TopicStatus = (typeof ALLOWED_STATUSES)[number];
export type ResponseFormat = "json" | "markdown";

export interface ExceptionDescriptor {
  readonly typeName: string;
  readonly message: string;
}

/**
 * Options as a caller may pass them. Values outside the known sets are
 * accepted here and dropped during normalization.
 */
export interface SearchOptionsInput {
  criteria?: string;
  sort?: string;
  status?: string;
  top?: number;
}

export interface SearchOptions {
  readonly criteria: SearchCriteria;
  readonly sort?: SortOrder;
  readonly status?: TopicStatus;
  readonly top: number;
}

export interface TopicRecord {
  readonly title: string;
  readonly created_at: Date;
  readonly last_posted_at: Date | null;
  readonly id: number;
  readonly posts_count: number;
  readonly reply_count: number;
  readonly highest_post_number: number;
  readonly category_id: number | null;
  readonly has_accepted_answer: boolean;
}

export type ResultSet = readonly TopicRecord[];

export type SearchOutcome =
  | { kind: "found"; query: string; topics: ResultSet }
  | { kind: "empty"; query: string }
  | { kind: "failed"; query: string; error: Error };

// Tool inputs
export interface SearchRelatedTopicsInput extends SearchOptionsInput {
  errorType: string;
  errorMessage?: string;
  responseFormat?: ResponseFormat;
  solvedBadge?: boolean;
}

export interface BuildSearchQueryInput extends SearchOptionsInput {
  errorType: string;
  errorMessage?: string;
}

export interface StackTraceInput extends SearchOptionsInput {
  stackTrace: string;
  responseFormat?: ResponseFormat;
}

/**
 * Error body returned by Discourse for rejected requests
 */
export interface ApiErrorResponse {
  errors?: string[];
  error_type?: string;
}
