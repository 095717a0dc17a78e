import {
  ALLOWED_SORTS,
  ALLOWED_STATUSES,
  type ExceptionDescriptor,
  type SearchOptions,
  type SearchOptionsInput,
  type SortOrder,
  type TopicStatus,
} from "./types/index.js";

export const DEFAULT_TOP = 5;

const isSortOrder = (value: string | undefined): value is SortOrder =>
  ALLOWED_SORTS.some((sort) => sort === value);

const isTopicStatus = (value: string | undefined): value is TopicStatus =>
  ALLOWED_STATUSES.some((status) => status === value);

/**
 * Maps loose caller input onto the known option sets. Unrecognized values
 * (including "relevance" and "any") become unset instead of raising.
 */
export function normalizeSearchOptions(
  input: SearchOptionsInput = {}
): SearchOptions {
  let top = DEFAULT_TOP;
  if (input.top !== undefined && Number.isFinite(input.top)) {
    top = Math.max(0, Math.floor(input.top));
  }

  return {
    criteria: input.criteria === "narrow" ? "narrow" : "broad",
    ...(isSortOrder(input.sort) && { sort: input.sort }),
    ...(isTopicStatus(input.status) && { status: input.status }),
    top,
  };
}

/**
 * Builds a Discourse search query for an exception.
 *
 * Nothing is escaped: the message goes into the query exactly as given, so
 * colons or quotes in it are read by the search syntax.
 *
 * @see https://docs.discourse.org/#tag/Search
 */
export function buildQuery(
  descriptor: ExceptionDescriptor,
  options: SearchOptionsInput = {}
): string {
  const { criteria, sort, status } = normalizeSearchOptions(options);

  let query = descriptor.typeName;

  if (criteria === "narrow") {
    query += ": " + descriptor.message;
  }

  if (sort) {
    query += ` order:${sort}`;
  }

  if (status) {
    query += ` status:${status}`;
  }

  return query;
}

/**
 * Describes any thrown value. Error subclasses are named after their
 * constructor, so `class QuotaError extends Error {}` reads as QuotaError.
 */
export function describeException(value: unknown): ExceptionDescriptor {
  if (value instanceof Error) {
    const constructorName = value.constructor.name;
    return {
      typeName:
        constructorName && constructorName !== "Error"
          ? constructorName
          : value.name || "Error",
      message: value.message,
    };
  }

  return { typeName: "Error", message: String(value) };
}
