export {
  TopicAggregator,
  createTopicSearch,
  dedupeById,
  takeTop,
  type TopicAggregatorOptions,
  type TopicSearchDeps,
} from "./aggregator.js";
export { DEFAULT_MAX_ENTRIES, TtlCache, type Clock } from "./cache.js";
export {
  DEFAULT_BASE_URL,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_MAX_PAGES,
  loadConfig,
  type ForumConfig,
} from "./config.js";
export {
  ForumClient,
  ForumRequestError,
  type ForumClientOptions,
  type ForumRequestErrorKind,
  type SearchPage,
  type SearchPageSource,
} from "./forumClient.js";
export {
  buildErrorReport,
  withForumHelp,
  type ErrorReport,
  type GuardOptions,
  type GuardResult,
} from "./guard.js";
export {
  REPORT_PRESETS,
  SOLVED_BADGE,
  formatErrorReport,
  formatSearchResponse,
  formatTopicLinks,
  formatTraceback,
  topicUrl,
  type ReportPreset,
  type ReportPresetName,
} from "./presentation.js";
export {
  DEFAULT_TOP,
  buildQuery,
  describeException,
  normalizeSearchOptions,
} from "./queryBuilder.js";
export { ForumSearchServer, parseStackTraceHead } from "./server.js";
export * from "./types/index.js";
