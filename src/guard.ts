import type { TopicAggregator } from "./aggregator.js";
import {
  REPORT_PRESETS,
  formatErrorReport,
  formatTraceback,
  type ReportPreset,
} from "./presentation.js";
import { describeException } from "./queryBuilder.js";
import type {
  ExceptionDescriptor,
  SearchOptionsInput,
  SearchOutcome,
} from "./types/index.js";

export interface ErrorReport {
  error: unknown;
  descriptor: ExceptionDescriptor;
  outcome: SearchOutcome;
  traceback: string;
  markdown: string;
}

export type GuardResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown; report: ErrorReport };

export interface GuardOptions extends SearchOptionsInput {
  search: TopicAggregator;
  /** What happens to the caught error once `onError` has run. */
  onCaught: "rethrow" | "suppress";
  onError: (report: ErrorReport) => void | Promise<void>;
  preset?: ReportPreset;
  /** Frames dropped from the top of the stack before rendering. */
  skipFrames?: number;
}

/**
 * Runs `operation` and, if it throws, looks up related forum topics and hands
 * the rendered report to `onError`. Only the operation's own error leaves
 * this function; a throwing `onError` is logged.
 *
 * @example
 * const result = await withForumHelp(() => loadDataset(path), {
 *   search,
 *   onCaught: "suppress",
 *   onError: (report) => console.error(report.markdown),
 * });
 */
export async function withForumHelp<T>(
  operation: () => T | Promise<T>,
  options: GuardOptions
): Promise<GuardResult<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    const report = await buildErrorReport(error, options);
    try {
      await options.onError(report);
    } catch (callbackError) {
      console.error(
        "[forum-guard] onError callback failed:",
        callbackError instanceof Error ? callbackError.message : callbackError
      );
    }

    if (options.onCaught === "rethrow") {
      throw error;
    }
    return { ok: false, error, report };
  }
}

export async function buildErrorReport(
  error: unknown,
  {
    search,
    preset = REPORT_PRESETS.forum,
    skipFrames,
    criteria,
    sort,
    status,
    top,
  }: Omit<GuardOptions, "onCaught" | "onError">
): Promise<ErrorReport> {
  const descriptor = describeException(error);
  const outcome = await search.searchRelatedTopics(descriptor, {
    criteria,
    sort,
    status,
    top,
  });
  const traceback = formatTraceback(
    error instanceof Error ? error.stack : undefined,
    { skipFrames }
  );

  return {
    error,
    descriptor,
    outcome,
    traceback,
    markdown: formatErrorReport(descriptor, outcome, traceback, {
      baseUrl: search.baseUrl,
      preset,
    }),
  };
}
