import type {
  ExceptionDescriptor,
  ResponseFormat,
  ResultSet,
  SearchOutcome,
} from "./types/index.js";

export const SOLVED_BADGE = " [✅ Solved]";

export interface ReportPreset {
  linksHeading: string;
  tracebackHeading: string;
  solvedBadge: boolean;
  /** Closing hint, shown whatever the search returned. */
  footer?: string;
}

export const REPORT_PRESETS = {
  discourse: {
    linksHeading: "Related Discourse Topics",
    tracebackHeading: "Traceback",
    solvedBadge: false,
  },
  forum: {
    linksHeading: "Related forum topics",
    tracebackHeading: "Traceback",
    solvedBadge: true,
    footer:
      "Don't see a relevant topic? Try changing the criteria to `narrow` or tweaking the other parameters.",
  },
} satisfies Record<string, ReportPreset>;

export type ReportPresetName = keyof typeof REPORT_PRESETS;

export interface LinkOptions {
  baseUrl: string;
  solvedBadge?: boolean;
}

export function topicUrl(baseUrl: string, topicId: number): string {
  return `${baseUrl.replace(/\/+$/, "")}/t/${topicId}`;
}

export function formatTopicLinks(
  topics: ResultSet,
  { baseUrl, solvedBadge = false }: LinkOptions
): string {
  return topics
    .map((topic) => {
      let line = `- [${topic.title}](${topicUrl(baseUrl, topic.id)})`;
      if (solvedBadge && topic.has_accepted_answer) {
        line += SOLVED_BADGE;
      }
      return line;
    })
    .join("\n");
}

/**
 * Turns an `Error.stack` into frame lines without the message header and
 * without leading indentation, so it reads cleanly inside a code fence.
 */
export function formatTraceback(
  stack: string | undefined,
  { skipFrames = 0 }: { skipFrames?: number } = {}
): string {
  if (!stack) {
    return "";
  }

  return stack
    .split("\n")
    .filter((line) => /^\s+at\s/.test(line))
    .slice(Math.max(0, skipFrames))
    .map((line) => line.trimStart())
    .join("\n");
}

function describeMissingTopics(outcome: SearchOutcome): string {
  if (outcome.kind === "failed") {
    return `No topics found: the forum search failed (${outcome.error.message}). Try setting criteria to 'broad'.`;
  }
  return "No topics found. Try setting criteria to 'broad'.";
}

export interface ErrorReportOptions {
  baseUrl: string;
  preset?: ReportPreset;
}

/**
 * Renders the Markdown shown in place of a failed block: the error line, the
 * related topics, then the stack frames.
 */
export function formatErrorReport(
  descriptor: ExceptionDescriptor,
  outcome: SearchOutcome,
  traceback: string,
  { baseUrl, preset = REPORT_PRESETS.forum }: ErrorReportOptions
): string {
  const sections = [`**${descriptor.typeName}**: ${descriptor.message}`];

  if (outcome.kind === "found") {
    const links = formatTopicLinks(outcome.topics, {
      baseUrl,
      solvedBadge: preset.solvedBadge,
    });
    sections.push(`${preset.linksHeading}:\n\n${links}`);
  } else {
    sections.push(`${preset.linksHeading}:\n\n${describeMissingTopics(outcome)}`);
  }

  if (traceback) {
    sections.push(`${preset.tracebackHeading}:\n\n\`\`\`\n${traceback}\n\`\`\``);
  }

  if (preset.footer) {
    sections.push(preset.footer);
  }

  return sections.join("\n\n");
}

export function formatSearchResponse(
  outcome: SearchOutcome,
  format: ResponseFormat = "json",
  { baseUrl, solvedBadge = false }: LinkOptions
): string {
  if (format === "json") {
    const topics =
      outcome.kind === "found"
        ? outcome.topics.map((topic) => ({
            ...topic,
            url: topicUrl(baseUrl, topic.id),
          }))
        : [];
    return JSON.stringify(
      {
        query: outcome.query,
        status: outcome.kind,
        ...(outcome.kind === "failed" && { error: outcome.error.message }),
        topics,
      },
      null,
      2
    );
  }

  switch (outcome.kind) {
    case "found":
      return `## Related forum topics\n\n${formatTopicLinks(outcome.topics, {
        baseUrl,
        solvedBadge,
      })}`;
    case "empty":
      return `No topics found for \`${outcome.query}\`.`;
    case "failed":
      return `Search failed for \`${outcome.query}\`: ${outcome.error.message}`;
  }
}
