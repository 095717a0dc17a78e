import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { createTopicSearch, type TopicAggregator } from "./aggregator.js";
import { loadConfig } from "./config.js";
import { formatSearchResponse } from "./presentation.js";
import { buildQuery } from "./queryBuilder.js";
import {
  ALLOWED_SORTS,
  ALLOWED_STATUSES,
  type BuildSearchQueryInput,
  type ExceptionDescriptor,
  type SearchRelatedTopicsInput,
  type StackTraceInput,
} from "./types/index.js";

// Option values stay plain strings: unknown ones are dropped, not rejected.
const searchOptionsShape = {
  criteria: z.string().optional(),
  sort: z.string().optional(),
  status: z.string().optional(),
  top: z.number().int().optional(),
};

const responseFormatSchema = z.enum(["json", "markdown"]).optional();

const searchRelatedTopicsSchema: z.ZodType<SearchRelatedTopicsInput> = z.object({
  errorType: z.string().trim().min(1),
  errorMessage: z.string().optional(),
  responseFormat: responseFormatSchema,
  solvedBadge: z.boolean().optional(),
  ...searchOptionsShape,
});

const buildSearchQuerySchema: z.ZodType<BuildSearchQueryInput> = z.object({
  errorType: z.string().trim().min(1),
  errorMessage: z.string().optional(),
  ...searchOptionsShape,
});

const stackTraceSchema: z.ZodType<StackTraceInput> = z.object({
  stackTrace: z.string().min(1),
  responseFormat: responseFormatSchema,
  ...searchOptionsShape,
});

const searchOptionProperties = {
  criteria: {
    type: "string",
    enum: ["broad", "narrow"],
    description:
      "'broad' searches the error type only, 'narrow' adds the message",
  },
  sort: {
    type: "string",
    enum: [...ALLOWED_SORTS],
    description: "Sort order (omit for relevance)",
  },
  status: {
    type: "string",
    enum: [...ALLOWED_STATUSES],
    description: "Topic status filter (omit for any)",
  },
  top: {
    type: "number",
    description: "Maximum number of topics (default 5)",
  },
};

const responseFormatProperty = {
  type: "string",
  enum: ["json", "markdown"],
  description: "Response format",
};

function parseArgs<T>(schema: z.ZodType<T>, args: unknown): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
        .join("; ")
    );
  }
  return parsed.data;
}

/**
 * Reads `Type: message` off the first non-blank line of a stack trace.
 */
export function parseStackTraceHead(
  stackTrace: string
): ExceptionDescriptor | undefined {
  const head = stackTrace
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!head) {
    return undefined;
  }

  const match = /^([\w$.]+):\s*(.*)$/.exec(head);
  if (!match) {
    return { typeName: head, message: "" };
  }
  return { typeName: match[1], message: match[2] };
}

export interface ForumSearchServerOptions {
  search?: TopicAggregator;
}

export class ForumSearchServer {
  private server: Server;
  private search: TopicAggregator;

  constructor(options: ForumSearchServerOptions = {}) {
    this.server = new Server(
      {
        name: "forum-error-topics",
        version: "0.1.0",
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.search = options.search ?? createTopicSearch(loadConfig());

    this.setupTools();
    this.server.onerror = (error) => console.error("[MCP Error]", error);
  }

  private setupTools() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: "search_related_topics",
          description:
            "Search the community forum for topics related to an error",
          inputSchema: {
            type: "object",
            properties: {
              errorType: {
                type: "string",
                description: "Error class name, e.g. TypeError",
              },
              errorMessage: {
                type: "string",
                description: "Error message, used when criteria is 'narrow'",
              },
              ...searchOptionProperties,
              responseFormat: responseFormatProperty,
              solvedBadge: {
                type: "boolean",
                description: "Mark topics that have an accepted answer",
              },
            },
            required: ["errorType"],
          },
        },
        {
          name: "build_search_query",
          description:
            "Show the forum search query that would be used for an error",
          inputSchema: {
            type: "object",
            properties: {
              errorType: {
                type: "string",
                description: "Error class name, e.g. TypeError",
              },
              errorMessage: {
                type: "string",
                description: "Error message, used when criteria is 'narrow'",
              },
              ...searchOptionProperties,
            },
            required: ["errorType"],
          },
        },
        {
          name: "analyze_stack_trace",
          description:
            "Find forum topics for the error at the head of a stack trace",
          inputSchema: {
            type: "object",
            properties: {
              stackTrace: {
                type: "string",
                description: "Stack trace to analyze",
              },
              ...searchOptionProperties,
              responseFormat: responseFormatProperty,
            },
            required: ["stackTrace"],
          },
        },
      ],
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments)
    );
  }

  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    if (!args) {
      throw new McpError(ErrorCode.InvalidParams, "Arguments are required");
    }

    switch (name) {
      case "search_related_topics":
        return this.handleSearchRelatedTopics(
          parseArgs(searchRelatedTopicsSchema, args)
        );
      case "build_search_query":
        return this.handleBuildSearchQuery(
          parseArgs(buildSearchQuerySchema, args)
        );
      case "analyze_stack_trace":
        return this.handleAnalyzeStackTrace(parseArgs(stackTraceSchema, args));
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  }

  async handleSearchRelatedTopics(
    input: SearchRelatedTopicsInput
  ): Promise<CallToolResult> {
    const outcome = await this.search.searchRelatedTopics(
      { typeName: input.errorType, message: input.errorMessage ?? "" },
      input
    );

    return {
      content: [
        {
          type: "text",
          text: formatSearchResponse(outcome, input.responseFormat, {
            baseUrl: this.search.baseUrl,
            solvedBadge: input.solvedBadge,
          }),
        },
      ],
      ...(outcome.kind === "failed" && { isError: true }),
    };
  }

  handleBuildSearchQuery(input: BuildSearchQueryInput): CallToolResult {
    const query = buildQuery(
      { typeName: input.errorType, message: input.errorMessage ?? "" },
      input
    );
    return { content: [{ type: "text", text: query }] };
  }

  async handleAnalyzeStackTrace(
    input: StackTraceInput
  ): Promise<CallToolResult> {
    const descriptor = parseStackTraceHead(input.stackTrace);
    if (!descriptor) {
      throw new McpError(
        ErrorCode.InvalidParams,
        "stackTrace has no error line to search for"
      );
    }
    const outcome = await this.search.searchRelatedTopics(descriptor, {
      ...input,
      criteria: input.criteria ?? "narrow",
    });

    return {
      content: [
        {
          type: "text",
          text: formatSearchResponse(outcome, input.responseFormat, {
            baseUrl: this.search.baseUrl,
          }),
        },
      ],
      ...(outcome.kind === "failed" && { isError: true }),
    };
  }

  async run() {
    process.on("SIGINT", async () => {
      await this.server.close();
      process.exit(0);
    });

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error("Forum error topics MCP server running on stdio");
  }
}
