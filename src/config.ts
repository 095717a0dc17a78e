import { z } from "zod";

export const DEFAULT_BASE_URL = "https://discuss.streamlit.io";
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000; // 1 hour
export const DEFAULT_MAX_PAGES = 50;

const envSchema = z.object({
  FORUM_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  FORUM_CACHE_TTL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_CACHE_TTL_MS),
  FORUM_MAX_PAGES: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),
});

export interface ForumConfig {
  baseUrl: string;
  cacheTtlMs: number;
  maxPages: number;
}

/**
 * Reads forum settings from the environment. Throws a ZodError when a
 * variable is set to something unusable.
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env
): ForumConfig {
  const env = envSchema.parse(source);
  return {
    baseUrl: env.FORUM_BASE_URL.replace(/\/+$/, ""),
    cacheTtlMs: env.FORUM_CACHE_TTL_MS,
    maxPages: env.FORUM_MAX_PAGES,
  };
}
