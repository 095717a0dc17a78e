import { describe, test, expect } from "@jest/globals";
import { ZodError } from "zod";
import {
  DEFAULT_BASE_URL,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_MAX_PAGES,
  loadConfig,
} from "../config.js";

describe("loadConfig", () => {
  test("should use defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      cacheTtlMs: DEFAULT_CACHE_TTL_MS,
      maxPages: DEFAULT_MAX_PAGES,
    });
  });

  test("should read and coerce overrides", () => {
    expect(
      loadConfig({
        FORUM_BASE_URL: "https://forum.test/",
        FORUM_CACHE_TTL_MS: "0",
        FORUM_MAX_PAGES: "3",
      })
    ).toEqual({ baseUrl: "https://forum.test", cacheTtlMs: 0, maxPages: 3 });
  });

  test("should reject unusable values", () => {
    expect(() => loadConfig({ FORUM_MAX_PAGES: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ FORUM_BASE_URL: "not a url" })).toThrow(ZodError);
  });
});
