import { describe, test, expect } from "@jest/globals";
import {
  DEFAULT_TOP,
  buildQuery,
  describeException,
  normalizeSearchOptions,
} from "../queryBuilder.js";

const zeroDivision = {
  typeName: "ZeroDivisionError",
  message: "division by zero",
};

describe("Query Builder", () => {
  test("should combine type, message, sort and status for narrow searches", () => {
    const query = buildQuery(zeroDivision, {
      criteria: "narrow",
      sort: "likes",
      status: "solved",
    });

    expect(query).toBe("ZeroDivisionError: division by zero order:likes status:solved");
  });

  test("should drop unrecognized sort values", () => {
    const query = buildQuery(
      { typeName: "TypeError", message: "x is not a function" },
      { criteria: "broad", sort: "bogus", status: "open" }
    );

    expect(query).toBe("TypeError status:open");
  });

  test("should use only the type name for broad searches", () => {
    expect(buildQuery(zeroDivision, { criteria: "broad" })).toBe("ZeroDivisionError");
    expect(buildQuery(zeroDivision)).toBe("ZeroDivisionError");
  });

  test("should treat unknown criteria as broad", () => {
    expect(buildQuery(zeroDivision, { criteria: "NARROW", sort: "views" })).toBe(
      "ZeroDivisionError order:views"
    );
  });

  test("should treat the relevance and any defaults as unset", () => {
    expect(
      buildQuery(zeroDivision, { sort: "relevance", status: "any" })
    ).toBe("ZeroDivisionError");
  });

  test("should put the sort clause before the status clause", () => {
    expect(
      buildQuery(zeroDivision, { status: "unsolved", sort: "latest_topic" })
    ).toBe("ZeroDivisionError order:latest_topic status:unsolved");
  });

  test("should interpolate the message without escaping", () => {
    const query = buildQuery(
      {
        typeName: "SyntaxError",
        message: `Unexpected token '"' in JSON at position 0 status:closed`,
      },
      { criteria: "narrow" }
    );

    expect(query).toBe(
      `SyntaxError: Unexpected token '"' in JSON at position 0 status:closed`
    );
  });
});

describe("normalizeSearchOptions", () => {
  test("should fill defaults", () => {
    expect(normalizeSearchOptions()).toEqual({ criteria: "broad", top: DEFAULT_TOP });
  });

  test("should keep recognized values", () => {
    expect(
      normalizeSearchOptions({
        criteria: "narrow",
        sort: "latest",
        status: "noreplies",
        top: 12,
      })
    ).toEqual({ criteria: "narrow", sort: "latest", status: "noreplies", top: 12 });
  });

  test("should floor top and clamp it at zero", () => {
    expect(normalizeSearchOptions({ top: 3.7 }).top).toBe(3);
    expect(normalizeSearchOptions({ top: -4 }).top).toBe(0);
    expect(normalizeSearchOptions({ top: Number.NaN }).top).toBe(DEFAULT_TOP);
  });
});

describe("describeException", () => {
  test("should name built-in errors after their class", () => {
    expect(describeException(new TypeError("bad input"))).toEqual({
      typeName: "TypeError",
      message: "bad input",
    });
  });

  test("should name subclasses after their constructor", () => {
    class QuotaExceededError extends Error {}

    expect(describeException(new QuotaExceededError("over quota"))).toEqual({
      typeName: "QuotaExceededError",
      message: "over quota",
    });
  });

  test("should fall back to the error name for plain errors", () => {
    const error = new Error("timed out");
    error.name = "TimeoutError";

    expect(describeException(error)).toEqual({
      typeName: "TimeoutError",
      message: "timed out",
    });
  });

  test("should stringify non-error values", () => {
    expect(describeException(42)).toEqual({ typeName: "Error", message: "42" });
  });
});
