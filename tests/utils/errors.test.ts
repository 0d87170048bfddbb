/**
 * @fileoverview Tests for the error hierarchy, page status classification
 * and error formatting.
 */

import { describe, it, expect } from "vitest";
import {
  CrawlerError,
  ConfigError,
  ContentTypeError,
  FetchError,
  RenderError,
  ResponseTooLargeError,
  RunTimeoutError,
  TimeoutError,
  formatErrorForMcp,
  pageStatusFor,
} from "../../src/utils/errors.js";

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

describe("CrawlerError subclasses", () => {
  it("carry their codes and class names", () => {
    const cases: Array<[CrawlerError, string, string]> = [
      [new ConfigError("x"), "INVALID_CONFIG", "ConfigError"],
      [new FetchError("x"), "FETCH_FAILED", "FetchError"],
      [new ContentTypeError("x"), "CONTENT_TYPE_REJECTED", "ContentTypeError"],
      [new ResponseTooLargeError("x"), "RESPONSE_TOO_LARGE", "ResponseTooLargeError"],
      [new TimeoutError("x"), "TIMEOUT", "TimeoutError"],
      [new RunTimeoutError("x"), "RUN_TIMEOUT", "RunTimeoutError"],
      [new RenderError("x"), "RENDER_FAILED", "RenderError"],
    ];
    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(CrawlerError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
    }
  });

  it("keeps the HTTP status on FetchError", () => {
    expect(new FetchError("gone", 404).statusCode).toBe(404);
    expect(new FetchError("refused").statusCode).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// pageStatusFor
// ---------------------------------------------------------------------------

describe("pageStatusFor", () => {
  it("maps timeouts to timeout", () => {
    expect(pageStatusFor(new TimeoutError("slow"))).toBe("timeout");
    expect(pageStatusFor(new RunTimeoutError("budget"))).toBe("timeout");
  });

  it("maps retrieval problems to fetch_error", () => {
    expect(pageStatusFor(new FetchError("HTTP 500", 500))).toBe("fetch_error");
    expect(pageStatusFor(new ContentTypeError("pdf"))).toBe("fetch_error");
    expect(pageStatusFor(new ResponseTooLargeError("big"))).toBe("fetch_error");
  });

  it("maps renderer failures and unknown errors to render_error", () => {
    expect(pageStatusFor(new RenderError("boom"))).toBe("render_error");
    expect(pageStatusFor(new TypeError("x is undefined"))).toBe("render_error");
    expect(pageStatusFor("string thrown")).toBe("render_error");
  });
});

// ---------------------------------------------------------------------------
// formatErrorForMcp
// ---------------------------------------------------------------------------

describe("formatErrorForMcp", () => {
  it("prefixes crawler errors with their code", () => {
    expect(formatErrorForMcp(new FetchError("Not Found", 404))).toBe(
      "[FETCH_FAILED] Not Found",
    );
  });

  it("uses the message of plain errors", () => {
    expect(formatErrorForMcp(new Error("plain"))).toBe("plain");
  });

  it("stringifies anything else", () => {
    expect(formatErrorForMcp("something went wrong")).toBe("something went wrong");
    expect(formatErrorForMcp(42)).toBe("42");
  });
});
