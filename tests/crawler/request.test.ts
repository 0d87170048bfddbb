/**
 * @fileoverview Tests for crawl input validation and defaults.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, type AppConfig } from "../../src/config.js";
import { buildCrawlRequest, parseKeywords } from "../../src/crawler/request.js";
import { ConfigError } from "../../src/utils/errors.js";

const appConfig: AppConfig = {
  ...loadConfig(),
  defaultMaxPages: 10,
  maxPagesLimit: 50,
  pageTimeout: 20000,
  runTimeout: 300000,
  maxConcurrent: 1,
  keywordCaseSensitive: false,
};

// ---------------------------------------------------------------------------
// parseKeywords
// ---------------------------------------------------------------------------

describe("parseKeywords", () => {
  it("splits comma-separated strings, trims and drops empties", () => {
    expect(parseKeywords(" Privacy, security ,,", false)).toEqual(["privacy", "security"]);
  });

  it("deduplicates after case folding, keeping first position", () => {
    expect(parseKeywords(["Data", "privacy", "DATA"], false)).toEqual(["data", "privacy"]);
  });

  it("keeps case variants apart when case-sensitive", () => {
    expect(parseKeywords(["Data", "data", "Data"], true)).toEqual(["Data", "data"]);
  });
});

// ---------------------------------------------------------------------------
// buildCrawlRequest: defaults
// ---------------------------------------------------------------------------

describe("buildCrawlRequest: defaults", () => {
  it("canonicalizes the start URL and derives the scope", () => {
    const request = buildCrawlRequest(
      { startUrl: "HTTPS://Example.com/", keywords: "privacy, security" },
      appConfig,
    );
    expect(request.startUrl).toBe("https://example.com");
    expect(request.scope).toEqual({ protocol: "https:", hostname: "example.com" });
    expect(request.keywords).toEqual(["privacy", "security"]);
  });

  it("fills limits from the configuration", () => {
    const request = buildCrawlRequest(
      { startUrl: "https://example.com", keywords: ["data"] },
      appConfig,
    );
    expect(request.maxPages).toBe(10);
    expect(request.pageTimeoutMs).toBe(20000);
    expect(request.runTimeoutMs).toBe(300000);
    expect(request.concurrency).toBe(1);
    expect(request.caseSensitive).toBe(false);
    expect(request.includePatterns).toEqual([]);
    expect(request.excludePatterns).toEqual([]);
  });

  it("caps maxPages at the configured limit", () => {
    const request = buildCrawlRequest(
      { startUrl: "https://example.com", keywords: "data", maxPages: 1000 },
      appConfig,
    );
    expect(request.maxPages).toBe(50);
  });

  it("returns a frozen object", () => {
    const request = buildCrawlRequest({ startUrl: "https://example.com", keywords: "data" }, appConfig);
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.keywords)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// buildCrawlRequest: rejection
// ---------------------------------------------------------------------------

describe("buildCrawlRequest: invalid input", () => {
  it("rejects a relative start URL", () => {
    expect(() => buildCrawlRequest({ startUrl: "/about", keywords: "data" }, appConfig)).toThrow(
      new ConfigError("startUrl: must be an absolute URL"),
    );
  });

  it("rejects non-http schemes", () => {
    expect(() =>
      buildCrawlRequest({ startUrl: "ftp://example.com/", keywords: "data" }, appConfig),
    ).toThrow("startUrl: must use http or https");
  });

  it("rejects an empty keyword set", () => {
    expect(() =>
      buildCrawlRequest({ startUrl: "https://example.com", keywords: " , ," }, appConfig),
    ).toThrow(ConfigError);
    expect(() =>
      buildCrawlRequest({ startUrl: "https://example.com", keywords: [] }, appConfig),
    ).toThrow("keywords: at least one non-empty keyword is required");
  });

  it("rejects non-positive limits", () => {
    for (const input of [
      { maxPages: 0 },
      { maxPages: -3 },
      { pageTimeoutMs: 0 },
      { runTimeoutMs: -1 },
      { concurrency: 0 },
      { maxPages: 2.5 },
    ]) {
      expect(() =>
        buildCrawlRequest({ startUrl: "https://example.com", keywords: "data", ...input }, appConfig),
      ).toThrow(ConfigError);
    }
  });

  it("names the offending field", () => {
    expect(() =>
      buildCrawlRequest({ startUrl: "https://example.com", keywords: "data", maxPages: 0 }, appConfig),
    ).toThrow(/^maxPages: /);
  });

  it("rejects non-positive limits that come from the configuration", () => {
    expect(() =>
      buildCrawlRequest(
        { startUrl: "https://example.com", keywords: "data" },
        { ...appConfig, defaultMaxPages: 0 },
      ),
    ).toThrow(/^maxPages: /);
  });

  it("rejects unparsable limits from the configuration", () => {
    const build = () =>
      buildCrawlRequest(
        { startUrl: "https://example.com", keywords: "data" },
        { ...appConfig, maxConcurrent: Number.NaN },
      );
    expect(build).toThrow(ConfigError);
    expect(build).toThrow(/^concurrency: /);
  });

  it("rejects a broken page limit", () => {
    expect(() =>
      buildCrawlRequest(
        { startUrl: "https://example.com", keywords: "data" },
        { ...appConfig, maxPagesLimit: Number.NaN },
      ),
    ).toThrow(/^maxPagesLimit: /);
  });
});
