/**
 * @fileoverview Tests for the crawl orchestrator.
 *
 * Uses an in-process fake renderer that serves canned outcomes per URL, so
 * ordering, budgets, failure handling and timeouts can be checked without
 * any network or jsdom.
 */

import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from "vitest";
import { loadConfig, type AppConfig } from "../../src/config.js";
import { crawl } from "../../src/crawler/bfs-crawler.js";
import type {
  PageRenderer,
  RenderOptions,
  RenderOutcome,
  RenderedPage,
} from "../../src/renderer/page-renderer.js";
import { ConfigError, RenderError } from "../../src/utils/errors.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

type FakePage = RenderOutcome | ((options: RenderOptions) => Promise<RenderOutcome>);

class FakeRenderer implements PageRenderer {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly pages: Record<string, FakePage>) {}

  async render(url: string, options: RenderOptions): Promise<RenderOutcome> {
    this.calls.push(url);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const page = this.pages[url];
      if (page === undefined) {
        return { status: "fetch_error", detail: `[FETCH_FAILED] HTTP 404 for ${url}` };
      }
      return typeof page === "function" ? await page(options) : page;
    } finally {
      this.inFlight -= 1;
    }
  }
}

function ok(url: string, text: string, links: string[] = [], title = ""): RenderedPage {
  return { status: "ok", finalUrl: url, title, text, links };
}

function after(ms: number, outcome: RenderOutcome): () => Promise<RenderOutcome> {
  return () => new Promise((resolve) => setTimeout(() => resolve(outcome), ms));
}

const ROOT = "https://example.com";

const testConfig: AppConfig = {
  ...loadConfig(),
  defaultMaxPages: 10,
  maxPagesLimit: 500,
  pageTimeout: 20000,
  runTimeout: 300000,
  maxConcurrent: 1,
  keywordCaseSensitive: false,
  verbose: false,
};

let errorLog: MockInstance<typeof console.error>;

beforeEach(() => {
  errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// End-to-end scenario
// ---------------------------------------------------------------------------

describe("crawl: end to end", () => {
  it("visits the in-scope pages in discovery order and tallies keywords", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "Welcome. Read our privacy policy and security notes.", [
        `${ROOT}/privacy`,
        `${ROOT}/security`,
        "https://other.org",
      ], "Home"),
      [`${ROOT}/privacy`]: ok(`${ROOT}/privacy`, "Privacy matters. Your privacy is protected.", [
        ROOT,
      ]),
      [`${ROOT}/security`]: ok(`${ROOT}/security`, "Security overview", [`${ROOT}/careers`]),
    });
    const ticks = [1000, 1250];
    const now = (): number => ticks.shift() ?? 1250;

    const report = await crawl(
      { startUrl: "https://example.com/", keywords: "privacy, security", maxPages: 3 },
      { renderer, config: testConfig, now },
    );

    expect(report.start_url).toBe(ROOT);
    expect(report.scope).toEqual({ protocol: "https:", hostname: "example.com" });
    expect(report.keywords).toEqual(["privacy", "security"]);
    expect(report.pages).toEqual([
      {
        url: ROOT,
        depth: 0,
        status: "ok",
        title: "Home",
        word_count: 8,
        matches: { privacy: 1, security: 1 },
        links_found: 3,
      },
      {
        url: `${ROOT}/privacy`,
        depth: 1,
        status: "ok",
        title: "",
        word_count: 6,
        matches: { privacy: 2, security: 0 },
        links_found: 1,
      },
      {
        url: `${ROOT}/security`,
        depth: 1,
        status: "ok",
        title: "",
        word_count: 2,
        matches: { privacy: 0, security: 1 },
        links_found: 1,
      },
    ]);
    expect(report.summary).toEqual({
      pages_attempted: 3,
      pages_visited: 3,
      pages_failed: 0,
      elapsed_ms: 250,
      stopped_reason: "page_budget",
    });
    expect(renderer.calls).not.toContain("https://other.org");
  });
});

// ---------------------------------------------------------------------------
// Budgets and dedup
// ---------------------------------------------------------------------------

describe("crawl: budgets and dedup", () => {
  it("never attempts more than maxPages URLs", async () => {
    const links = Array.from({ length: 20 }, (_, i) => `${ROOT}/p${i}`);
    const renderer = new FakeRenderer({ [ROOT]: ok(ROOT, "hub", links) });

    const report = await crawl(
      { startUrl: ROOT, keywords: "data", maxPages: 2 },
      { renderer, config: testConfig },
    );

    expect(renderer.calls).toEqual([ROOT, `${ROOT}/p0`]);
    expect(report.summary.pages_attempted).toBe(2);
    expect(report.summary.stopped_reason).toBe("page_budget");
  });

  it("reports an exhausted frontier when the site has exactly maxPages pages", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/a`]),
      [`${ROOT}/a`]: ok(`${ROOT}/a`, "a", [ROOT]),
    });

    const report = await crawl(
      { startUrl: ROOT, keywords: "data", maxPages: 2 },
      { renderer, config: testConfig },
    );

    expect(report.summary).toMatchObject({ pages_attempted: 2, stopped_reason: "frontier_exhausted" });
  });

  it("visits each page once whatever its spelling", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/a`, `${ROOT}/a/`, `${ROOT}/a#top`, `${ROOT}/`]),
      [`${ROOT}/a`]: ok(`${ROOT}/a`, "a", [ROOT, `${ROOT}/a`]),
    });

    const report = await crawl({ startUrl: ROOT, keywords: "data" }, { renderer, config: testConfig });

    expect(report.pages.map((page) => page.url)).toEqual([ROOT, `${ROOT}/a`]);
    expect(report.summary.stopped_reason).toBe("frontier_exhausted");
  });

  it("keeps to the start URL's scheme and hostname", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [
        "http://example.com/insecure",
        "https://blog.example.com/",
        "https://www.example.com/",
        `${ROOT}/inside`,
      ]),
      [`${ROOT}/inside`]: ok(`${ROOT}/inside`, "inside"),
    });

    const report = await crawl({ startUrl: ROOT, keywords: "data" }, { renderer, config: testConfig });

    expect(report.pages.map((page) => page.url)).toEqual([ROOT, `${ROOT}/inside`]);
  });

  it("applies include and exclude patterns to discovered links", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/docs/a`, `${ROOT}/docs/private`, `${ROOT}/blog/b`]),
      [`${ROOT}/docs/a`]: ok(`${ROOT}/docs/a`, "a"),
    });

    const report = await crawl(
      {
        startUrl: ROOT,
        keywords: "data",
        includePatterns: ["*/docs/*"],
        excludePatterns: ["*/private"],
      },
      { renderer, config: testConfig },
    );

    expect(renderer.calls).toEqual([ROOT, `${ROOT}/docs/a`]);
    expect(report.summary.pages_attempted).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("crawl: page failures", () => {
  it("records a timed-out page and keeps crawling", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/slow`, `${ROOT}/after`]),
      [`${ROOT}/slow`]: { status: "timeout", detail: "[TIMEOUT] took too long" },
      [`${ROOT}/after`]: ok(`${ROOT}/after`, "data here"),
    });

    const report = await crawl({ startUrl: ROOT, keywords: "data" }, { renderer, config: testConfig });

    expect(report.pages.map((page) => [page.url, page.status])).toEqual([
      [ROOT, "ok"],
      [`${ROOT}/slow`, "timeout"],
      [`${ROOT}/after`, "ok"],
    ]);
    expect(report.pages[1]).toEqual({
      url: `${ROOT}/slow`,
      depth: 1,
      status: "timeout",
      error_detail: "[TIMEOUT] took too long",
    });
    expect(report.summary).toMatchObject({
      pages_attempted: 3,
      pages_visited: 2,
      pages_failed: 1,
      stopped_reason: "frontier_exhausted",
    });
    expect(errorLog).toHaveBeenCalledWith(
      `[bfs-crawler] [2/10] ${ROOT}/slow -> timeout: [TIMEOUT] took too long`,
    );
  });

  it("classifies a renderer that throws", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: async () => {
        throw new RenderError("DOM exploded");
      },
    });

    const report = await crawl({ startUrl: ROOT, keywords: "data" }, { renderer, config: testConfig });

    expect(report.pages).toEqual([
      {
        url: ROOT,
        depth: 0,
        status: "render_error",
        error_detail: "[RENDER_FAILED] DOM exploded",
      },
    ]);
  });

  it("fails a page that redirected to another site", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/moved`]),
      [`${ROOT}/moved`]: ok("https://other.org/landing", "data data", [`${ROOT}/hidden`]),
    });

    const report = await crawl({ startUrl: ROOT, keywords: "data" }, { renderer, config: testConfig });

    expect(report.pages[1]).toEqual({
      url: `${ROOT}/moved`,
      depth: 1,
      status: "fetch_error",
      error_detail: "[FETCH_FAILED] Redirected off-site to https://other.org/landing",
    });
    expect(renderer.calls).toEqual([ROOT, `${ROOT}/moved`]);
  });

  it("reports a failing start page without following anything", async () => {
    const renderer = new FakeRenderer({});

    const report = await crawl({ startUrl: ROOT, keywords: "data" }, { renderer, config: testConfig });

    expect(report.pages).toEqual([
      { url: ROOT, depth: 0, status: "fetch_error", error_detail: `[FETCH_FAILED] HTTP 404 for ${ROOT}` },
    ]);
    expect(report.summary.stopped_reason).toBe("frontier_exhausted");
  });
});

// ---------------------------------------------------------------------------
// Run timeout
// ---------------------------------------------------------------------------

describe("crawl: run timeout", () => {
  it("aborts the in-flight page and returns what it has", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/hang`, `${ROOT}/never`]),
      [`${ROOT}/hang`]: () => new Promise<RenderOutcome>(() => undefined),
    });

    const report = await crawl(
      { startUrl: ROOT, keywords: "data", runTimeoutMs: 50 },
      { renderer, config: testConfig },
    );

    expect(report.pages).toEqual([
      expect.objectContaining({ url: ROOT, status: "ok" }),
      {
        url: `${ROOT}/hang`,
        depth: 1,
        status: "timeout",
        error_detail: "[RUN_TIMEOUT] Crawl exceeded its 50ms run budget",
      },
    ]);
    expect(report.summary.stopped_reason).toBe("run_timeout");
    expect(renderer.calls).not.toContain(`${ROOT}/never`);
  });
});

// ---------------------------------------------------------------------------
// Concurrency
// ---------------------------------------------------------------------------

describe("crawl: concurrency", () => {
  it("renders in parallel but reports in BFS order", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/a`, `${ROOT}/b`, `${ROOT}/c`]),
      [`${ROOT}/a`]: after(30, ok(`${ROOT}/a`, "a", [`${ROOT}/d`])),
      [`${ROOT}/b`]: after(0, ok(`${ROOT}/b`, "b", [`${ROOT}/e`])),
      [`${ROOT}/c`]: after(10, ok(`${ROOT}/c`, "c")),
      [`${ROOT}/d`]: ok(`${ROOT}/d`, "d"),
      [`${ROOT}/e`]: ok(`${ROOT}/e`, "e"),
    });

    const report = await crawl(
      { startUrl: ROOT, keywords: "data", concurrency: 3 },
      { renderer, config: testConfig },
    );

    expect(report.pages.map((page) => page.url)).toEqual([
      ROOT,
      `${ROOT}/a`,
      `${ROOT}/b`,
      `${ROOT}/c`,
      `${ROOT}/d`,
      `${ROOT}/e`,
    ]);
    expect(renderer.maxInFlight).toBe(3);
  });

  it("starts the next page as soon as a render slot frees up", async () => {
    const events: string[] = [];
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "root", [`${ROOT}/a`, `${ROOT}/b`, `${ROOT}/c`]),
      [`${ROOT}/a`]: async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        events.push("a done");
        return ok(`${ROOT}/a`, "a");
      },
      [`${ROOT}/b`]: ok(`${ROOT}/b`, "b"),
      [`${ROOT}/c`]: async () => {
        events.push("c started");
        return ok(`${ROOT}/c`, "c");
      },
    });

    const report = await crawl(
      { startUrl: ROOT, keywords: "data", concurrency: 2 },
      { renderer, config: testConfig },
    );

    expect(events).toEqual(["c started", "a done"]);
    expect(report.pages.map((page) => page.url)).toEqual([
      ROOT,
      `${ROOT}/a`,
      `${ROOT}/b`,
      `${ROOT}/c`,
    ]);
    expect(renderer.maxInFlight).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Validation and logging
// ---------------------------------------------------------------------------

describe("crawl: validation and logging", () => {
  it("throws ConfigError before rendering anything", async () => {
    const renderer = new FakeRenderer({});

    await expect(
      crawl({ startUrl: "not a url", keywords: "data" }, { renderer, config: testConfig }),
    ).rejects.toBeInstanceOf(ConfigError);
    await expect(
      crawl({ startUrl: ROOT, keywords: "" }, { renderer, config: testConfig }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(renderer.calls).toEqual([]);
  });

  it("rejects broken limits that come from the configuration", async () => {
    const renderer = new FakeRenderer({ [ROOT]: ok(ROOT, "root") });

    await expect(
      crawl(
        { startUrl: ROOT, keywords: "data" },
        { renderer, config: { ...testConfig, defaultMaxPages: 0 } },
      ),
    ).rejects.toThrow(new ConfigError("maxPages: Number must be greater than 0"));
    await expect(
      crawl(
        { startUrl: ROOT, keywords: "data" },
        { renderer, config: { ...testConfig, maxConcurrent: Number.NaN } },
      ),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(renderer.calls).toEqual([]);
  });

  it("logs link statistics per page when verbose", async () => {
    const renderer = new FakeRenderer({
      [ROOT]: ok(ROOT, "one two", [`${ROOT}/a`, "https://other.org", `${ROOT}/logo.png`]),
      [`${ROOT}/a`]: ok(`${ROOT}/a`, "a"),
    });

    await crawl(
      { startUrl: ROOT, keywords: "data", maxPages: 5 },
      { renderer, config: { ...testConfig, verbose: true } },
    );

    expect(errorLog).toHaveBeenCalledWith(
      `[bfs-crawler] [1/5] depth 0 ${ROOT}: 2 words; links kept 1, duplicate 0, offsite 1, excluded 1, over_budget 0`,
    );
  });
});
