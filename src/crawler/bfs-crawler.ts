/**
 * @module crawler/bfs-crawler
 * @fileoverview Breadth-first crawl orchestrator with page and wall-clock
 * budgets.
 *
 * ## Algorithm Overview
 * ```
 *   Start URL
 *      |
 *      v
 *   [Frontier] --next()--> [p-queue, `concurrency` renders at a time]
 *      ^                                        |
 *      |                          results, in dequeue order
 *      |                                        v
 *      +---- enqueue(links, depth + 1) <-- ok? -- [Match keywords]
 *                                               |
 *                                         [PageResult]
 * ```
 *
 * The loop ends when the frontier is empty, `maxPages` URLs have been
 * attempted, or the run timeout fires. The report always covers every page
 * attempted up to that point; a run timeout aborts in-flight renders and
 * records them as `timeout`.
 *
 * ## Ordering
 * Every pending frontier entry is handed to the pool as soon as it is
 * known; the pool runs up to `concurrency` of them at once. Results are
 * consumed in the order the entries left the frontier, so links are
 * enqueued in the same order a sequential crawl would enqueue them, and the
 * report lists pages in BFS order whatever the concurrency.
 *
 * ## Stop reason
 * `page_budget` means the budget turned away a new in-scope link;
 * a site with exactly `maxPages` reachable pages ends `frontier_exhausted`.
 *
 * ## Redirects
 * A page whose final URL is outside the crawl scope is recorded as a
 * `fetch_error`: its words belong to another site.
 *
 * ## Error Handling
 * Input problems raise {@link ConfigError} before any page is fetched.
 * After that, nothing throws: a failing page becomes a PageResult with a
 * failure status, is logged to stderr, and the crawl moves on.
 *
 * ## Architecture Position
 * ```
 *   tools/audit-site  -->  bfs-crawler  (this file)
 *                              |
 *                              +-->  crawler/request    (input validation)
 *                              +-->  crawler/frontier   (queue, scope, budget)
 *                              +-->  renderer           (fetch + scripts + text)
 *                              +-->  crawler/text-matcher
 * ```
 *
 * @example
 * ```ts
 * const report = await crawl({
 *   startUrl: "https://example.com",
 *   keywords: "privacy, security",
 *   maxPages: 3,
 * });
 * report.summary;
 * // { pages_attempted: 3, pages_visited: 3, pages_failed: 0,
 * //   elapsed_ms: 2140, stopped_reason: "page_budget" }
 * ```
 */

import PQueue from "p-queue";
import { config, type AppConfig } from "../config.js";
import { JsdomRenderer } from "../renderer/jsdom-renderer.js";
import type { PageRenderer, RenderOutcome } from "../renderer/page-renderer.js";
import {
  FetchError,
  RunTimeoutError,
  formatErrorForMcp,
  pageStatusFor,
  type FailedPageStatus,
} from "../utils/errors.js";
import { isInScope, type CrawlScope } from "../utils/url.js";
import { Frontier, type EnqueueOutcome, type FrontierEntry } from "./frontier.js";
import { buildCrawlRequest, type CrawlInput, type CrawlRequest } from "./request.js";
import { matchCounts, wordCount, type KeywordMatches } from "./text-matcher.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

interface PageResultBase {
  /** Canonical URL as it left the frontier (before any redirect). */
  url: string;

  /** Link distance from the start URL. */
  depth: number;
}

/**
 * A page that rendered.
 */
export interface OkPageResult extends PageResultBase {
  status: "ok";
  title: string;
  word_count: number;
  /** One entry per request keyword, zeros included. */
  matches: KeywordMatches;
  /** Distinct links found on the page, before scope filtering. */
  links_found: number;
}

/**
 * A page that did not render.
 */
export interface FailedPageResult extends PageResultBase {
  status: FailedPageStatus;
  /** `"[CODE] message"`. */
  error_detail: string;
}

export type PageResult = OkPageResult | FailedPageResult;

export type StoppedReason = "frontier_exhausted" | "page_budget" | "run_timeout";

export interface CrawlSummary {
  pages_attempted: number;
  /** Pages with status `ok`. */
  pages_visited: number;
  pages_failed: number;
  elapsed_ms: number;
  stopped_reason: StoppedReason;
}

export interface CrawlReport {
  start_url: string;
  scope: CrawlScope;
  keywords: string[];
  /** In attempt (BFS) order. */
  pages: PageResult[];
  summary: CrawlSummary;
}

/**
 * Collaborators of {@link crawl}; all optional.
 */
export interface CrawlDependencies {
  /** @default new JsdomRenderer() */
  renderer?: PageRenderer;
  /** @default config */
  config?: AppConfig;
  /** Millisecond clock for `elapsed_ms`. @default Date.now */
  now?: () => number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Internal Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

interface Attempt {
  entry: FrontierEntry;
  outcome: RenderOutcome;
}

/**
 * Settle with `promise`, or reject with `signal.reason` once `signal`
 * aborts, whichever comes first.
 *
 * @internal
 */
function withAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}

/**
 * Render one entry. Never rejects: a throwing renderer is classified the
 * same way as a failure it reported itself.
 *
 * @internal
 */
async function attempt(
  renderer: PageRenderer,
  entry: FrontierEntry,
  request: CrawlRequest,
  signal: AbortSignal,
): Promise<RenderOutcome> {
  try {
    return await withAbort(
      renderer.render(entry.url, { timeoutMs: request.pageTimeoutMs, signal }),
      signal,
    );
  } catch (error) {
    return { status: pageStatusFor(error), detail: formatErrorForMcp(error) };
  }
}

/**
 * Turn a page that redirected out of scope into a `fetch_error`.
 *
 * @internal
 */
function confineToScope(outcome: RenderOutcome, scope: CrawlScope): RenderOutcome {
  if (outcome.status !== "ok" || isInScope(outcome.finalUrl, scope)) {
    return outcome;
  }
  const error = new FetchError(`Redirected off-site to ${outcome.finalUrl}`);
  return { status: pageStatusFor(error), detail: formatErrorForMcp(error) };
}

/**
 * `{ added: 2, duplicate: 1 }` -> `"kept 2, duplicate 1, offsite 0, ..."`
 *
 * @internal
 */
function formatLinkStats(stats: Map<EnqueueOutcome, number>): string {
  const count = (outcome: EnqueueOutcome): number => stats.get(outcome) ?? 0;
  return [
    `kept ${count("added")}`,
    `duplicate ${count("duplicate")}`,
    `offsite ${count("out_of_scope")}`,
    `excluded ${count("excluded") + count("invalid")}`,
    `over_budget ${count("over_budget")}`,
  ].join(", ");
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Crawl a site breadth-first and report word counts and keyword matches
 * for every page attempted.
 *
 * @throws {ConfigError} Invalid input; thrown before any page is fetched.
 */
export async function crawl(
  input: CrawlInput,
  dependencies: CrawlDependencies = {},
): Promise<CrawlReport> {
  const appConfig = dependencies.config ?? config;
  const now = dependencies.now ?? Date.now;
  const request = buildCrawlRequest(input, appConfig);
  const renderer = dependencies.renderer ?? new JsdomRenderer();
  const startedAt = now();

  const frontier = new Frontier({
    scope: request.scope,
    maxPages: request.maxPages,
    includePatterns: request.includePatterns,
    excludePatterns: request.excludePatterns,
  });
  frontier.seed(request.startUrl);

  const controller = new AbortController();
  const runTimer = setTimeout(() => {
    controller.abort(
      new RunTimeoutError(`Crawl exceeded its ${request.runTimeoutMs}ms run budget`),
    );
  }, request.runTimeoutMs);

  const pool = new PQueue({ concurrency: request.concurrency });
  const scheduled: Array<Promise<Attempt | undefined | void>> = [];
  const pages: PageResult[] = [];

  // Entries still waiting in the pool when the run times out are skipped.
  const schedule = (): void => {
    while (!controller.signal.aborted) {
      const entry = frontier.next();
      if (!entry) {
        return;
      }
      scheduled.push(
        pool.add(async (): Promise<Attempt | undefined> =>
          controller.signal.aborted
            ? undefined
            : { entry, outcome: await attempt(renderer, entry, request, controller.signal) },
        ),
      );
    }
  };

  try {
    schedule();
    for (let next = scheduled.shift(); next; next = scheduled.shift()) {
      const attempted = await next;
      if (attempted) {
        pages.push(recordPage(attempted, request, frontier, pages.length + 1, appConfig));
        schedule();
      }
    }
  } finally {
    clearTimeout(runTimer);
  }

  const visited = pages.filter((page) => page.status === "ok").length;
  let stoppedReason: StoppedReason = "frontier_exhausted";
  if (controller.signal.aborted) {
    stoppedReason = "run_timeout";
  } else if (frontier.budgetReached) {
    stoppedReason = "page_budget";
  }

  if (appConfig.verbose) {
    console.error(
      `[bfs-crawler] Finished ${request.startUrl}: ${visited}/${pages.length} ok, stopped: ${stoppedReason}`,
    );
  }

  return {
    start_url: request.startUrl,
    scope: request.scope,
    keywords: [...request.keywords],
    pages,
    summary: {
      pages_attempted: pages.length,
      pages_visited: visited,
      pages_failed: pages.length - visited,
      elapsed_ms: Math.max(0, now() - startedAt),
      stopped_reason: stoppedReason,
    },
  };
}

/**
 * Turn one render outcome into a PageResult, feeding an ok page's links
 * back into the frontier.
 *
 * @internal
 */
function recordPage(
  { entry, outcome: rendered }: Attempt,
  request: CrawlRequest,
  frontier: Frontier,
  position: number,
  appConfig: AppConfig,
): PageResult {
  const progress = `[${position}/${request.maxPages}]`;
  const outcome = confineToScope(rendered, request.scope);

  if (outcome.status !== "ok") {
    console.error(
      `[bfs-crawler] ${progress} ${entry.url} -> ${outcome.status}: ${outcome.detail}`,
    );
    return {
      url: entry.url,
      depth: entry.depth,
      status: outcome.status,
      error_detail: outcome.detail,
    };
  }

  const stats = new Map<EnqueueOutcome, number>();
  for (const link of outcome.links) {
    const result = frontier.enqueue(link, outcome.finalUrl, entry.depth + 1);
    stats.set(result, (stats.get(result) ?? 0) + 1);
  }

  const page: OkPageResult = {
    url: entry.url,
    depth: entry.depth,
    status: "ok",
    title: outcome.title,
    word_count: wordCount(outcome.text),
    matches: matchCounts(outcome.text, request.keywords, {
      caseSensitive: request.caseSensitive,
    }),
    links_found: outcome.links.length,
  };

  if (appConfig.verbose) {
    console.error(
      `[bfs-crawler] ${progress} depth ${entry.depth} ${entry.url}: ${page.word_count} words; links ${formatLinkStats(stats)}`,
    );
  }

  return page;
}
