/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * Every setting has a default so the server starts with zero configuration.
 * Crawl-level inputs (start URL, keywords, page budget) arrive per request;
 * the values here are the defaults and hard limits those requests fall back to.
 *
 * ## Architecture Position
 * This module sits at the bottom of the dependency graph -- it is imported by
 * the crawler, the renderer, the fetch service and the tools, but imports
 * nothing from the application itself.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |   tools   |   |  crawler  |   | renderer  |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |               |
 *          +-----v-----+  +-----v-----+
 *          |   config   |  |   utils   |
 *          +-----------+  +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`.
 * - Boolean values use the strings `"true"` / `"false"`.
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * config.pageTimeout; // 20000 (or whatever PAGE_TIMEOUT says)
 *
 * // Fresh snapshot, e.g. in tests:
 * process.env.PAGE_TIMEOUT = "5000";
 * loadConfig().pageTimeout; // 5000
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Complete application configuration.
 *
 * Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * Page budget used when a crawl request does not name one.
   *
   * @default 10
   */
  defaultMaxPages: number;

  /**
   * Upper bound a request's `maxPages` may not exceed.
   *
   * @default 500
   */
  maxPagesLimit: number;

  /**
   * Per-page render budget in milliseconds: document fetch, script
   * execution and settling together.
   *
   * @default 20000
   */
  pageTimeout: number;

  /**
   * Wall-clock budget for a whole crawl, in milliseconds.
   *
   * @default 300000
   */
  runTimeout: number;

  /**
   * Quiet window of the settle heuristic: after the `load` event, the page
   * counts as rendered once the DOM has not changed for this many ms.
   *
   * @default 500
   */
  settleQuietMs: number;

  /**
   * Hard cap on settling. Pages whose scripts mutate the DOM forever
   * (tickers, carousels) are extracted once this much time has passed.
   *
   * @default 5000
   */
  settleMaxMs: number;

  /**
   * Number of pages rendered at the same time during a crawl.
   *
   * @default 1
   */
  maxConcurrent: number;

  /**
   * Maximum HTML document size in bytes.
   *
   * @default 2000000
   */
  maxResponseSize: number;

  /**
   * User-Agent header sent with the document request and with the page's
   * script requests.
   *
   * @default "spa-audit-crawler/1.0 (MCP Server)"
   */
  userAgent: string;

  /**
   * When true, an uncaught error thrown by a page script turns the page
   * into a `render_error`. When false the error is logged and the page is
   * extracted as far as it rendered.
   *
   * @default true
   */
  strictScripts: boolean;

  /**
   * Keyword matching policy used when a request does not choose one.
   *
   * @default false
   */
  keywordCaseSensitive: boolean;

  /**
   * Comma-separated keyword list used when a tool call omits `keywords`.
   *
   * @default "privacy,security,data"
   */
  defaultKeywords: string;

  /**
   * Log per-page progress and link statistics to stderr.
   *
   * @default false
   */
  verbose: boolean;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Parse a `"true"` / `"false"` environment value, falling back to the
 * default for anything else (including unset).
 *
 * @internal
 */
function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return fallback;
}

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Pure with respect to its input: it reads `process.env` at call time and
 * returns a plain object, so tests can set variables and call it again.
 *
 * @returns A fully-populated {@link AppConfig} with all defaults applied.
 */
export function loadConfig(): AppConfig {
  return {
    defaultMaxPages: parseInt(process.env.MAX_PAGES ?? "10", 10),
    maxPagesLimit: parseInt(process.env.MAX_PAGES_LIMIT ?? "500", 10),
    pageTimeout: parseInt(process.env.PAGE_TIMEOUT ?? "20000", 10),
    runTimeout: parseInt(process.env.RUN_TIMEOUT ?? "300000", 10),
    settleQuietMs: parseInt(process.env.SETTLE_QUIET_MS ?? "500", 10),
    settleMaxMs: parseInt(process.env.SETTLE_MAX_MS ?? "5000", 10),
    maxConcurrent: parseInt(process.env.MAX_CONCURRENT ?? "1", 10),
    maxResponseSize: parseInt(process.env.MAX_RESPONSE_SIZE ?? "2000000", 10),
    userAgent: process.env.USER_AGENT ?? "spa-audit-crawler/1.0 (MCP Server)",
    strictScripts: parseBoolean(process.env.STRICT_SCRIPTS, true),
    keywordCaseSensitive: parseBoolean(process.env.KEYWORD_CASE_SENSITIVE, false),
    defaultKeywords: process.env.DEFAULT_KEYWORDS ?? "privacy,security,data",
    verbose: parseBoolean(process.env.VERBOSE, false),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Pre-loaded configuration singleton, evaluated once at module load.
 *
 * If you need a fresh config (e.g., in tests), call {@link loadConfig} directly.
 */
export const config: AppConfig = loadConfig();
