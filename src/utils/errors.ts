/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for spa-audit-crawler.
 *
 * Every error in this application extends {@link CrawlerError}, which
 * carries a machine-readable `code` string alongside the human-readable
 * `message`. The code survives serialization into a page report or an MCP
 * tool response, where the class hierarchy is lost.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlerError (base)  ─── code: string
 *         ├── ConfigError           ─── "INVALID_CONFIG"
 *         ├── FetchError            ─── "FETCH_FAILED"   + optional statusCode
 *         ├── ContentTypeError      ─── "CONTENT_TYPE_REJECTED"
 *         ├── ResponseTooLargeError ─── "RESPONSE_TOO_LARGE"
 *         ├── TimeoutError          ─── "TIMEOUT"
 *         ├── RunTimeoutError       ─── "RUN_TIMEOUT"
 *         └── RenderError           ─── "RENDER_FAILED"
 * ```
 *
 * ## Fatal vs page-local
 * Only {@link ConfigError} is fatal: it is raised before the first page is
 * fetched and aborts the run. Every other error is page-local and is turned
 * into a page status by {@link pageStatusFor}.
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all spa-audit-crawler errors.
 *
 * @example
 * ```ts
 * try {
 *   await crawl(input);
 * } catch (err) {
 *   if (err instanceof CrawlerError) {
 *     console.error(`[${err.code}] ${err.message}`);
 *   } else {
 *     throw err;
 *   }
 * }
 * ```
 */
export class CrawlerError extends Error {
  /**
   * Machine-readable error code (SCREAMING_SNAKE_CASE). Codes are part of
   * the public surface: they appear in `error_detail` of page reports.
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   */
  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when crawl input is unusable: a start URL that is not absolute
 * http(s), an empty keyword set, or a non-positive limit.
 *
 * Raised before any page is fetched; no partial report exists.
 *
 * @example
 * ```ts
 * throw new ConfigError("keywords: at least one non-empty keyword is required");
 * ```
 */
export class ConfigError extends CrawlerError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
  }
}

/**
 * Thrown when the HTML document cannot be retrieved.
 *
 * Covers network-level failures (DNS, refused connection, TLS) and terminal
 * non-2xx responses. {@link statusCode} is set when the server answered.
 *
 * @example
 * ```ts
 * throw new FetchError("HTTP 404 Not Found for https://example.com/gone", 404);
 * ```
 */
export class FetchError extends CrawlerError {
  /**
   * HTTP status code of the final response, if one was received.
   */
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, "FETCH_FAILED");
    this.statusCode = statusCode;
  }
}

/**
 * Thrown when the response is not an HTML document (JSON, PDF, images...).
 */
export class ContentTypeError extends CrawlerError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED");
  }
}

/**
 * Thrown when the HTML document exceeds the configured size limit.
 */
export class ResponseTooLargeError extends CrawlerError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/**
 * Thrown when a single page exceeds its render budget.
 *
 * @example
 * ```ts
 * throw new TimeoutError("Rendering https://example.com timed out after 20000ms");
 * ```
 */
export class TimeoutError extends CrawlerError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/**
 * Abort reason used when the crawl's wall-clock budget runs out.
 *
 * It is never thrown to the caller of a crawl: the run ends with the pages
 * collected so far. A page that was in flight at that moment is recorded
 * with status `timeout` and this error's code in its detail.
 */
export class RunTimeoutError extends CrawlerError {
  constructor(message: string) {
    super(message, "RUN_TIMEOUT");
  }
}

/**
 * Thrown when the renderer itself fails: a page script crashes while strict
 * script mode is on, or the DOM cannot be built or serialized.
 */
export class RenderError extends CrawlerError {
  constructor(message: string) {
    super(message, "RENDER_FAILED");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Page Status Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Statuses a page can end in other than `ok`.
 */
export type FailedPageStatus = "timeout" | "fetch_error" | "render_error";

/**
 * Map any error raised while rendering a page to the page status it
 * produces.
 *
 * Unknown errors (a third-party renderer throwing a `TypeError`, say) count
 * as `render_error`: the page was reachable as far as we know, the failure
 * happened on our side.
 *
 * @example
 * ```ts
 * pageStatusFor(new FetchError("HTTP 500", 500));   // "fetch_error"
 * pageStatusFor(new TimeoutError("slow"));          // "timeout"
 * pageStatusFor(new TypeError("x is undefined"));   // "render_error"
 * ```
 */
export function pageStatusFor(error: unknown): FailedPageStatus {
  if (error instanceof TimeoutError || error instanceof RunTimeoutError) {
    return "timeout";
  }
  if (
    error instanceof FetchError ||
    error instanceof ContentTypeError ||
    error instanceof ResponseTooLargeError
  ) {
    return "fetch_error";
  }
  return "render_error";
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any error (known or unknown) to a single-line string for a page
 * report's `error_detail` or an MCP tool response.
 *
 * - {@link CrawlerError} subclasses: `"[CODE] message"`.
 * - Standard `Error` instances: the `.message` property.
 * - Everything else: coerced via `String()`.
 *
 * @example
 * ```ts
 * formatErrorForMcp(new FetchError("Not Found", 404));
 * // => "[FETCH_FAILED] Not Found"
 *
 * formatErrorForMcp("something went wrong");
 * // => "something went wrong"
 * ```
 */
export function formatErrorForMcp(error: unknown): string {
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
