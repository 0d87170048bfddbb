/**
 * @fileoverview HTML document fetcher used by the page renderer.
 *
 * Wraps the Node.js native `fetch()` with the checks a crawl needs before a
 * document is handed to jsdom:
 *
 * 1. **Abort / timeout** - the caller's `AbortSignal` covers the request and
 *    the body stream. When the signal's reason is a {@link CrawlerError}
 *    (the renderer's page timeout, the run timeout) that error is rethrown
 *    as-is; any other abort becomes a {@link TimeoutError}.
 * 2. **Status check** - non-2xx final responses become {@link FetchError}
 *    carrying the status code.
 * 3. **Content-Type filtering** - only HTML-like documents are accepted.
 * 4. **Response size limiting** - the body is streamed and cut off at
 *    `maxResponseSize` bytes.
 * 5. **User-Agent** - a configurable, identifying header.
 *
 * Redirects are followed; {@link FetchResult.url} is the final URL, which is
 * what relative links on the page resolve against.
 *
 * ```
 *   fetchDocument(url, { signal })
 *     |
 *     +--> scheme check (http/https only)
 *     +--> fetch() with signal, User-Agent, redirect: "follow"
 *     +--> status / Content-Type / size checks
 *     +--> FetchResult
 * ```
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import { isFetchableUrl } from "../utils/url.js";
import {
  CrawlerError,
  ContentTypeError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * A successfully fetched HTML document.
 */
export interface FetchResult {
  /** Decoded document body. */
  html: string;

  /** Final URL after redirects. */
  url: string;

  /** MIME type of the response, lowercased, without parameters. */
  contentType: string;

  /** HTTP status code of the final response. */
  statusCode: number;
}

/**
 * Options for {@link fetchDocument}.
 */
export interface FetchOptions {
  /** Aborts the request and the body stream. */
  signal?: AbortSignal;

  /** @default config.userAgent */
  userAgent?: string;

  /** @default config.maxResponseSize */
  maxResponseSize?: number;
}

/**
 * Signature of {@link fetchDocument}, so the renderer can take a stand-in.
 */
export type DocumentFetcher = (
  url: string,
  options?: FetchOptions,
) => Promise<FetchResult>;

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

const ALLOWED_CONTENT_TYPES: ReadonlySet<string> = new Set([
  "text/html",
  "application/xhtml+xml",
]);

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * `"text/html; charset=utf-8"` -> `"text/html"`.
 *
 * @internal
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  const [mimeType = ""] = contentType.split(";");
  return mimeType.trim().toLowerCase();
}

/**
 * The error an aborted request should surface as.
 *
 * @internal
 */
function abortError(signal: AbortSignal | undefined, url: string): CrawlerError {
  const reason: unknown = signal?.reason;
  if (reason instanceof CrawlerError) {
    return reason;
  }
  return new TimeoutError(`Request to ${url} was aborted`);
}

/**
 * Read the response body as UTF-8 text, failing once more than `maxBytes`
 * have arrived.
 *
 * A declared `Content-Length` over the limit is rejected before reading.
 *
 * @internal
 */
async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
  url: string,
  signal: AbortSignal | undefined,
): Promise<string> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new ResponseTooLargeError(
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`,
      );
    }
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder("utf-8", { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        );
      }

      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof CrawlerError) {
      throw error;
    }
    if (signal?.aborted) {
      throw abortError(signal, url);
    }
    throw new FetchError(
      `Error reading response body: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return chunks.join("");
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Fetch an HTML document.
 *
 * @throws {FetchError} Network failure, unsupported scheme, or non-2xx status.
 * @throws {ContentTypeError} The response is not HTML.
 * @throws {ResponseTooLargeError} The body exceeds the size limit.
 * @throws {TimeoutError} The signal aborted (or its `CrawlerError` reason).
 *
 * @example
 * ```ts
 * const doc = await fetchDocument("https://example.com", {
 *   signal: AbortSignal.timeout(20_000),
 * });
 * doc.url;         // "https://example.com/" (after redirects)
 * doc.contentType; // "text/html"
 * ```
 */
export async function fetchDocument(
  url: string,
  options: FetchOptions = {},
): Promise<FetchResult> {
  const { signal } = options;
  const userAgent = options.userAgent ?? config.userAgent;
  const maxResponseSize = options.maxResponseSize ?? config.maxResponseSize;

  if (!isFetchableUrl(url)) {
    throw new FetchError(`Unsupported URL: ${url} (only http: and https: are allowed)`);
  }
  if (signal?.aborted) {
    throw abortError(signal, url);
  }

  let response: Response;
  try {
    response = await fetch(url, {
      signal,
      headers: {
        "User-Agent": userAgent,
        Accept: "text/html, application/xhtml+xml",
      },
      redirect: "follow",
    });
  } catch (error) {
    if (signal?.aborted) {
      throw abortError(signal, url);
    }
    if (error instanceof DOMException && (error.name === "AbortError" || error.name === "TimeoutError")) {
      throw new TimeoutError(`Request to ${url} timed out`);
    }
    throw new FetchError(
      `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const finalUrl = response.url || url;

  if (!response.ok) {
    const statusLine = [String(response.status), response.statusText]
      .filter(Boolean)
      .join(" ");
    throw new FetchError(`HTTP ${statusLine} for ${finalUrl}`, response.status);
  }

  const contentType = extractMimeType(response.headers.get("content-type"));
  if (!ALLOWED_CONTENT_TYPES.has(contentType)) {
    throw new ContentTypeError(
      `Unsupported content type "${contentType || "none"}" for ${finalUrl}`,
    );
  }

  const html = await readBodyWithLimit(response, maxResponseSize, finalUrl, signal);

  return {
    html,
    url: finalUrl,
    contentType,
    statusCode: response.status,
  };
}
