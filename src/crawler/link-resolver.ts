/**
 * @module crawler/link-resolver
 * @fileoverview Link extraction from rendered HTML.
 *
 * Pulls every `<a href>` out of a document, resolves it against the page's
 * base URL (the `<base href>` if the page declares one, else the final URL
 * of the response), drops links the crawler can never load, and returns
 * canonical, deduplicated absolute URLs.
 *
 * ## Skipped hrefs
 * - empty and fragment-only (`#top`)
 * - non-fetchable schemes: `javascript:`, `mailto:`, `tel:`, `data:`,
 *   `blob:`, `ftp:`, `file:`
 * - anything the URL parser rejects
 *
 * Scope and budget are not decided here; the frontier does that.
 *
 * @example
 * ```ts
 * const links = extractLinks(
 *   '<a href="/about">About</a><a href="https://other.org">x</a>',
 *   "https://example.com",
 * );
 * // ["https://example.com/about", "https://other.org"]
 * ```
 */

import * as cheerio from "cheerio";
import {
  isFetchableUrl,
  matchesPattern,
  normalizeUrl,
  resolveUrl,
} from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Include/exclude glob filters applied to canonical link URLs.
 */
export interface LinkFilterOptions {
  /** A link must match at least one of these, when any are given. */
  includePatterns?: readonly string[];

  /** A link matching any of these is dropped. Wins over include. */
  excludePatterns?: readonly string[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * Scheme Filtering
 * ──────────────────────────────────────────────────────────────────────────── */

const NON_FETCHABLE_SCHEMES: readonly string[] = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "blob:",
  "ftp:",
  "file:",
];

function hasNonFetchableScheme(href: string): boolean {
  const lower = href.toLowerCase();
  return NON_FETCHABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Base URL
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * The URL relative hrefs resolve against: `<base href>` resolved against
 * the page URL, or the page URL itself.
 */
function documentBaseUrl($: cheerio.CheerioAPI, pageUrl: string): string {
  const baseHref = $("base[href]").first().attr("href")?.trim();
  if (!baseHref) {
    return pageUrl;
  }
  try {
    return resolveUrl(pageUrl, baseHref);
  } catch {
    return pageUrl;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract canonical, deduplicated links from an HTML document.
 *
 * Order is first appearance in the document.
 *
 * @param html    - HTML markup (typically the serialized rendered DOM).
 * @param pageUrl - Final URL of the page, after redirects.
 */
export function extractLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const baseUrl = documentBaseUrl($, pageUrl);
  const links = new Set<string>();

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href || href.startsWith("#") || hasNonFetchableScheme(href)) {
      return;
    }

    let normalized: string;
    try {
      normalized = normalizeUrl(resolveUrl(baseUrl, href));
    } catch {
      return;
    }

    if (isFetchableUrl(normalized)) {
      links.add(normalized);
    }
  });

  return [...links];
}

/**
 * Whether a single URL survives the include/exclude globs.
 *
 * @example
 * ```ts
 * passesPatterns("https://example.com/blog/a", { includePatterns: ["https://example.com/blog/*"] }); // true
 * passesPatterns("https://example.com/a.pdf", { excludePatterns: ["*.pdf"] }); // false
 * ```
 */
export function passesPatterns(url: string, options: LinkFilterOptions): boolean {
  const { includePatterns, excludePatterns } = options;

  if (includePatterns && includePatterns.length > 0) {
    if (!includePatterns.some((pattern) => matchesPattern(url, pattern))) {
      return false;
    }
  }

  if (excludePatterns && excludePatterns.length > 0) {
    if (excludePatterns.some((pattern) => matchesPattern(url, pattern))) {
      return false;
    }
  }

  return true;
}
