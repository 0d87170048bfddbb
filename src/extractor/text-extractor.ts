/**
 * @module extractor/text-extractor
 * @fileoverview Visible text and title extraction from rendered HTML.
 *
 * Input is the serialized DOM after page scripts ran, so client-rendered
 * content is already in the markup. Output is what a reader would see:
 *
 * 1. Elements that never render text are removed (`script`, `style`,
 *    `noscript`, `template`, anything with the `hidden` attribute).
 * 2. Every remaining text node under `<body>` is collected in document
 *    order and the pieces are joined with a single space.
 * 3. Runs of whitespace collapse to one space; the result is trimmed.
 *
 * Joining with a space keeps `<li>Home</li><li>About</li>` from fusing into
 * `HomeAbout`. The flip side is that a word split across inline elements
 * (`<b>Data</b>base`) reads as two words.
 *
 * @example
 * ```ts
 * const page = extractPageText(
 *   "<title>Hi</title><body><p>Hello <b>world</b></p><script>x()</script></body>",
 * );
 * page.title; // "Hi"
 * page.text;  // "Hello world"
 * ```
 */

import * as cheerio from "cheerio";
import { isTag, isText, type AnyNode } from "domhandler";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * Text pulled from one rendered page.
 */
export interface PageText {
  /** Document title, or `""` when the page has none. */
  title: string;

  /** Whitespace-normalized visible body text. */
  text: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Elements whose content is never shown to a reader.
 */
const INVISIBLE_SELECTORS: readonly string[] = [
  "script",
  "style",
  "noscript",
  "template",
  "[hidden]",
] as const;

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

/**
 * Collapse whitespace runs (including NBSP) and trim.
 *
 * @internal
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Depth-first walk pushing the data of every text node.
 *
 * @internal
 */
function collectText(nodes: readonly AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (isTag(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * `<title>`, then `og:title`, then the first `<h1>`.
 *
 * @internal
 */
function extractTitle($: cheerio.CheerioAPI): string {
  const titleTag = normalizeWhitespace($("title").first().text());
  if (titleTag) {
    return titleTag;
  }

  const ogTitle = $('meta[property="og:title"]').attr("content");
  if (ogTitle?.trim()) {
    return normalizeWhitespace(ogTitle);
  }

  return normalizeWhitespace($("h1").first().text());
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract the title and visible body text of an HTML document.
 */
export function extractPageText(html: string): PageText {
  const $ = cheerio.load(html);

  const title = extractTitle($);

  for (const selector of INVISIBLE_SELECTORS) {
    $(selector).remove();
  }

  const pieces: string[] = [];
  collectText($("body").contents().toArray(), pieces);

  return {
    title,
    text: normalizeWhitespace(pieces.join(" ")),
  };
}
