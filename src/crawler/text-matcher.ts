/**
 * @module crawler/text-matcher
 * @fileoverview Word counting and whole-word keyword tallies for page text.
 *
 * ## Word Boundaries
 * A "word character" is any Unicode letter, combining mark or digit
 * (`\p{L}`, `\p{M}`, `\p{N}`). A keyword occurrence only counts when the
 * characters immediately before and after it are NOT word characters, so
 * `data` is found in `"data,"` and `"(data)"` but not in `"database"` or
 * `"metadata"`.
 *
 * Words for {@link wordCount} are maximal runs of word characters; an
 * apostrophe between two runs joins them (`don't`, `l’école`). Punctuation
 * and symbols on their own (`|`, `—`, `©`) are not words.
 *
 * ## Architecture Position
 * ```
 *   bfs-crawler  -->  text-matcher  (this file)
 *   tools/analyze-page  -->  text-matcher
 * ```
 *
 * Everything here is a pure function of its arguments.
 *
 * @example
 * ```ts
 * wordCount("one two  three");                      // 3
 * matchCounts("data is data", ["data"]);            // { data: 2 }
 * matchCounts("database design", ["data"]);         // { data: 0 }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Character class of word characters, for use inside a `u`-flagged regex.
 *
 * @internal
 */
const WORD_CHAR = "[\\p{L}\\p{M}\\p{N}]";

/**
 * A word: runs of word characters, optionally joined by a single
 * apostrophe (ASCII or typographic).
 *
 * @internal
 */
const WORD_REGEX = new RegExp(`${WORD_CHAR}+(?:['’]${WORD_CHAR}+)*`, "gu");

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Options for {@link matchCounts}.
 */
export interface MatchOptions {
  /**
   * Match keywords case-sensitively.
   *
   * @default false
   */
  caseSensitive?: boolean;
}

/**
 * Keyword -> number of whole-word occurrences.
 */
export type KeywordMatches = Record<string, number>;

/* ────────────────────────────────────────────────────────────────────────────
 * Internal Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Escape every regex metacharacter in a literal string.
 *
 * @internal
 */
function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build the whole-word regex for one keyword.
 *
 * Lookarounds instead of `\b`: `\b` is ASCII-only even with the `u` flag,
 * which would let `café` match inside `cafés`.
 *
 * @internal
 */
function keywordRegex(keyword: string, caseSensitive: boolean): RegExp {
  const flags = caseSensitive ? "gu" : "giu";
  return new RegExp(
    `(?<!${WORD_CHAR})${escapeRegExp(keyword)}(?!${WORD_CHAR})`,
    flags,
  );
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Count the words in a text.
 *
 * @returns The number of words; 0 for empty or whitespace-only text.
 *
 * @example
 * ```ts
 * wordCount("");                    // 0
 * wordCount("Home | About us");     // 3
 * wordCount("Don't panic.");        // 2
 * ```
 */
export function wordCount(text: string): number {
  if (!text) {
    return 0;
  }
  return text.match(WORD_REGEX)?.length ?? 0;
}

/**
 * Count whole-word occurrences of every keyword in a text.
 *
 * The result has exactly one entry per keyword, in the order given, with
 * zero for keywords that never occur. Occurrences do not overlap. Keywords
 * that are empty after trimming always count 0.
 *
 * @param text     - Normalized page text.
 * @param keywords - Keywords to look for; used verbatim as result keys.
 * @param options  - Matching policy (case sensitivity).
 *
 * @example
 * ```ts
 * matchCounts("Privacy: your data, our privacy policy.", ["privacy", "data"]);
 * // => { privacy: 2, data: 1 }
 *
 * matchCounts("Privacy", ["privacy"], { caseSensitive: true });
 * // => { privacy: 0 }
 * ```
 */
export function matchCounts(
  text: string,
  keywords: readonly string[],
  options: MatchOptions = {},
): KeywordMatches {
  const caseSensitive = options.caseSensitive ?? false;
  const matches = new Map<string, number>();

  for (const keyword of keywords) {
    const needle = keyword.trim();
    if (needle.length === 0 || !text) {
      matches.set(keyword, 0);
      continue;
    }
    matches.set(keyword, text.match(keywordRegex(needle, caseSensitive))?.length ?? 0);
  }

  // fromEntries defines own properties, so keys such as "__proto__" survive.
  return Object.fromEntries(matches);
}
