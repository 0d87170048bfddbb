/**
 * @module crawler/frontier
 * @fileoverview BFS frontier: the pending-URL queue plus the set of every
 * URL ever enqueued.
 *
 * The frontier is the single owner of the visited-or-queued set. A URL is
 * admitted only once, only if it is in scope, and only while the number of
 * admitted URLs is below the page budget. Because admission already counts
 * against the budget, `queued + processed <= maxPages` holds at all times
 * and `next()` can never hand out more than `maxPages` URLs.
 *
 * `enqueue()` never throws. It reports what happened to the URL so the
 * crawler can log link statistics.
 *
 * ```
 *   enqueue(href, sourceUrl, depth)
 *     |
 *     +--> resolve + canonicalize  ---- parse failure -------> "invalid"
 *     +--> scheme/host == start?   ---- no ------------------> "out_of_scope"
 *     +--> asset / include / exclude --- filtered ------------> "excluded"
 *     +--> already seen?           ---- yes -----------------> "duplicate"
 *     +--> seen.size < maxPages?   ---- no ------------------> "over_budget"
 *     +--> push to queue                                       "added"
 * ```
 */

import { passesPatterns } from "./link-resolver.js";
import {
  isFetchableUrl,
  isInScope,
  normalizeUrl,
  resolveUrl,
  type CrawlScope,
} from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * What `enqueue()` did with a URL.
 */
export type EnqueueOutcome =
  | "added"
  | "duplicate"
  | "out_of_scope"
  | "excluded"
  | "over_budget"
  | "invalid";

/**
 * A URL waiting to be crawled.
 */
export interface FrontierEntry {
  /** Canonical absolute URL. */
  readonly url: string;
  /** Link distance from the start URL (the start URL is 0). */
  readonly depth: number;
}

export interface FrontierOptions {
  scope: CrawlScope;
  maxPages: number;
  includePatterns?: readonly string[];
  excludePatterns?: readonly string[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * Asset Filtering
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Path extensions of files that are not HTML documents.
 */
const ASSET_EXTENSIONS: ReadonlySet<string> = new Set([
  // images
  ".jpg", ".jpeg", ".png", ".gif", ".webp", ".svg", ".ico", ".bmp", ".avif",
  // documents and archives
  ".pdf", ".zip", ".gz", ".tar", ".rar", ".7z", ".dmg", ".exe",
  // media
  ".mp3", ".mp4", ".webm", ".mov", ".avi", ".wav",
  // page resources
  ".css", ".js", ".mjs", ".json", ".xml", ".woff", ".woff2", ".ttf",
]);

/**
 * Whether a canonical URL points at a non-document asset, judged by the
 * extension of its last path segment.
 */
export function isAssetUrl(url: string): boolean {
  const { pathname } = new URL(url);
  const lastSegment = pathname.slice(pathname.lastIndexOf("/") + 1).toLowerCase();
  const dot = lastSegment.lastIndexOf(".");
  if (dot <= 0) {
    return false;
  }
  return ASSET_EXTENSIONS.has(lastSegment.slice(dot));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Frontier
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * FIFO queue of pending URLs with scope, dedup and budget enforcement.
 *
 * @example
 * ```ts
 * const frontier = new Frontier({ scope: scopeOf(start), maxPages: 3 });
 * frontier.seed(start);
 * let entry;
 * while ((entry = frontier.next())) {
 *   for (const href of linksOf(entry.url)) {
 *     frontier.enqueue(href, entry.url, entry.depth + 1);
 *   }
 * }
 * ```
 */
export class Frontier {
  private readonly queue: FrontierEntry[] = [];
  private readonly seen = new Set<string>();
  private readonly options: FrontierOptions;
  private turnedAway = false;

  constructor(options: FrontierOptions) {
    this.options = options;
  }

  /**
   * Put the start URL at depth 0.
   *
   * Include/exclude patterns do not apply to the start URL. Only the first
   * call on a fresh frontier has an effect; later calls report `duplicate`.
   */
  seed(startUrl: string): EnqueueOutcome {
    if (this.seen.size > 0) {
      return "duplicate";
    }

    let url: string;
    try {
      url = normalizeUrl(startUrl);
    } catch {
      return "invalid";
    }
    if (!isFetchableUrl(url)) {
      return "invalid";
    }
    if (this.options.maxPages < 1) {
      return "over_budget";
    }

    this.admit({ url, depth: 0 });
    return "added";
  }

  /**
   * Offer a discovered link to the frontier.
   *
   * @param url       - Absolute URL, or a reference relative to `sourceUrl`.
   * @param sourceUrl - The page the link was found on.
   * @param depth     - Depth to record for the entry.
   */
  enqueue(url: string, sourceUrl?: string, depth = 0): EnqueueOutcome {
    let canonical: string;
    try {
      canonical = normalizeUrl(sourceUrl ? resolveUrl(sourceUrl, url) : url);
    } catch {
      return "invalid";
    }

    if (!isFetchableUrl(canonical) || !isInScope(canonical, this.options.scope)) {
      return "out_of_scope";
    }
    if (isAssetUrl(canonical) || !passesPatterns(canonical, this.options)) {
      return "excluded";
    }
    if (this.seen.has(canonical)) {
      return "duplicate";
    }
    if (this.seen.size >= this.options.maxPages) {
      this.turnedAway = true;
      return "over_budget";
    }

    this.admit({ url: canonical, depth });
    return "added";
  }

  /**
   * Remove and return the oldest pending entry.
   */
  next(): FrontierEntry | undefined {
    return this.queue.shift();
  }

  /**
   * Whether the page budget has turned away a new in-scope URL, i.e. the
   * crawl stopped short of the site rather than running out of links.
   */
  get budgetReached(): boolean {
    return this.turnedAway;
  }

  private admit(entry: FrontierEntry): void {
    this.seen.add(entry.url);
    this.queue.push(entry);
  }
}
