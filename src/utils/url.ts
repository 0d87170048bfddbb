/**
 * @module utils/url
 * @fileoverview URL manipulation utilities: canonicalization, scope checks,
 * resolution, pattern matching and scheme validation.
 *
 * The canonical form produced by {@link normalizeUrl} is the identity the
 * frontier's visited-or-queued set is keyed on, so two spellings of the same
 * page (`/docs/`, `/docs`, `/docs#intro`) must collapse to one string.
 *
 * ## Normalization Rules (applied in order)
 * 1. Parse with the WHATWG URL constructor (rejects malformed URLs early,
 *    lowercases scheme and hostname).
 * 2. Remove the fragment (`#section`) -- fragments never reach the server.
 * 3. Remove default ports (`:80` for HTTP, `:443` for HTTPS).
 * 4. Sort query parameters by key.
 * 5. Remove the trailing slash of the path, root included
 *    (`https://example.com/` -> `https://example.com`,
 *     `https://example.com/docs/` -> `https://example.com/docs`).
 *
 * @example
 * ```ts
 * normalizeUrl("HTTPS://Example.COM:443/docs/?b=2&a=1#frag");
 * // => "https://example.com/docs?a=1&b=2"
 *
 * isInScope("https://example.com/about", scopeOf("https://example.com"));
 * // => true
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Default ports for HTTP and HTTPS, stripped during normalization.
 */
const DEFAULT_PORTS: ReadonlyMap<string, string> = new Map([
  ["http:", "80"],
  ["https:", "443"],
]);

/**
 * URL schemes the crawler can load.
 */
const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * The same-site scope of a crawl: the start URL's scheme and hostname.
 *
 * Ports are not part of the scope.
 */
export interface CrawlScope {
  /** Scheme including the trailing colon, e.g. `"https:"`. */
  readonly protocol: string;
  /** Lowercased hostname, e.g. `"example.com"`. */
  readonly hostname: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * URL Normalization
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Normalize a URL string into its canonical form.
 *
 * @param url - The raw URL string to normalize. Must be a valid absolute URL.
 * @returns The canonical URL string.
 * @throws {TypeError} If the input is not a valid URL (propagated from `new URL()`).
 *
 * @example
 * ```ts
 * normalizeUrl("http://example.com:80/");
 * // => "http://example.com"
 *
 * normalizeUrl("https://example.com/blog/?z=1&a=2");
 * // => "https://example.com/blog?a=2&z=1"
 * ```
 */
export function normalizeUrl(url: string): string {
  const parsed = new URL(url);

  parsed.hash = "";

  if (parsed.port === DEFAULT_PORTS.get(parsed.protocol)) {
    parsed.port = "";
  }

  parsed.searchParams.sort();

  if (parsed.pathname.length > 1 && parsed.pathname.endsWith("/")) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, "") || "/";
  }

  const normalized = parsed.toString();

  // Assigning an empty pathname to a special-scheme URL yields "/", so the
  // root slash has to be removed from the serialized string instead:
  // "https://example.com/?q=1" -> "https://example.com?q=1"
  if (parsed.pathname === "/") {
    return normalized.replace(/\/(\?|$)/, "$1");
  }

  return normalized;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Scope
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Derive the crawl scope from a start URL.
 *
 * @throws {TypeError} If the input is not a valid URL.
 */
export function scopeOf(url: string): CrawlScope {
  const parsed = new URL(url);
  return { protocol: parsed.protocol, hostname: parsed.hostname };
}

/**
 * Check whether a URL shares the scope's scheme and hostname.
 *
 * `www.example.com` and `example.com` are different hosts here. Invalid
 * URLs are never in scope.
 *
 * @example
 * ```ts
 * const scope = scopeOf("https://example.com");
 * isInScope("https://example.com/a", scope);      // true
 * isInScope("http://example.com/a", scope);       // false (scheme)
 * isInScope("https://docs.example.com/a", scope); // false (host)
 * ```
 */
export function isInScope(url: string, scope: CrawlScope): boolean {
  try {
    const parsed = new URL(url);
    return (
      parsed.protocol === scope.protocol && parsed.hostname === scope.hostname
    );
  } catch {
    return false;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * URL Resolution
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Resolve a potentially relative URL against a base URL.
 *
 * @param base     - The base URL (typically the page that contains the link).
 * @param relative - The URL to resolve (absolute or relative).
 * @returns The fully resolved absolute URL string.
 * @throws {TypeError} If the combination does not produce a valid URL.
 *
 * @example
 * ```ts
 * resolveUrl("https://example.com/docs/intro", "../blog");
 * // => "https://example.com/blog"
 * ```
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative, base).href;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Pattern Matching
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Check whether a URL matches a glob-like pattern.
 *
 * - `*` matches zero or more of any character.
 * - All other characters are matched literally.
 * - Case-insensitive, anchored at both ends.
 *
 * @example
 * ```ts
 * matchesPattern("https://example.com/blog/post-1", "https://example.com/blog/*");
 * // => true
 *
 * matchesPattern("https://example.com/file.pdf", "*.pdf");
 * // => true
 * ```
 */
export function matchesPattern(url: string, pattern: string): boolean {
  const escapedPattern = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*");

  const regex = new RegExp(`^${escapedPattern}$`, "i");

  return regex.test(url);
}

/* ────────────────────────────────────────────────────────────────────────────
 * URL Scheme Validation
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Check whether a URL uses `http:` or `https:`.
 *
 * Invalid URLs return `false` rather than throwing.
 *
 * @example
 * ```ts
 * isFetchableUrl("https://example.com/page"); // => true
 * isFetchableUrl("mailto:user@example.com");  // => false
 * isFetchableUrl("not-a-valid-url");          // => false
 * ```
 */
export function isFetchableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return FETCHABLE_SCHEMES.has(parsed.protocol);
  } catch {
    return false;
  }
}
