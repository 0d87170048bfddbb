/**
 * @module crawler/request
 * @fileoverview Validation of raw crawl input into an immutable
 * {@link CrawlRequest}.
 *
 * Raw input comes from an MCP tool call or a direct library call. It is
 * checked with a zod schema; the first problem found becomes a
 * {@link ConfigError}, which is the only error a crawl ever throws.
 *
 * Defaults come from {@link AppConfig}; `maxPages` is capped at
 * `maxPagesLimit` rather than rejected.
 */

import { z } from "zod";
import { config, type AppConfig } from "../config.js";
import { ConfigError } from "../utils/errors.js";
import {
  isFetchableUrl,
  normalizeUrl,
  scopeOf,
  type CrawlScope,
} from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Crawl input as a caller provides it.
 */
export interface CrawlInput {
  /** Absolute http(s) URL the crawl starts from. */
  startUrl: string;
  /** Keyword list, or a comma-separated string of keywords. */
  keywords: string | readonly string[];
  maxPages?: number;
  pageTimeoutMs?: number;
  runTimeoutMs?: number;
  concurrency?: number;
  includePatterns?: readonly string[];
  excludePatterns?: readonly string[];
  caseSensitive?: boolean;
}

/**
 * Validated, frozen crawl parameters.
 */
export interface CrawlRequest {
  /** Canonical start URL. */
  readonly startUrl: string;
  /** Trimmed, deduplicated keywords; lowercased unless `caseSensitive`. */
  readonly keywords: readonly string[];
  readonly maxPages: number;
  readonly pageTimeoutMs: number;
  readonly runTimeoutMs: number;
  readonly scope: CrawlScope;
  readonly concurrency: number;
  readonly includePatterns: readonly string[];
  readonly excludePatterns: readonly string[];
  readonly caseSensitive: boolean;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

const positiveInt = z.number().int().positive();

const crawlInputSchema = z.object({
  startUrl: z
    .string()
    .url("must be an absolute URL")
    .refine(isFetchableUrl, { message: "must use http or https" }),
  keywords: z.union([z.string(), z.array(z.string())]),
  maxPages: positiveInt.optional(),
  pageTimeoutMs: positiveInt.optional(),
  runTimeoutMs: positiveInt.optional(),
  concurrency: positiveInt.optional(),
  includePatterns: z.array(z.string()).optional(),
  excludePatterns: z.array(z.string()).optional(),
  caseSensitive: z.boolean().optional(),
});

/** Limits after defaults from the configuration are filled in. */
const limitsSchema = z.object({
  maxPages: positiveInt,
  maxPagesLimit: positiveInt,
  pageTimeoutMs: positiveInt,
  runTimeoutMs: positiveInt,
  concurrency: positiveInt,
});

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Parse `value`, reporting the first issue as `"path: message"`.
 */
function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue?.path.join(".") || "input";
    throw new ConfigError(`${field}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

/**
 * Turn a keyword string or list into the matcher's keyword set.
 *
 * Commas split a string. Entries are trimmed; empty ones are dropped;
 * duplicates (after case folding, unless case-sensitive) keep their first
 * position.
 *
 * @example
 * ```ts
 * parseKeywords(" Privacy, security ,,privacy", false); // ["privacy", "security"]
 * parseKeywords(["Data", "data"], true);              // ["Data", "data"]
 * ```
 */
export function parseKeywords(
  raw: string | readonly string[],
  caseSensitive: boolean,
): string[] {
  const pieces = typeof raw === "string" ? raw.split(",") : raw;
  const keywords: string[] = [];
  for (const piece of pieces) {
    const trimmed = piece.trim();
    const keyword = caseSensitive ? trimmed : trimmed.toLowerCase();
    if (keyword && !keywords.includes(keyword)) {
      keywords.push(keyword);
    }
  }
  return keywords;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Validate crawl input and apply defaults.
 *
 * @throws {ConfigError} Invalid start URL, empty keyword set, or a limit
 *   (given or defaulted) that is not a positive integer.
 *
 * @example
 * ```ts
 * const request = buildCrawlRequest({
 *   startUrl: "https://example.com/",
 *   keywords: "privacy, security",
 *   maxPages: 3,
 * });
 * request.startUrl; // "https://example.com"
 * request.keywords; // ["privacy", "security"]
 * ```
 */
export function buildCrawlRequest(
  input: CrawlInput,
  appConfig: AppConfig = config,
): CrawlRequest {
  const data = parseOrThrow(crawlInputSchema, input);
  const caseSensitive = data.caseSensitive ?? appConfig.keywordCaseSensitive;

  const keywords = parseKeywords(data.keywords, caseSensitive);
  if (keywords.length === 0) {
    throw new ConfigError("keywords: at least one non-empty keyword is required");
  }

  // Defaults come from the environment, so they are checked like input.
  const limits = parseOrThrow(limitsSchema, {
    maxPages: data.maxPages ?? appConfig.defaultMaxPages,
    maxPagesLimit: appConfig.maxPagesLimit,
    pageTimeoutMs: data.pageTimeoutMs ?? appConfig.pageTimeout,
    runTimeoutMs: data.runTimeoutMs ?? appConfig.runTimeout,
    concurrency: data.concurrency ?? appConfig.maxConcurrent,
  });

  const startUrl = normalizeUrl(data.startUrl);

  return Object.freeze({
    startUrl,
    keywords: Object.freeze(keywords),
    maxPages: Math.min(limits.maxPages, limits.maxPagesLimit),
    pageTimeoutMs: limits.pageTimeoutMs,
    runTimeoutMs: limits.runTimeoutMs,
    scope: Object.freeze(scopeOf(startUrl)),
    concurrency: limits.concurrency,
    includePatterns: Object.freeze(data.includePatterns ?? []),
    excludePatterns: Object.freeze(data.excludePatterns ?? []),
    caseSensitive,
  });
}
