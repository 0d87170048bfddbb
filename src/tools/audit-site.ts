/**
 * @module tools/audit-site
 * @fileoverview MCP tool `audit_site`: crawl a site and report word counts
 * and keyword matches per page.
 *
 * The response carries two text blocks: a Markdown summary with one table
 * row per page, followed by the full {@link CrawlReport} as JSON.
 */

import { z } from "zod";
import {
  crawl,
  type CrawlDependencies,
  type CrawlReport,
} from "../crawler/bfs-crawler.js";
import { config } from "../config.js";
import { formatErrorForMcp } from "../utils/errors.js";

export const AuditSiteSchema = {
  url: z.string().describe("Start URL of the crawl (http or https)"),

  keywords: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .describe(
      `Keywords to count, as a list or a comma-separated string (default: "${config.defaultKeywords}")`,
    ),

  max_pages: z
    .number()
    .int()
    .optional()
    .describe(`Maximum number of pages to attempt (default: ${config.defaultMaxPages})`),

  page_timeout_seconds: z
    .number()
    .optional()
    .describe(`Render budget per page in seconds (default: ${config.pageTimeout / 1000})`),

  run_timeout_seconds: z
    .number()
    .optional()
    .describe(`Wall-clock budget for the whole crawl in seconds (default: ${config.runTimeout / 1000})`),

  concurrency: z
    .number()
    .int()
    .optional()
    .describe(`Pages rendered at the same time (default: ${config.maxConcurrent})`),

  exclude_patterns: z
    .array(z.string())
    .optional()
    .describe("Glob patterns for URLs to skip (e.g. '*/login*', '*.pdf')"),

  include_patterns: z
    .array(z.string())
    .optional()
    .describe("Only follow URLs matching at least one of these glob patterns"),

  case_sensitive: z
    .boolean()
    .optional()
    .describe("Match keywords case-sensitively (default: false)"),
};

export interface AuditSiteParams {
  url: string;
  keywords?: string | string[];
  max_pages?: number;
  page_timeout_seconds?: number;
  run_timeout_seconds?: number;
  concurrency?: number;
  exclude_patterns?: string[];
  include_patterns?: string[];
  case_sensitive?: boolean;
}

/**
 * Seconds from a tool call to whole milliseconds.
 */
export function secondsToMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

function cell(value: string | number): string {
  return String(value).replace(/\|/g, "\\|");
}

/**
 * Markdown rendering of a crawl report.
 *
 * @example
 * ```
 * # Site Audit
 * > Start URL: https://example.com
 * > Keywords: privacy, security
 * > Pages: 2 attempted, 1 ok, 1 failed
 * > Elapsed: 1200ms | Stop reason: frontier_exhausted
 *
 * | # | URL | Status | Depth | Words | privacy | security |
 * | --- | --- | --- | --- | --- | --- | --- |
 * | 1 | https://example.com | ok | 0 | 120 | 2 | 0 |
 * | 2 | https://example.com/slow | timeout | 1 | - | - | - |
 *
 * ## Failures
 * - https://example.com/slow: [TIMEOUT] Rendering ... timed out after 20000ms
 * ```
 */
export function formatReport(report: CrawlReport): string {
  const { summary } = report;
  const lines = [
    "# Site Audit",
    `> Start URL: ${report.start_url}`,
    `> Keywords: ${report.keywords.join(", ")}`,
    `> Pages: ${summary.pages_attempted} attempted, ${summary.pages_visited} ok, ${summary.pages_failed} failed`,
    `> Elapsed: ${summary.elapsed_ms}ms | Stop reason: ${summary.stopped_reason}`,
    "",
    `| # | URL | Status | Depth | Words | ${report.keywords.map(cell).join(" | ")} |`,
    `|${" --- |".repeat(5 + report.keywords.length)}`,
  ];

  report.pages.forEach((page, index) => {
    const matches = page.status === "ok" ? page.matches : undefined;
    const counts = report.keywords.map((keyword) =>
      matches ? (matches[keyword] ?? 0) : "-",
    );
    const words = page.status === "ok" ? page.word_count : "-";
    lines.push(
      `| ${index + 1} | ${cell(page.url)} | ${page.status} | ${page.depth} | ${words} | ${counts.join(" | ")} |`,
    );
  });

  const failures = report.pages.flatMap((page) =>
    page.status === "ok" ? [] : [`- ${page.url}: ${page.error_detail}`],
  );
  if (failures.length > 0) {
    lines.push("", "## Failures", ...failures);
  }

  return lines.join("\n");
}

export async function handleAuditSite(
  params: AuditSiteParams,
  dependencies: CrawlDependencies = {},
) {
  try {
    const report = await crawl(
      {
        startUrl: params.url,
        keywords: params.keywords ?? config.defaultKeywords,
        maxPages: params.max_pages,
        pageTimeoutMs: secondsToMs(params.page_timeout_seconds),
        runTimeoutMs: secondsToMs(params.run_timeout_seconds),
        concurrency: params.concurrency,
        excludePatterns: params.exclude_patterns,
        includePatterns: params.include_patterns,
        caseSensitive: params.case_sensitive,
      },
      dependencies,
    );

    return {
      content: [
        { type: "text" as const, text: formatReport(report) },
        { type: "text" as const, text: JSON.stringify(report, null, 2) },
      ],
    };
  } catch (error) {
    return {
      content: [{ type: "text" as const, text: formatErrorForMcp(error) }],
      isError: true,
    };
  }
}
