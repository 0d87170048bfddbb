/**
 * @module tools/analyze-page
 * @fileoverview MCP tool `analyze_page`: render one URL and report its word
 * count, keyword matches and same-site links, without crawling further.
 */

import { z } from "zod";
import { config } from "../config.js";
import { buildCrawlRequest } from "../crawler/request.js";
import { matchCounts, wordCount } from "../crawler/text-matcher.js";
import { JsdomRenderer } from "../renderer/jsdom-renderer.js";
import type { PageRenderer } from "../renderer/page-renderer.js";
import { formatErrorForMcp } from "../utils/errors.js";
import { isInScope } from "../utils/url.js";
import { secondsToMs } from "./audit-site.js";

export const AnalyzePageSchema = {
  url: z.string().describe("URL of the page to analyze (http or https)"),

  keywords: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .describe(
      `Keywords to count, as a list or a comma-separated string (default: "${config.defaultKeywords}")`,
    ),

  page_timeout_seconds: z
    .number()
    .optional()
    .describe(`Render budget in seconds (default: ${config.pageTimeout / 1000})`),

  case_sensitive: z
    .boolean()
    .optional()
    .describe("Match keywords case-sensitively (default: false)"),
};

export interface AnalyzePageParams {
  url: string;
  keywords?: string | string[];
  page_timeout_seconds?: number;
  case_sensitive?: boolean;
}

export async function handleAnalyzePage(
  params: AnalyzePageParams,
  renderer: PageRenderer = new JsdomRenderer(),
) {
  try {
    const request = buildCrawlRequest({
      startUrl: params.url,
      keywords: params.keywords ?? config.defaultKeywords,
      maxPages: 1,
      pageTimeoutMs: secondsToMs(params.page_timeout_seconds),
      caseSensitive: params.case_sensitive,
    });

    const outcome = await renderer.render(request.startUrl, {
      timeoutMs: request.pageTimeoutMs,
    });

    if (outcome.status !== "ok") {
      return {
        content: [
          {
            type: "text" as const,
            text: `${request.startUrl}: ${outcome.status}\n${outcome.detail}`,
          },
        ],
        isError: true,
      };
    }

    const matches = matchCounts(outcome.text, request.keywords, {
      caseSensitive: request.caseSensitive,
    });
    const sameSiteLinks = outcome.links.filter((link) => isInScope(link, request.scope));

    const text = [
      `# ${outcome.title || request.startUrl}`,
      `> URL: ${request.startUrl}`,
      ...(outcome.finalUrl !== request.startUrl ? [`> Final URL: ${outcome.finalUrl}`] : []),
      `> Words: ${wordCount(outcome.text)}`,
      "",
      "## Keyword matches",
      ...request.keywords.map((keyword) => `- ${keyword}: ${matches[keyword] ?? 0}`),
      "",
      `## Same-site links (${sameSiteLinks.length} of ${outcome.links.length})`,
      ...sameSiteLinks.map((link) => `- ${link}`),
    ].join("\n");

    return {
      content: [{ type: "text" as const, text }],
    };
  } catch (error) {
    return {
      content: [{ type: "text" as const, text: formatErrorForMcp(error) }],
      isError: true,
    };
  }
}
