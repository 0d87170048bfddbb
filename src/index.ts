#!/usr/bin/env node
/**
 * @fileoverview Entry point of the spa-audit-crawler MCP server.
 *
 * Registers the tools and serves them over stdio. stdout belongs to the
 * JSON-RPC channel, so every diagnostic in this codebase goes to stderr.
 *
 * ## Tools
 * - `audit_site`   - bounded same-site crawl with word counts and keyword matches
 * - `analyze_page` - the same analysis for a single page, without crawling
 *
 * @module index
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { AuditSiteSchema, handleAuditSite } from "./tools/audit-site.js";
import { AnalyzePageSchema, handleAnalyzePage } from "./tools/analyze-page.js";

// ---------------------------------------------------------------------------
// Server Initialization
// ---------------------------------------------------------------------------

const server = new McpServer(
  {
    name: "spa-audit-crawler",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

// ---------------------------------------------------------------------------
// Tool Registration
// ---------------------------------------------------------------------------

server.tool(
  "audit_site",
  "Crawl a website breadth-first within its own scheme and hostname, executing page JavaScript, and report the visible word count and whole-word keyword matches of every page. Stops at the page budget, when no links remain, or when the run timeout fires.",
  AuditSiteSchema,
  (params) => handleAuditSite(params),
);

server.tool(
  "analyze_page",
  "Render a single page (executing its JavaScript) and report its visible word count, whole-word keyword matches and the same-site links it contains.",
  AnalyzePageSchema,
  (params) => handleAnalyzePage(params),
);

// ---------------------------------------------------------------------------
// Server Startup
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[index] spa-audit-crawler listening on stdio");
}

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
