#!/usr/bin/env node

/**
 * docpack MCP Server
 *
 * Tools:
 *   budget_content     fit categorized content items into a token budget
 *   list_budget_tiers  describe the standard/comprehensive/full tiers
 *
 * CRITICAL: No console.log(): stdout is reserved for JSON-RPC protocol.
 * Use console.error() for debug output.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { budgetContent, budgetContentShape, listBudgetTiers } from "../src/mcp/tools.js";

const server = new McpServer({
  name: "docpack",
  version: "0.1.0",
});

server.tool(
  "budget_content",
  "Select, order and truncate categorized documentation content (concepts, pages, examples) so it fits a token budget. Returns the selected text plus per-category accounting, omissions and warnings.",
  budgetContentShape,
  async (args) => budgetContent(args),
);

server.tool(
  "list_budget_tiers",
  "List the standard, comprehensive and full budget tiers with their token ranges.",
  async () => listBudgetTiers(),
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[docpack-mcp] Server started on stdio");
}

main().catch((err) => {
  console.error("[docpack-mcp] Fatal error:", err);
  process.exit(1);
});
