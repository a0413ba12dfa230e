#!/usr/bin/env node
/**
 * @module mcp
 * @fileoverview receipt-text-extractor MCP server entry point.
 *
 * Exposes the extraction pipeline as a single MCP tool over stdio, for
 * clients that already hold the HTML and want the text without an HTTP hop.
 *
 * | Tool           | Description                                   | Module                     |
 * |----------------|-----------------------------------------------|----------------------------|
 * | `extract_text` | Raw HTML in, clean text plus links trailer out | `./tools/extract-text.js`  |
 *
 * stdout carries JSON-RPC frames, so the logger writes to stderr here.
 * Authentication does not apply: the client owns the process.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config } from "./config.js";
import { extractText } from "./extractor/pipeline.js";
import { DEFAULT_RULES, loadRulesFile } from "./extractor/rules.js";
import {
  ExtractTextSchema,
  createExtractTextHandler,
} from "./tools/extract-text.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger(config, { destination: 2 });

async function main(): Promise<void> {
  const rules = config.rulesFile
    ? await loadRulesFile(config.rulesFile)
    : DEFAULT_RULES;

  const server = new McpServer(
    {
      name: "receipt-text-extractor",
      version: "1.0.0",
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.tool(
    "extract_text",
    "Extract clean, human-readable text from raw HTML (receipt or article pages). Scripts, styles, tracking URLs and promotional noise are removed; tables and line breaks are kept; the receipt PDF and tax verification links are appended at the end.",
    ExtractTextSchema,
    createExtractTextHandler((html) =>
      extractText(html, {
        rules,
        fallback: config.containerFallback,
        decodeInputEntities: config.decodeInputEntities,
        logger,
      }),
    ),
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server connected on stdio");
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Server error");
  process.exit(1);
});
