#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point for kube-query
 *
 * When an MCP client connects, it spawns this process. The server exposes the
 * query_cluster tool over stdio.
 *
 * How it works:
 * 1. Load configuration and build the shared query dependencies
 * 2. Create an McpServer and register query_cluster
 * 3. Start the stdio transport (reads JSON-RPC from stdin, writes to stdout)
 *
 * stdout carries the protocol, so the logger writes to stderr.
 */

// Initialize OpenTelemetry tracing before any other imports
// This ensures the tracer provider is registered before any instrumented code runs
import "./tracing";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config";
import { createQueryDependencies } from "./dependencies";
import { registerQueryTool } from "./mcp";
import { createLogger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    console: "stderr",
  });

  const server = new McpServer({
    name: "kube-query",
    version: "0.1.0",
  });

  registerQueryTool(server, createQueryDependencies(config, logger));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server connected over stdio");
}

main().catch((error: unknown) => {
  console.error("MCP server error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
