/**
 * MCP stdio transport entry point.
 *
 * Serves the catalog tools over stdio (no HTTP server needed).
 * Usage: node dist/mcp-stdio.js [config.yaml]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/loader.js';
import { createLogger, setDefaultLogger } from './logging/logger.js';
import { initializeApp } from './server.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const configPath = process.argv[2];

  // stdout carries MCP JSON-RPC, so every log line goes to stderr
  const logger = createLogger({ name: 'ontology-catalog-mcp', stderr: true });
  setDefaultLogger(logger);

  const config = await loadConfig(configPath !== undefined ? { configPath, logger } : { logger });
  const ctx = await initializeApp(config, { logger });
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  logger.info({ models: ctx.catalog.models.length }, 'MCP server connected via stdio');
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${String(err)}\n`);
  process.exit(1);
});
