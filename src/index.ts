#!/usr/bin/env node
/**
 * DaisyUI Docs MCP Server
 *
 * Provides tools for:
 * - Looking up and searching DaisyUI component documentation
 * - Explaining design concepts
 * - Scaffolding layouts, themes, forms, tables and charts
 */

import { loadConfig } from './config.js';
import { createServer, SERVER_INFO } from './server.js';
import { runStdioLoop } from './protocol/stdio.js';
import { logger } from './logger.js';

async function main() {
  const config = await loadConfig();
  const dispatcher = createServer(config);

  logger.info({ version: SERVER_INFO.version }, 'DaisyUI docs MCP server started');
  await runStdioLoop(dispatcher);
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Server error');
  process.exit(1);
});
