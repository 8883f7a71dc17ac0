#!/usr/bin/env node
/**
 * dmd-tools MCP Server
 *
 * Exposes DMD import/export and mesh aggregation as tools for LLM agents.
 * Runs over stdio transport; logs go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

const server = new McpServer({
  name: 'dmd-tools',
  version: '0.1.0',
});

registerTools(server, { config, logger });

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info(`listening on stdio, exporting to ${config.exportDir}`);
