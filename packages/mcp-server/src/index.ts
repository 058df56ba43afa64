#!/usr/bin/env node
/**
 * function-mesh MCP Server
 *
 * Wraps the function-mesh kernel as 7 callable tools for LLM agents.
 * Runs over stdio transport; stdout belongs to the protocol, so
 * diagnostics go to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';
import { exportDir } from './config.js';

const server = createServer();
const transport = new StdioServerTransport();

try {
  await server.connect(transport);
  console.error(`${SERVER_NAME} ${SERVER_VERSION} on stdio, exporting to ${exportDir()}`);
} catch (err) {
  console.error(`${SERVER_NAME} failed to start:`, err);
  process.exit(1);
}
