#!/usr/bin/env node
/**
 * Urysohn MCP Server
 *
 * Wraps the separating-function kernel as callable tools for LLM agents.
 * Runs over stdio transport; stdout carries the protocol, logs go to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const server = createServer(config);

const transport = new StdioServerTransport();
await server.connect(transport);
console.error(
  `[urysohn] ready on stdio (tolerance=${config.defaultTolerance}, contracts=${config.checkContracts}, max certify level=${config.maxCertifyLevel})`,
);
