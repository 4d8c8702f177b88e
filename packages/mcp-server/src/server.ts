import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTools } from './tools.js';
import { loadConfig, type ServerConfig } from './config.js';

export function createServer(config: ServerConfig = loadConfig()): McpServer {
  const server = new McpServer({
    name: 'urysohn',
    version: '0.1.0',
  });
  registerTools(server, config);
  return server;
}
