/**
 * src/mcp/mcp_panel_server.ts
 *
 * MCP server for library panels. Exposes every LibraryPanelService
 * operation as a tool over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from '../config';
import { DatabaseConnection } from '../database/connection';
import { LibraryPanelService } from '../services/LibraryPanelService';
import { logger } from '../utils/logger';
import { handleToolCall, toolDefinitions } from './tools';

const config = loadConfig();
const service = new LibraryPanelService(DatabaseConnection.getInstance(config.dbPath));

const server = new Server(
  { name: 'library-panels', version: '0.1.0' },
  { capabilities: { tools: {} } }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: toolDefinitions };
});

server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(service, name, args, extra.signal);
});

function shutdown(): void {
  logger.info('Shutting down MCP server');
  DatabaseConnection.closeConnection();
  process.exit(0);
}

async function main() {
  logger.info(`Starting MCP server with DB_PATH=${config.dbPath}`);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  logger.info('MCP server is running, tools are now available via MCP.');
}

main().catch((err) => {
  logger.error('Fatal error in MCP server:', { err });
  DatabaseConnection.closeConnection();
  process.exit(1);
});
