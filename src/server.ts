#!/usr/bin/env tsx
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { bootstrap, type CatalogContext } from './bootstrap';
import { SERVER_NAME, SERVER_VERSION } from './tools/registry';
import {
  registerManageProjectTool,
  registerManageWarehouseTool,
  registerQueryWarehouseTool,
} from './tools';

function registerAllTools(server: McpServer, context: CatalogContext): void {
  // Projects
  registerManageProjectTool(server, context);

  // Warehouse lifecycle
  registerManageWarehouseTool(server, context);
  registerQueryWarehouseTool(server, context);
}

const context = bootstrap();

const server = new McpServer({
  name: SERVER_NAME,
  version: SERVER_VERSION,
});

registerAllTools(server, context);

const closeDatabase = () => {
  if (context.state.db.open) {
    context.state.db.close();
  }
};

process.on('exit', closeDatabase);
process.on('SIGINT', () => {
  closeDatabase();
  process.exit(0);
});
process.on('SIGTERM', () => {
  closeDatabase();
  process.exit(0);
});

const transport = new StdioServerTransport();
await server.connect(transport);
