import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from './store/index.js';
import type { SyncEngine } from './sync/index.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import { logger } from './utils/index.js';

export interface ServerDeps {
  store: ContactStore;
  /** Absent when no provider is authenticated; sync_contacts then reports an error. */
  sync?: SyncEngine;
}

export function createServer({ store, sync }: ServerDeps): McpServer {
  const server = new McpServer({
    name: 'addressbook-mcp',
    version: '0.1.0',
  });

  registerAllTools(server, store, sync);
  registerAllResources(server, store);

  logger.info('MCP server created, store path:', store.dir, sync ? '(provider configured)' : '(local only)');

  return server;
}
