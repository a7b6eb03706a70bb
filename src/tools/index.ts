import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from '../store/index.js';
import type { SyncEngine } from '../sync/index.js';
import { registerListTool } from './list.js';
import { registerGetTool } from './get.js';
import { registerCreateTool } from './create.js';
import { registerUpdateTool } from './update.js';
import { registerDeleteTool } from './delete.js';
import { registerSyncTool } from './sync.js';

export function registerAllTools(server: McpServer, store: ContactStore, sync?: SyncEngine): void {
  registerListTool(server, store);
  registerGetTool(server, store);
  registerCreateTool(server, store);
  registerUpdateTool(server, store);
  registerDeleteTool(server, store);
  registerSyncTool(server, sync);
}
