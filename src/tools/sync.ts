import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SyncEngine } from '../sync/index.js';
import { errorResult, jsonResult } from './shared.js';

export function registerSyncTool(server: McpServer, sync: SyncEngine | undefined): void {
  server.registerTool('sync_contacts', {
    description: 'Pull every contact from the configured provider into the local store.',
  }, async () => {
    if (!sync) {
      return errorResult(new Error('No provider configured: run the authorize command first'));
    }
    try {
      return jsonResult(await sync.sync());
    } catch (err) {
      return errorResult(err);
    }
  });
}
