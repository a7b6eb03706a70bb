import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from '../store/index.js';
import { errorResult, jsonResult } from './shared.js';

export function registerDeleteTool(server: McpServer, store: ContactStore): void {
  server.registerTool('delete_contact', {
    description: 'Permanently delete a contact. Provider contacts are deleted remotely first.',
    inputSchema: {
      id: z.string().min(1).describe('Contact id'),
    },
  }, async ({ id }) => {
    try {
      await store.delete(id);
      return jsonResult({ id, message: 'Contact deleted' });
    } catch (err) {
      return errorResult(err);
    }
  });
}
