import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from '../store/index.js';
import { toSummary } from '../contacts/model.js';
import { errorResult, jsonResult } from './shared.js';

export function registerListTool(server: McpServer, store: ContactStore): void {
  server.registerTool('list_contacts', {
    description: 'List all stored contacts as summaries (id, source, name, primary email and phone, organization).',
    inputSchema: {
      source: z.enum(['provider', 'local']).optional().describe('Only contacts from the provider, or only local ones'),
    },
  }, async ({ source }) => {
    try {
      const contacts = await store.list();
      const summaries = contacts
        .filter(c => source === undefined || c.id.kind === source)
        .map(toSummary);
      return jsonResult(summaries);
    } catch (err) {
      return errorResult(err);
    }
  });
}
