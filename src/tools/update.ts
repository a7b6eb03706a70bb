import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from '../store/index.js';
import { contactFieldShape, errorResult, jsonResult, toChanges } from './shared.js';

export function registerUpdateTool(server: McpServer, store: ContactStore): void {
  server.registerTool('update_contact', {
    description: 'Update fields on an existing contact. Only provided fields are changed; list fields are replaced as a whole.',
    inputSchema: {
      id: z.string().min(1).describe('Contact id'),
      ...contactFieldShape,
    },
  }, async ({ id, ...fields }) => {
    try {
      const contact = await store.update(id, toChanges(fields));
      return jsonResult({ id: contact.id.value, source: contact.id.kind, fullName: contact.fullName, message: 'Contact updated' });
    } catch (err) {
      return errorResult(err);
    }
  });
}
