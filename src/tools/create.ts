import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from '../store/index.js';
import { createContact } from '../contacts/model.js';
import { contactFieldShape, errorResult, jsonResult, toChanges } from './shared.js';

export function registerCreateTool(server: McpServer, store: ContactStore): void {
  server.registerTool('create_contact', {
    description: 'Create a new contact. At minimum, provide a full name. When a provider is configured the contact is also created there.',
    inputSchema: {
      ...contactFieldShape,
      fullName: z.string().min(1).describe('Display name'),
    },
  }, async (args) => {
    try {
      const contact = await store.write(createContact(toChanges(args)));
      return jsonResult({ id: contact.id.value, source: contact.id.kind, fullName: contact.fullName, message: 'Contact created' });
    } catch (err) {
      return errorResult(err);
    }
  });
}
