import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from '../store/index.js';
import { contactToVCard } from '../contacts/vcard.js';
import { formatContact } from '../contacts/format.js';
import { ContactNotFoundError } from '../utils/index.js';
import { errorResult, jsonResult, textResult } from './shared.js';

export function registerGetTool(server: McpServer, store: ContactStore): void {
  server.registerTool('get_contact', {
    description: 'Get a contact by id or exact display name (case-insensitive).',
    inputSchema: {
      query: z.string().min(1).describe('Contact id or display name'),
      format: z.enum(['text', 'json', 'vcf']).optional().default('text'),
    },
  }, async ({ query, format }) => {
    try {
      const contact = await store.resolve(query);
      if (!contact) throw new ContactNotFoundError(query);
      switch (format) {
        case 'json':
          return jsonResult(contact);
        case 'vcf':
          return textResult(contactToVCard(contact));
        default:
          return textResult(formatContact(contact));
      }
    } catch (err) {
      return errorResult(err);
    }
  });
}
