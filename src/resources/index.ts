import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContactStore } from '../store/index.js';
import { toSummary } from '../contacts/model.js';
import { ContactNotFoundError } from '../utils/index.js';

export function registerAllResources(server: McpServer, store: ContactStore): void {
  // contacts://all - summary list of all contacts
  server.registerResource('all-contacts', 'contacts://all', {
    title: 'All Contacts',
    description: 'Summary list of every stored contact',
    mimeType: 'application/json',
  }, async (uri) => {
    const summaries = (await store.list()).map(toSummary);
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(summaries, null, 2),
        mimeType: 'application/json',
      }],
    };
  });

  // contacts://{id} - individual contact detail
  server.registerResource('contact-detail',
    new ResourceTemplate('contacts://{id}', {
      list: async () => {
        const contacts = await store.list();
        return {
          resources: contacts.map(c => ({
            uri: `contacts://${c.id.value}`,
            name: c.fullName,
            mimeType: 'application/json',
          })),
        };
      },
    }),
    {
      title: 'Contact Detail',
      description: 'Full record for one contact',
      mimeType: 'application/json',
    },
    async (uri, variables) => {
      const id = Array.isArray(variables.id) ? variables.id[0] : variables.id;
      const contact = id ? await store.get(id) : null;
      if (!contact) throw new ContactNotFoundError(id ?? uri.href);
      return {
        contents: [{
          uri: uri.href,
          text: JSON.stringify(contact, null, 2),
          mimeType: 'application/json',
        }],
      };
    },
  );
}
