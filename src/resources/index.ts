import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { toSummary } from '../types/index.js';
import { findSimilar } from '../contacts/index.js';

export function registerAllResources(server: McpServer, { contacts, tasks, config }: AppContext): void {
  // contacts://all - every contact in insertion order
  server.registerResource('all-contacts', 'contacts://all', {
    title: 'All Contacts',
    description: 'Every contact in insertion order',
    mimeType: 'application/json',
  }, async (uri) => ({
    contents: [{
      uri: uri.href,
      text: JSON.stringify(contacts.list(), null, 2),
      mimeType: 'application/json',
    }],
  }));

  server.registerResource('contact-detail',
    new ResourceTemplate('contacts://{id}', {
      list: async () => ({
        resources: contacts.list().map(toSummary).map(s => ({
          uri: `contacts://${s.id}`,
          name: `${s.name} (${s.phone})`,
          mimeType: 'application/json',
        })),
      }),
    }),
    {
      title: 'Contact Detail',
      description: 'All fields of one contact',
      mimeType: 'application/json',
    },
    async (uri, variables) => {
      const id = Array.isArray(variables.id) ? variables.id[0] : variables.id;
      const contact = contacts.get(id ?? '');
      return {
        contents: [{
          uri: uri.href,
          text: JSON.stringify(contact, null, 2),
          mimeType: 'application/json',
        }],
      };
    },
  );

  server.registerResource('similar-contacts', 'contacts://similar', {
    title: 'Similar Contacts',
    description: 'Pairs of contacts that look alike, with confidence scores',
    mimeType: 'application/json',
  }, async (uri) => ({
    contents: [{
      uri: uri.href,
      text: JSON.stringify(findSimilar(contacts.list(), { defaultCountry: config.defaultCountry }), null, 2),
      mimeType: 'application/json',
    }],
  }));

  server.registerResource('all-tasks', 'tasks://all', {
    title: 'To-do List',
    description: 'Every task with its status',
    mimeType: 'application/json',
  }, async (uri) => ({
    contents: [{
      uri: uri.href,
      text: JSON.stringify(tasks.list(), null, 2),
      mimeType: 'application/json',
    }],
  }));
}
