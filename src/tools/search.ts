import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { fuzzySearch } from '../contacts/index.js';
import { jsonResult } from './result.js';

export function registerSearchTool(server: McpServer, { contacts, session }: AppContext): void {
  server.registerTool('search_contacts', {
    description: 'Filter contacts by name or phone (case-insensitive substring). An empty query lists every contact in insertion order. Use mode "fuzzy" for a ranked search across all fields.',
    inputSchema: {
      query: z.string().describe('Text to look for in name or phone'),
      mode: z.enum(['substring', 'fuzzy']).optional().default('substring'),
      limit: z.number().int().positive().optional().describe('Maximum results (fuzzy mode only, default 20)'),
    },
  }, async ({ query, mode, limit }) => {
    const results = mode === 'fuzzy'
      ? fuzzySearch(contacts.list(), query, limit)
      : session.setQuery(query);

    return jsonResult({ query, mode, total: contacts.list().length, results });
  });
}
