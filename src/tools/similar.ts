import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { findSimilar } from '../contacts/index.js';
import { jsonResult } from './result.js';

export function registerSimilarTool(server: McpServer, { contacts, config }: AppContext): void {
  server.registerTool('find_similar', {
    description: 'List pairs of contacts that look alike (same normalized phone, same email, or close names). Read-only.',
    inputSchema: {
      threshold: z.number().min(0).max(1).optional().default(0.6)
        .describe('Minimum confidence (0-1) to report'),
      limit: z.number().int().positive().optional().default(50),
    },
  }, async ({ threshold, limit }) => {
    const pairs = findSimilar(contacts.list(), { threshold, limit, defaultCountry: config.defaultCountry });
    return jsonResult({ totalContacts: contacts.list().length, pairsFound: pairs.length, pairs });
  });
}
