import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { errorResult, jsonResult } from './result.js';

export function registerGetTool(server: McpServer, { session }: AppContext): void {
  server.registerTool('get_contact', {
    description: 'Load a contact by id, selecting it for a following update or delete.',
    inputSchema: {
      id: z.string().describe('Contact id from search_contacts'),
    },
  }, async ({ id }) => {
    try {
      return jsonResult(session.select(id));
    } catch (err) {
      return errorResult(err);
    }
  });
}
