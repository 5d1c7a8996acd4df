import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { contactFields } from './add.js';
import { errorResult, jsonResult, withSaveWarning } from './result.js';

export function registerUpdateTool(server: McpServer, { contacts }: AppContext): void {
  server.registerTool('update_contact', {
    description: 'Replace all fields of an existing contact, keeping its place in the list. Omitted email/address become empty.',
    inputSchema: {
      id: z.string().describe('Contact id to update'),
      ...contactFields,
    },
  }, async ({ id, ...draft }) => {
    try {
      const { result, persistError } = await contacts.update(id, draft);
      return jsonResult(withSaveWarning({ contact: result, message: 'Contact updated' }, persistError));
    } catch (err) {
      return errorResult(err);
    }
  });
}
