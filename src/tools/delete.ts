import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { errorResult, jsonResult, withSaveWarning } from './result.js';

export function registerDeleteTool(server: McpServer, { contacts }: AppContext): void {
  server.registerTool('delete_contact', {
    description: 'Delete a contact. Nothing is removed unless confirm is true; ask the user first.',
    inputSchema: {
      id: z.string().describe('Contact id to delete'),
      confirm: z.boolean().optional().default(false).describe('The user confirmed the deletion'),
    },
  }, async ({ id, confirm }) => {
    try {
      const { result, persistError } = await contacts.requestDelete(id, () => confirm);
      return jsonResult(withSaveWarning({
        id,
        deleted: result.deleted,
        message: result.deleted
          ? `Deleted contact '${result.contact.name}'`
          : `Delete contact '${result.contact.name}'? Call again with confirm: true to proceed.`,
      }, persistError));
    } catch (err) {
      return errorResult(err);
    }
  });
}
