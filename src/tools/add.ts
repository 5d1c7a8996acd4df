import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { errorResult, jsonResult, withSaveWarning } from './result.js';

export const contactFields = {
  name: z.string().describe('Name (required)'),
  phone: z.string().describe('Phone: 7-20 of digits, spaces, +, -, ( and ) (required)'),
  email: z.string().optional().describe('Email address'),
  address: z.string().optional().describe('Free-text address, may span lines'),
};

export function registerAddTool(server: McpServer, { session }: AppContext): void {
  server.registerTool('add_contact', {
    description: 'Add a new contact. Rejected if a contact with the same name (ignoring case) and phone exists.',
    inputSchema: contactFields,
  }, async (draft) => {
    try {
      const { result, persistError } = await session.add(draft);
      return jsonResult(withSaveWarning({ contact: result, message: 'Contact added' }, persistError));
    } catch (err) {
      return errorResult(err);
    }
  });
}
