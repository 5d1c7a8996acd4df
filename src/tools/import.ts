import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { errorResult, jsonResult, withSaveWarning } from './result.js';

export function registerImportTool(server: McpServer, { session }: AppContext): void {
  server.registerTool('import_contacts', {
    description: 'Merge contacts from a JSON file (array of {name, phone, email, address}). Entries without name or phone, and entries duplicating an existing name+phone, are skipped.',
    inputSchema: {
      filePath: z.string().describe('Path to the JSON file to import'),
    },
  }, async ({ filePath }) => {
    try {
      const { result, persistError } = await session.importMerge(filePath);
      return jsonResult(withSaveWarning({
        ...result,
        message: `Imported ${result.added} contacts.`,
      }, persistError));
    } catch (err) {
      return errorResult(err);
    }
  });
}
