import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { errorResult, jsonResult } from './result.js';

export function registerExportTool(server: McpServer, { contacts }: AppContext): void {
  server.registerTool('export_contacts', {
    description: 'Write all contacts to a file. JSON matches the contact book file format; CSV and vCard are also available.',
    inputSchema: {
      outputPath: z.string().describe('File path to write to'),
      format: z.enum(['json', 'csv', 'vcf']).optional().default('json'),
    },
  }, async ({ outputPath, format }) => {
    try {
      const exported = await contacts.export(outputPath, format);
      return jsonResult({
        exported,
        format,
        filePath: outputPath,
        message: `Contacts exported to ${outputPath}`,
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
