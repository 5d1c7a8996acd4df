import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { registerSearchTool } from './search.js';
import { registerGetTool } from './get.js';
import { registerAddTool } from './add.js';
import { registerUpdateTool } from './update.js';
import { registerDeleteTool } from './delete.js';
import { registerImportTool } from './import.js';
import { registerExportTool } from './export.js';
import { registerSimilarTool } from './similar.js';
import { registerTaskTools } from './tasks.js';

export function registerAllTools(server: McpServer, context: AppContext): void {
  registerSearchTool(server, context);
  registerGetTool(server, context);
  registerAddTool(server, context);
  registerUpdateTool(server, context);
  registerDeleteTool(server, context);
  registerImportTool(server, context);
  registerExportTool(server, context);
  registerSimilarTool(server, context);
  registerTaskTools(server, context);
}
