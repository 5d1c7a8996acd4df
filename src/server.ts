import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ContactStore, TaskStore } from './store/index.js';
import { BrowseSession } from './session/index.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export const SERVER_NAME = 'contact-book';
export const SERVER_VERSION = '0.1.0';

export interface AppContext {
  config: AppConfig;
  contacts: ContactStore;
  tasks: TaskStore;
  session: BrowseSession;
}

export function createServer(config: AppConfig): { server: McpServer; context: AppContext } {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const contacts = new ContactStore(config.contactsFile);
  const context: AppContext = {
    config,
    contacts,
    tasks: new TaskStore(config.tasksFile),
    session: new BrowseSession(contacts),
  };

  registerAllTools(server, context);
  registerAllResources(server, context);

  logger.info('MCP server created, contacts file:', config.contactsFile);

  return { server, context };
}
