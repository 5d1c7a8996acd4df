import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../server.js';
import { errorResult, jsonResult, withSaveWarning } from './result.js';

export function registerTaskTools(server: McpServer, { tasks }: AppContext): void {
  server.registerTool('add_task', {
    description: 'Add a pending task to the to-do list.',
    inputSchema: {
      title: z.string().describe('Task text'),
    },
  }, async ({ title }) => {
    try {
      const { result, persistError } = await tasks.add(title);
      return jsonResult(withSaveWarning({ task: result }, persistError));
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('list_tasks', {
    description: 'List tasks in the order they were added.',
    inputSchema: {},
  }, async () => jsonResult(tasks.list()));

  server.registerTool('complete_task', {
    description: 'Mark a task as done.',
    inputSchema: {
      id: z.string().describe('Task id'),
    },
  }, async ({ id }) => {
    try {
      const { result, persistError } = await tasks.markDone(id);
      return jsonResult(withSaveWarning({ task: result }, persistError));
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('remove_task', {
    description: 'Remove a task from the list.',
    inputSchema: {
      id: z.string().describe('Task id'),
    },
  }, async ({ id }) => {
    try {
      const { result, persistError } = await tasks.remove(id);
      return jsonResult(withSaveWarning({ task: result, message: `Task removed: ${result.title}` }, persistError));
    } catch (err) {
      return errorResult(err);
    }
  });
}
