#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { logger } from './utils/index.js';

async function main() {
  const config = await loadConfig();
  const { server, context } = createServer(config);

  await context.contacts.init();
  await context.tasks.init();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('contact-book server running on stdio');
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
