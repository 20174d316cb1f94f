#!/usr/bin/env node

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import updateNotifier from 'update-notifier';
import { createServer } from './server.js';
import { loadPackageInfo, runCLI } from './cli.js';
import { logger } from './logger.js';

const pkg = loadPackageInfo();

async function startMCPServer(): Promise<void> {
  const server = createServer({}, pkg.version);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('devscore MCP server running');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Cached for 24h; the MCP server never prints to stdout
  if (args[0] !== 'server') {
    updateNotifier({ pkg, updateCheckInterval: 1000 * 60 * 60 * 24 }).notify();
  }

  const result = await runCLI(args);

  switch (result) {
    case 'handled':
      process.exit(0);
      break;
    case 'failed':
      process.exit(1);
      break;
    case 'server':
      await startMCPServer();
      break;
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
