#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createTutorApp } from './app.js';
import { loadConfig } from './config.js';
import type { TutorConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

function readConfig(): TutorConfig | null {
  try {
    return loadConfig(process.env);
  } catch (err) {
    process.stderr.write(`${errorMessage(err)}\n`);
    return null;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(config.log);
  const app = createTutorApp(config, logger);

  const restored = await app.controller.restore();
  if (!restored.ok) {
    logger.error({ code: restored.code }, `Could not seed the session: ${restored.status}`);
  }

  const transport = new StdioServerTransport();
  await app.server.connect(transport);
  logger.info('tutor-persona MCP server running');
}

main().catch((err: unknown) => {
  process.stderr.write(`tutor-persona failed to start: ${errorMessage(err)}\n`);
  process.exitCode = 1;
});
