#!/usr/bin/env node
// src/server/index.ts
// Weather tool server: MCP over stdio, so stdout carries protocol frames only

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadServerConfig } from '../config.js';
import { configureLogger, parseLogLevel, info, error } from '../utils/logger.js';
import { createWeatherServer } from './weather.js';

async function main(): Promise<void> {
  const config = loadServerConfig();

  configureLogger({
    level: parseLogLevel(config.logging.level),
    file: config.logging.file,
    console: config.logging.console,
  });

  const server = createWeatherServer(config);
  await server.connect(new StdioServerTransport());
  info('Weather server listening on stdio', { format: config.weather.format });
}

main().catch((err) => {
  error('Weather server failed', { error: String(err) });
  process.exit(1);
});
