#!/usr/bin/env node
// src/index.ts
import { loadConfig, Config } from './config.js';
import { configureLogger, parseLogLevel, info, error } from './utils/logger.js';
import { initServices, closeServices, ServiceContainer } from './services/index.js';
import { IntentRouter } from './router/index.js';
import { Agent } from './agent/index.js';
import { startRepl } from './repl.js';

const USAGE = 'Usage: weather-chat <path-to-tool-server>';

async function main(): Promise<void> {
  const serverPath = process.argv[2];
  if (!serverPath) {
    console.error(USAGE);
    process.exit(1);
  }

  // 1. Load config
  let config: Config;
  try {
    config = loadConfig(process.env, serverPath);
  } catch (err) {
    console.error('Failed to load config:', String(err));
    process.exit(1);
  }

  // 2. Configure logging
  configureLogger({
    level: parseLogLevel(config.logging.level),
    file: config.logging.file,
    console: config.logging.console,
  });

  info('Weather chat starting...', { locale: config.locale, model: config.llm.model });

  // 3. Initialize services
  let services: ServiceContainer;
  try {
    services = await initServices(config);
  } catch (err) {
    error('Failed to initialize services', { error: String(err) });
    process.exit(1);
  }

  // 4. Create router and agent
  const router = new IntentRouter(services.llm, services.locale, {
    classifierMaxTokens: config.llm.classifierMaxTokens,
  });

  const agent = new Agent({
    locale: services.locale,
    llm: services.llm,
    router,
    weather: services.weather,
    memory: services.memory,
  });

  // 5. Handle shutdown
  let stopping = false;
  const shutdown = async (exitCode: number) => {
    if (stopping) return;
    stopping = true;
    info('Shutting down...');
    await closeServices(services);
    process.exit(exitCode);
  };

  process.on('SIGTERM', () => void shutdown(0));
  process.on('SIGINT', () => {
    console.log(`\n${services.locale.repl.goodbye}`);
    void shutdown(0);
  });

  // 6. Start REPL
  await startRepl(agent, services.locale);
  await shutdown(0);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
