// src/services/index.ts
import { Config } from '../config.js';
import { getLocale, type LocalePack } from '../locales/index.js';
import { LLMService } from './llm.js';
import { McpToolClient } from './mcp.js';
import { Gazetteer, loadGazetteer } from './gazetteer.js';
import { DialogueMemory } from './memory.js';
import { WeatherTool } from '../tools/weather.js';
import { info, warn } from '../utils/logger.js';

export interface ServiceContainer {
  config: Config;
  locale: LocalePack;

  // Infrastructure
  llm: LLMService;
  tools: McpToolClient;

  // Weather
  gazetteer: Gazetteer;
  weather: WeatherTool;

  // Session
  memory: DialogueMemory;
}

export async function initServices(config: Config): Promise<ServiceContainer> {
  info('Initializing services...', { locale: config.locale });

  if (!config.tool.serverPath) {
    throw new Error('Tool server path is required');
  }

  const locale = getLocale(config.locale);

  const llm = new LLMService(config);
  const tools = new McpToolClient(config);

  // Health probe only logs; an unreachable model still lets the session start
  await llm.initialize();
  await tools.connect(config.tool.serverPath);

  const gazetteer = loadGazetteer();
  const weather = new WeatherTool(tools, gazetteer, { toolName: config.tool.name });

  const memory = new DialogueMemory({
    capacity: config.memory.maxTurns,
    contextPairs: config.memory.contextPairs,
    roleLabels: locale.roles,
  });

  info('All services initialized', { gazetteerEntries: gazetteer.size, llmHealthy: llm.isHealthy() });

  return {
    config,
    locale,
    llm,
    tools,
    gazetteer,
    weather,
    memory,
  };
}

export async function closeServices(services: ServiceContainer): Promise<void> {
  try {
    await services.tools.close();
  } catch (err) {
    warn('Error while closing services', { error: String(err) });
  }
  info('Services closed');
}
