// src/config.ts
import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

// === Schema ===

const LocaleSchema = z.enum(['zh', 'en']);

const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  file: z.string().optional(),
  console: z.boolean(),
});

const ConfigSchema = z.object({
  locale: LocaleSchema,

  llm: z.object({
    url: z.string().url(),
    apiKey: z.string().min(1),
    model: z.string().min(1),
    maxTokens: z.number().int().positive(),
    classifierMaxTokens: z.number().int().positive(),
    timeout: z.number().positive(),
    healthTimeout: z.number().positive(),
  }),

  tool: z.object({
    serverPath: z.string().optional(),
    name: z.string().min(1),
    timeout: z.number().positive(),
  }),

  memory: z.object({
    // Dialogue memory never holds more than five turns
    maxTurns: z.number().int().positive().max(5),
    contextPairs: z.number().int().positive(),
  }),

  logging: LoggingSchema,
});

const ServerConfigSchema = z.object({
  weather: z.object({
    apiKey: z.string().optional(),
    url: z.string().url(),
    format: z.enum(['json', 'text']),
    timeout: z.number().positive(),
  }),
  logging: LoggingSchema,
});

export type Locale = z.infer<typeof LocaleSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

type Env = Record<string, string | undefined>;

// === Loader ===

function int(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

function loadLogging(env: Env): unknown {
  return {
    level: env.LOG_LEVEL || 'info',
    file: env.LOG_FILE || undefined,
    console: env.LOG_CONSOLE !== 'false',
  };
}

/**
 * Build the client configuration once at startup. The result is passed to
 * every service constructor; nothing reads process.env after this.
 */
export function loadConfig(env: Env = process.env, toolServerPath?: string): Config {
  return ConfigSchema.parse({
    locale: env.LOCALE || 'zh',
    llm: {
      url: env.LLM_URL || 'http://localhost:8180/v1',
      apiKey: env.LLM_API_KEY || 'not-needed-for-local',
      model: env.LLM_MODEL || 'local',
      maxTokens: int(env.LLM_MAX_TOKENS, 1024),
      classifierMaxTokens: int(env.LLM_CLASSIFIER_MAX_TOKENS, 50),
      timeout: int(env.LLM_TIMEOUT, 30000),
      healthTimeout: int(env.LLM_HEALTH_TIMEOUT, 5000),
    },
    tool: {
      serverPath: toolServerPath ? path.resolve(toolServerPath) : undefined,
      name: env.TOOL_NAME || 'query_weather',
      timeout: int(env.TOOL_TIMEOUT, 30000),
    },
    memory: {
      maxTurns: int(env.MEMORY_MAX_TURNS, 5),
      contextPairs: int(env.MEMORY_CONTEXT_PAIRS, 3),
    },
    logging: loadLogging(env),
  });
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return ServerConfigSchema.parse({
    weather: {
      apiKey: env.OPENWEATHERMAP_API_KEY || undefined,
      url: env.OPENWEATHERMAP_URL || 'https://api.openweathermap.org/data/2.5/weather',
      format: env.WEATHER_SERVER_FORMAT || 'json',
      timeout: int(env.WEATHER_TIMEOUT, 30000),
    },
    logging: loadLogging(env),
  });
}
