// src/tools/weather.ts
import { z } from 'zod';
import type { Gazetteer } from '../services/gazetteer.js';
import type {
  NormalizedWeatherResult,
  ToolTransport,
  WeatherErrorReason,
  WeatherFields,
  WeatherInvoker,
} from './types.js';
import { debug, info, warn } from '../utils/logger.js';

export const DEFAULT_WEATHER_TOOL = 'query_weather';

// Current-weather payload as the provider (OpenWeatherMap) returns it
const ProviderPayloadSchema = z.object({
  name: z.string().optional(),
  sys: z.object({ country: z.string().optional() }).passthrough().optional(),
  main: z.object({
    temp: z.number(),
    humidity: z.number().optional(),
  }).passthrough(),
  weather: z.array(z.object({ description: z.string() }).passthrough()).min(1),
  wind: z.object({ speed: z.number() }).passthrough(),
  air_quality: z.object({ aqi: z.number().optional() }).passthrough().optional(),
}).passthrough();

const WEATHER_SECTIONS = ['main', 'weather', 'wind'];

type JsonParse = { ok: true; value: unknown } | { ok: false };

function parseJson(text: string): JsonParse {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function failure(reason: WeatherErrorReason, message: string): NormalizedWeatherResult {
  return { kind: 'error', reason, message };
}

/**
 * Reduce whatever the weather tool sent back to a NormalizedWeatherResult.
 * JSON errors and incomplete payloads become errors; anything that is not
 * a weather payload passes through as pre-formatted text.
 */
export function normalizeWeatherText(text: string): NormalizedWeatherResult {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return { kind: 'text', text };
  }

  const data = parsed.value;
  if (data === null || (Array.isArray(data) && data.length === 0) || (isRecord(data) && Object.keys(data).length === 0)) {
    return failure('empty', 'empty result');
  }

  if (!isRecord(data)) {
    return { kind: 'text', text };
  }

  if ('error' in data) {
    const message = typeof data.error === 'string' ? data.error : JSON.stringify(data.error);
    return failure('provider', message);
  }

  const payload = ProviderPayloadSchema.safeParse(data);
  if (payload.success) {
    const { name, sys, main, weather, wind, air_quality } = payload.data;
    const fields: WeatherFields = {
      location: name,
      country: sys?.country,
      temperature: main.temp,
      humidity: main.humidity,
      windSpeed: wind.speed,
      description: weather[0].description,
      airQuality: air_quality?.aqi,
    };
    return { kind: 'structured', fields };
  }

  if (WEATHER_SECTIONS.some((section) => section in data)) {
    const missing = payload.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return failure('incomplete', `incomplete weather payload: ${missing}`);
  }

  return { kind: 'text', text };
}

export interface WeatherToolOptions {
  toolName?: string;
}

/**
 * Calls the sidecar's weather tool for a city and normalizes the reply.
 * Never throws and never touches dialogue memory.
 */
export class WeatherTool implements WeatherInvoker {
  private transport: ToolTransport;
  private gazetteer: Gazetteer;
  private toolName: string;

  constructor(transport: ToolTransport, gazetteer: Gazetteer, options: WeatherToolOptions = {}) {
    this.transport = transport;
    this.gazetteer = gazetteer;
    this.toolName = options.toolName ?? DEFAULT_WEATHER_TOOL;
  }

  async invoke(city: string): Promise<NormalizedWeatherResult> {
    if (!this.transport.hasTool(this.toolName)) {
      warn('Weather tool not available on server', { tool: this.toolName });
      return failure('unavailable', `tool ${this.toolName} is not available`);
    }

    const normalized = this.gazetteer.normalize(city);
    info('Calling weather tool', { city, normalized });

    try {
      const result = await this.transport.callTool(this.toolName, { city: normalized });

      const text = result?.content
        .filter((item) => item.type === 'text' && item.text)
        .map((item) => item.text)
        .join('\n');

      if (!result || !text) {
        warn('Weather tool returned an empty result', { city: normalized });
        return failure('empty', 'empty result');
      }

      if (result.isError) {
        warn('Weather tool reported an error', { city: normalized, message: text });
        return failure('provider', text);
      }

      const normalizedResult = normalizeWeatherText(text);
      debug('Weather tool result', { city: normalized, kind: normalizedResult.kind });
      if (normalizedResult.kind === 'error') {
        warn('Weather result is unusable', { reason: normalizedResult.reason, message: normalizedResult.message });
      }
      return normalizedResult;
    } catch (err) {
      warn('Weather tool call failed', { city: normalized, error: String(err) });
      return failure('transport', String(err));
    }
  }
}
