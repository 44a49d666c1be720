// src/server/weather.ts
// OpenWeatherMap current-weather lookup for the tool server

import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerConfig } from '../config.js';
import { debug, info, warn } from '../utils/logger.js';

export type WeatherPayload = Record<string, unknown>;

const USER_AGENT = 'weather-chat/0.1';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

function show(value: unknown, fallback: string): string {
  return typeof value === 'string' || typeof value === 'number' ? String(value) : fallback;
}

/**
 * Fetch current conditions for a city in metric units. Failures come back
 * as `{ error }` rather than being thrown.
 */
export async function fetchWeather(city: string, config: ServerConfig['weather']): Promise<WeatherPayload> {
  if (!config.apiKey) {
    return { error: 'OPENWEATHERMAP_API_KEY is not set' };
  }

  const url = new URL(config.url);
  url.searchParams.set('q', city);
  url.searchParams.set('appid', config.apiKey);
  url.searchParams.set('units', 'metric');
  url.searchParams.set('lang', 'en');

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeout);

  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: controller.signal,
    });

    if (!response.ok) {
      warn('Weather provider returned an error', { city, status: response.status });
      return { error: `HTTP error: ${response.status}` };
    }

    const body: unknown = await response.json();
    debug('Weather provider response', { city });
    return isRecord(body) ? body : { error: 'Request failed: unexpected response body' };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn('Weather request failed', { city, error: message });
    return { error: `Request failed: ${message}` };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Human-readable report, one field per line.
 */
export function formatWeather(data: WeatherPayload): string {
  if ('error' in data) {
    return `⚠️ ${show(data.error, 'unknown error')}`;
  }

  const main = section(data, 'main');
  const weatherList = Array.isArray(data.weather) ? data.weather : [];
  const first: unknown = weatherList[0];
  const conditions = isRecord(first) ? first.description : undefined;

  return [
    `🌍 ${show(data.name, 'Unknown')}, ${show(section(data, 'sys').country, 'Unknown')}`,
    `🌡 Temperature: ${show(main.temp, 'N/A')}°C`,
    `💧 Humidity: ${show(main.humidity, 'N/A')}%`,
    `🌬 Wind Speed: ${show(section(data, 'wind').speed, 'N/A')} m/s`,
    `🌤 Conditions: ${show(conditions, 'Unknown')}`,
  ].join('\n');
}

export function renderWeather(data: WeatherPayload, format: ServerConfig['weather']['format']): string {
  return format === 'text' ? formatWeather(data) : JSON.stringify(data);
}

// === MCP server ===

export const WEATHER_TOOL_NAME = 'query_weather';

export function createWeatherServer(config: ServerConfig): McpServer {
  const server = new McpServer({ name: 'WeatherServer', version: '0.1.0' });

  server.tool(
    WEATHER_TOOL_NAME,
    "Input a city name in English and return today's weather information.",
    { city: z.string().describe('City name in English, e.g. Beijing') },
    async ({ city }) => {
      info('query_weather', { city });
      const data = await fetchWeather(city, config.weather);
      return {
        content: [{ type: 'text' as const, text: renderWeather(data, config.weather.format) }],
        // Failures are flagged so clients never mistake them for a report
        isError: 'error' in data,
      };
    }
  );

  return server;
}
