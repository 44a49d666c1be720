// src/tools/types.ts

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolContent {
  type: string;
  text?: string;
}

export interface ToolCallResult {
  content: ToolContent[];
  /** Set by the server when the tool itself reported a failure */
  isError?: boolean;
}

/** Channel to the sidecar process that hosts the tools */
export interface ToolTransport {
  hasTool(name: string): boolean;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult | null>;
}

// === Weather results ===

export interface WeatherFields {
  location?: string;
  country?: string;
  /** °C */
  temperature: number;
  /** % */
  humidity?: number;
  /** m/s */
  windSpeed: number;
  description: string;
  airQuality?: number;
}

export type WeatherErrorReason = 'unavailable' | 'empty' | 'provider' | 'incomplete' | 'transport';

/**
 * The only shapes downstream code sees, whatever the tool returned.
 */
export type NormalizedWeatherResult =
  | { kind: 'structured'; fields: WeatherFields }
  | { kind: 'text'; text: string }
  | { kind: 'error'; reason: WeatherErrorReason; message: string };

export interface WeatherInvoker {
  invoke(city: string): Promise<NormalizedWeatherResult>;
}
