// src/locales/types.ts
import type { Locale } from '../config.js';

export type Role = 'user' | 'assistant';

export type SuitabilityLevel = 'suitable' | 'marginal' | 'unsuitable';

export type SuitabilityReason =
  | 'highTemperature'
  | 'extremeHeat'
  | 'lowTemperature'
  | 'extremeCold'
  | 'precipitation'
  | 'strongWind'
  | 'veryStrongWind'
  | 'poorAirQuality'
  | 'badAirQuality';

/** Enumerated place names the location extractor recognizes, per locale */
export interface LocationLists {
  cities: string[];
  provinces: string[];
}

export interface LocationPatterns {
  /** "<X> now/today/'s weather" */
  phrase: RegExp;
  city: RegExp;
  province: RegExp;
}

/**
 * Everything that differs between the Chinese and English assistants.
 * The routing and composing logic is shared.
 */
export interface LocalePack {
  id: Locale;

  weatherKeywords: string[];
  outdoorCues: string[];
  fillers: RegExp[];
  patterns: LocationPatterns;

  /** Substrings in a classifier reply that mean "no tool" (compared lowercased) */
  negativeMarkers: string[];
  /** Captures the city named in a classifier reply */
  cityLabel: RegExp;

  roles: Record<Role, string>;
  /** Stand-in for an empty dialogue context inside prompts */
  noContext: string;

  prompts: {
    /** Placeholders: {context} */
    classifier: string;
    /** Placeholders: {context}, {query} */
    direct: string;
  };

  messages: {
    toolFailure: (city: string) => string;
    directFailure: string;
    turnFailure: string;
  };

  report: {
    placeholder: string;
    heading: (location: string) => string;
    temperature: string;
    humidity: string;
    windSpeed: string;
    conditions: string;
  };

  suitability: {
    levels: Record<Exclude<SuitabilityLevel, 'suitable'>, string>;
    reasons: Record<SuitabilityReason, string>;
    reasonSeparator: string;
    good: string;
    warning: (reasons: string, level: string) => string;
  };

  repl: {
    banner: string;
    prompt: string;
    cleared: string;
    goodbye: string;
  };
}
