// src/router/location.ts
import type { LocalePack } from '../locales/types.js';

export interface LocationQuery {
  rawText: string;
  resolvedCity: string | null;
  tier?: 'phrase' | 'city' | 'province';
}

const TIERS = ['phrase', 'city', 'province'] as const;

function stripFillers(text: string, pack: LocalePack): string {
  let result = text;
  for (const filler of pack.fillers) {
    result = result.replace(filler, '');
  }
  return result.replace(/\s{2,}/g, ' ').trim();
}

/**
 * Closed-vocabulary location lookup. Tiers, first match wins:
 * 1. "<X> now/today/'s weather" phrasing, any X
 * 2. an enumerated city, with optional administrative suffix
 * 3. an enumerated province-level region
 */
export function extractLocation(utterance: string, pack: LocalePack): LocationQuery {
  const text = stripFillers(utterance, pack);

  for (const tier of TIERS) {
    const match = text.match(pack.patterns[tier]);
    const city = match?.[1]?.trim();
    if (city) {
      return { rawText: utterance, resolvedCity: city, tier };
    }
  }

  return { rawText: utterance, resolvedCity: null };
}

export function isWeatherQuery(utterance: string, pack: LocalePack): boolean {
  const lower = utterance.toLowerCase();
  return pack.weatherKeywords.some((keyword) => lower.includes(keyword));
}

export function hasOutdoorCue(utterance: string, pack: LocalePack): boolean {
  const lower = utterance.toLowerCase();
  return pack.outdoorCues.some((cue) => lower.includes(cue));
}
