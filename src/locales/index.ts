// src/locales/index.ts
import fs from 'fs';
import { z } from 'zod';
import type { Locale } from '../config.js';
import type { LocalePack, LocationLists } from './types.js';
import { createZhLocale } from './zh.js';
import { createEnLocale } from './en.js';

const LocationListsSchema = z.object({
  cities: z.array(z.string().min(1)),
  provinces: z.array(z.string().min(1)),
});

const factories: Record<Locale, (lists: LocationLists) => LocalePack> = {
  zh: createZhLocale,
  en: createEnLocale,
};

const cache = new Map<Locale, LocalePack>();

export function loadLocationLists(locale: Locale): LocationLists {
  const file = new URL(`../../data/locations.${locale}.json`, import.meta.url);
  return LocationListsSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

export function getLocale(locale: Locale): LocalePack {
  let pack = cache.get(locale);
  if (!pack) {
    pack = factories[locale](loadLocationLists(locale));
    cache.set(locale, pack);
  }
  return pack;
}

export type { LocalePack, LocationLists, Role, SuitabilityLevel, SuitabilityReason } from './types.js';
