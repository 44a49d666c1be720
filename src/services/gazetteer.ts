// src/services/gazetteer.ts
// Native place names -> the English names the weather provider expects

import fs from 'fs';
import { z } from 'zod';
import { pinyin } from 'pinyin-pro';
import { debug } from '../utils/logger.js';

/** Splits text into Latin syllables, one per character */
export type Transliterator = (text: string) => string[];

export interface GazetteerOptions {
  /** null disables the transliteration fallback */
  transliterate?: Transliterator | null;
}

const HAN = /\p{Script=Han}/u;
const ENGLISH_SUFFIX = /\s+(?:city|province|autonomous region)$/i;

const EntriesSchema = z.record(z.string().min(1), z.string().min(1));

export const pinyinTransliterator: Transliterator = (text) =>
  pinyin(text, { toneType: 'none', type: 'array' });

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export class Gazetteer {
  private entries: Map<string, string>;
  private byEnglish: Map<string, string>;
  // Longest key first so "黑龙江省" never resolves through a shorter key
  private nativeKeys: string[];
  private transliterate: Transliterator | null;

  constructor(entries: Record<string, string>, options: GazetteerOptions = {}) {
    this.entries = new Map(Object.entries(entries));
    this.byEnglish = new Map();
    for (const english of this.entries.values()) {
      this.byEnglish.set(english.toLowerCase(), english);
    }
    this.nativeKeys = [...this.entries.keys()].sort((a, b) => b.length - a.length);
    this.transliterate = options.transliterate === undefined ? pinyinTransliterator : options.transliterate;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Resolve a place name to the provider's English form. Never throws and
   * never returns an empty string for non-empty input.
   */
  normalize(name: string): string {
    const trimmed = name.trim();
    if (!trimmed) return name;

    const exact = this.entries.get(trimmed) ?? this.lookupEnglish(trimmed);
    if (exact) return exact;

    // Administrative suffixes: 北京市, 广东省, 西双版纳州...
    for (const key of this.nativeKeys) {
      if (trimmed.startsWith(key) || trimmed.includes(key)) {
        const english = this.entries.get(key);
        if (english) return english;
      }
    }

    return this.transliterateName(trimmed);
  }

  private lookupEnglish(name: string): string | undefined {
    return this.byEnglish.get(name.toLowerCase())
      ?? this.byEnglish.get(name.replace(ENGLISH_SUFFIX, '').toLowerCase());
  }

  private transliterateName(name: string): string {
    if (!this.transliterate || !HAN.test(name)) return name;

    try {
      const latin = this.transliterate(name).join('').replace(/[^A-Za-z]/g, '');
      if (latin) {
        debug('Gazetteer transliterated unknown name', { name, latin });
        return capitalize(latin);
      }
    } catch (err) {
      debug('Gazetteer transliteration failed', { name, error: String(err) });
    }

    return name;
  }
}

export function loadGazetteer(options: GazetteerOptions = {}): Gazetteer {
  const file = new URL('../../data/gazetteer.json', import.meta.url);
  const entries = EntriesSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  return new Gazetteer(entries, options);
}
