// src/agent/prompts.ts
import type { LocalePack } from '../locales/types.js';

// Function replacers: dialogue text may contain "$&" and friends
function fill(template: string, values: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(values)) {
    result = result.replace(`{${key}}`, () => value);
  }
  return result;
}

/**
 * System prompt for the intent classifier. The utterance itself goes in the
 * user message.
 */
export function buildClassifierPrompt(pack: LocalePack, context: string): string {
  return fill(pack.prompts.classifier, {
    context: context || pack.noContext,
  });
}

export function buildDirectPrompt(pack: LocalePack, context: string, query: string): string {
  return fill(pack.prompts.direct, {
    context: context || pack.noContext,
    query,
  });
}
