// src/locales/patterns.ts

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex alternation over a closed list of names. Longer names come first so
 * that a name is never shadowed by a shorter one it starts with.
 */
export function alternation(names: string[]): string {
  return [...new Set(names)]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}
