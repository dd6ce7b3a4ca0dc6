/**
 * Keyword matching over lower-cased utterances.
 * Alphabetic keywords match whole words or phrases; symbolic keywords (+ - * /) match anywhere.
 */

const WORDLIKE = /^[a-z' ]+$/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const cache = new Map<string, RegExp>();

function keywordPattern(keyword: string): RegExp {
  let re = cache.get(keyword);
  if (!re) {
    re = new RegExp(`(^|[^a-z0-9'])${escapeRegExp(keyword)}($|[^a-z0-9'])`);
    cache.set(keyword, re);
  }
  return re;
}

export function containsKeyword(text: string, keyword: string): boolean {
  if (WORDLIKE.test(keyword)) return keywordPattern(keyword).test(text);
  return text.includes(keyword);
}

export function matchesAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => containsKeyword(text, k));
}

/** Pick one entry with the injected random source (Math.random in production). */
export function pick<T>(pool: readonly T[], random: () => number): T {
  if (pool.length === 0) throw new RangeError("cannot pick from an empty pool");
  const index = Math.min(pool.length - 1, Math.floor(random() * pool.length));
  return pool[index];
}

/** Replace {key} placeholders. Unknown keys stay as they are. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole);
}
