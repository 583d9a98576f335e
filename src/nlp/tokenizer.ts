/**
 * SignalRadar — Tokenizer & Lemmatizer
 *
 * Rule-based, dependency-free text normalization for keyword
 * extraction and term matching.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

// ============================================================
// STOPWORDS
// ============================================================

const STOPWORDS_URL = new URL('../../data/stopwords.json', import.meta.url);

let stopwords: ReadonlySet<string> | null = null;

export function getStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const words = z.array(z.string()).parse(JSON.parse(readFileSync(STOPWORDS_URL, 'utf8')));
    stopwords = new Set(words.map(w => w.toLowerCase()));
  }
  return stopwords;
}

export function isStopword(token: string): boolean {
  return getStopwords().has(token);
}

// ============================================================
// TOKENIZE
// ============================================================

const URL_PATTERN = /\bhttps?:\/\/\S+|\bwww\.\S+/gi;
const MENTION_PATTERN = /@[\p{L}\p{N}_]+/gu;
const TOKEN_SPLIT = /[^\p{L}\p{N}-]+/u;

/**
 * Lower-case word tokens. URLs and @mentions are dropped, hashtags keep
 * their word, inner hyphens survive. Tokens under 3 chars and pure
 * numbers are discarded.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(URL_PATTERN, ' ')
    .replace(MENTION_PATTERN, ' ')
    .replace(/#/g, ' ')
    .split(TOKEN_SPLIT)
    .map(token => token.replace(/^-+|-+$/g, ''))
    .filter(token => token.length >= 3 && !/^[\d-]+$/.test(token));
}

// ============================================================
// LEMMATIZE
// ============================================================

const IRREGULAR: Record<string, string> = {
  children: 'child',
  people: 'person',
  men: 'man',
  women: 'woman',
  mice: 'mouse',
  feet: 'foot',
  teeth: 'tooth',
  geese: 'goose',
  analyses: 'analysis',
  indices: 'index',
  matrices: 'matrix',
  vertices: 'vertex',
  criteria: 'criterion',
  phenomena: 'phenomenon',
  series: 'series',
  species: 'species',
  news: 'news',
};

/**
 * Reduce a lower-case token to its singular form.
 */
export function lemmatize(token: string): string {
  const irregular = IRREGULAR[token];
  if (irregular !== undefined) return irregular;
  if (token.length <= 3) return token;

  if (token.endsWith('ies') && token.length > 4) return `${token.slice(0, -3)}y`;
  if (token.endsWith('sses')) return token.slice(0, -2);
  if (token.endsWith('xes') || token.endsWith('ches') || token.endsWith('shes')) return token.slice(0, -2);
  if (token.endsWith('s') && !token.endsWith('ss') && !token.endsWith('us') && !token.endsWith('is')) {
    return token.slice(0, -1);
  }
  return token;
}

// ============================================================
// TERM MATCHING
// ============================================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const patternCache = new Map<string, RegExp>();

/**
 * Whole-word, case-insensitive pattern for a term.
 * Words of a multi-word term may be separated by any whitespace.
 */
export function termPattern(term: string): RegExp {
  const key = term.trim().toLowerCase();
  let pattern = patternCache.get(key);
  if (!pattern) {
    const body = key.split(/\s+/).map(escapeRegExp).join('\\s+');
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'iu');
    patternCache.set(key, pattern);
  }
  return pattern;
}

export function containsTerm(text: string, term: string): boolean {
  if (!term.trim()) return false;
  return termPattern(term).test(text);
}
