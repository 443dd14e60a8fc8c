import { readFileSync } from 'node:fs';

/**
 * Text folding and tokenization shared by filters and the in-process search vector.
 *
 * Folding removes diacritics and case so "Híbrido", "HIBRIDO" and "hibrido" compare equal.
 * Tokenization folds, splits on anything that is not a letter or digit, drops Portuguese stop
 * words and applies a light suffix stemmer (plural and a few inflections), which is close
 * enough to the database's `portuguese` text search configuration for ranking to agree on
 * the inventory vocabulary.
 */

const STOPWORDS: ReadonlySet<string> = new Set(loadStopwords());

const MIN_STEM_LENGTH = 4;

const SUFFIX_RULES: ReadonlyArray<readonly [suffix: string, replacement: string]> = [
  ['oes', 'ao'],
  ['aes', 'ao'],
  ['ais', 'al'],
  ['eis', 'el'],
  ['ois', 'ol'],
  ['ns', 'm'],
  ['res', 'r'],
  ['zes', 'z'],
  ['les', 'l'],
];

export function foldText(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(value: string): string[] {
  const folded = foldText(value);
  if (!folded) return [];
  const tokens: string[] = [];
  for (const part of folded.split(/[^a-z0-9]+/)) {
    if (!part || STOPWORDS.has(part)) continue;
    tokens.push(stem(part));
  }
  return tokens;
}

export function stem(word: string): string {
  if (word.length < MIN_STEM_LENGTH || /\d/.test(word)) return word;
  for (const [suffix, replacement] of SUFFIX_RULES) {
    if (word.endsWith(suffix) && word.length - suffix.length >= 2) {
      return word.slice(0, -suffix.length) + replacement;
    }
  }
  if (word.endsWith('s') && !word.endsWith('ss') && !word.endsWith('us')) {
    return word.slice(0, -1);
  }
  return word;
}

function loadStopwords(): string[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/portuguese-stopwords.json', import.meta.url), 'utf8'),
  );
  if (!Array.isArray(raw)) {
    throw new TypeError('portuguese-stopwords.json must contain an array of words');
  }
  return raw.filter((word): word is string => typeof word === 'string');
}
