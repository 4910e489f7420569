/**
 * Ciphertext tokenization
 */

import type { Word } from './types.js';

const WORD_RUN = /[\p{L}\p{N}']+/gu;
const HAS_ALNUM = /[\p{L}\p{N}]/u;

export function normalizeCiphertext(text: string): string {
  return text.toUpperCase();
}

/**
 * Split ciphertext into words
 * - Convert to uppercase
 * - Keep maximal runs of letters, digits and apostrophes
 * - Everything else separates words
 * - Drop runs that are only apostrophes
 */
export function extractWords(text: string): Word[] {
  const runs = normalizeCiphertext(text).match(WORD_RUN) ?? [];
  return runs.filter(run => HAS_ALNUM.test(run));
}

/**
 * Order words for search: longest first, ties keep their original order.
 * Longer words constrain more letters, so resolving them first prunes early.
 */
export function orderForSearch(words: readonly Word[]): Word[] {
  return words
    .map((word, i) => ({ word, i, len: Array.from(word).length }))
    .sort((a, b) => (b.len - a.len) || (a.i - b.i))
    .map(e => e.word);
}
