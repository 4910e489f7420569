/**
 * Structural word signatures
 */

import type { Pattern } from './types.js';

/**
 * Hash a word into its letter-repetition pattern.
 * MXM becomes 010, ASDF becomes 0123, AFAFA becomes 01010.
 *
 * Words with more than ten distinct characters join their ranks with '.'
 * so that rank 10 never collides with ranks 1 and 0.
 * @param word - Any word, case-significant
 */
export function patternOf(word: string): Pattern {
  const seen = new Map<string, number>();
  const ranks: number[] = [];

  for (const ch of word) {
    let rank = seen.get(ch);
    if (rank === undefined) {
      rank = seen.size;
      seen.set(ch, rank);
    }
    ranks.push(rank);
  }

  return seen.size > 10 ? ranks.join('.') : ranks.join('');
}
