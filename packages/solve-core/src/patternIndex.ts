/**
 * Pattern-bucketed corpus index for candidate lookup
 */

import { patternOf } from './pattern.js';
import type { Pattern, Word } from './types.js';

const APOSTROPHE = "'";

function isLower(ch: string): boolean {
  return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

/**
 * Immutable map from pattern to the corpus words sharing it.
 * Buckets keep input order, which is the frequency rank of the corpus and
 * therefore the order the solver tries candidates in.
 */
export class PatternIndex {
  private readonly buckets: ReadonlyMap<Pattern, readonly Word[]>;
  readonly size: number;

  private constructor(buckets: Map<Pattern, Word[]>, size: number) {
    this.buckets = buckets;
    this.size = size;
  }

  /**
   * Build an index from a frequency-ordered word list.
   * Words are not validated; duplicates are kept as they come.
   */
  static build(words: Iterable<Word>): PatternIndex {
    const buckets = new Map<Pattern, Word[]>();
    let size = 0;

    for (const word of words) {
      const pattern = patternOf(word);
      const bucket = buckets.get(pattern);
      if (bucket) {
        bucket.push(word);
      } else {
        buckets.set(pattern, [word]);
      }
      size++;
    }

    return new PatternIndex(buckets, size);
  }

  static empty(): PatternIndex {
    return PatternIndex.build([]);
  }

  get patternCount(): number {
    return this.buckets.size;
  }

  bucket(pattern: Pattern): readonly Word[] {
    return this.buckets.get(pattern) ?? [];
  }

  /**
   * Find corpus words that could match a partially decoded word.
   *
   * Uppercase letters in the probe are unknown ciphertext letters and only
   * constrain through the shared pattern. Lowercase letters and apostrophes
   * are already decoded and must match exactly, and an apostrophe in the
   * corpus word must meet an apostrophe in the probe.
   * For example, MXM matches wow but not cat, and cIF matches cat but not bat.
   * @param probe - Word rendered under the current translation
   * @returns Matching words in corpus order
   */
  candidates(probe: string): Word[] {
    if (probe.length === 0) return [];

    const bucket = this.buckets.get(patternOf(probe));
    if (!bucket) return [];

    const chars = Array.from(probe);
    const out: Word[] = [];

    for (const word of bucket) {
      const wordChars = Array.from(word);
      let valid = true;
      for (let i = 0; i < wordChars.length; i++) {
        const p = chars[i];
        const w = wordChars[i];
        if ((isLower(p) || p === APOSTROPHE || w === APOSTROPHE) && p !== w) {
          valid = false;
          break;
        }
      }
      if (valid) out.push(word);
    }

    return out;
  }
}
