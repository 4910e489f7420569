/**
 * Translation tables: rendering, extension and decoding
 */

import type { CipherChar, PlainChar, Translation, Word } from './types.js';

const APOSTROPHE = "'";

export const EMPTY_TRANSLATION: Translation = new Map();

/**
 * Render a ciphertext word under a translation.
 * Decoded characters become their plaintext letter, apostrophes stay
 * literal and everything else is left as uppercase ciphertext.
 * Used only to build candidate probes.
 */
export function render(word: Word, translation: Translation): string {
  let out = '';
  for (const ch of word) {
    out += ch === APOSTROPHE ? ch : translation.get(ch) ?? ch;
  }
  return out;
}

/**
 * Extend a translation so that `word` decodes to `candidate`.
 * @param word - Uppercase ciphertext word
 * @param candidate - Corpus word with the same pattern
 * @param translation - Current table, left untouched
 * @returns A new table, or undefined when some unmapped ciphertext letter
 *          would take a plaintext letter another ciphertext letter owns
 */
export function extend(word: Word, candidate: Word, translation: Translation): Translation | undefined {
  const cipher = Array.from(word);
  const plain = Array.from(candidate);
  if (cipher.length !== plain.length) return undefined;

  const taken = new Set<PlainChar>(translation.values());
  const staged = new Map<CipherChar, PlainChar>();

  for (let i = 0; i < cipher.length; i++) {
    const c = cipher[i];
    if (c === APOSTROPHE || translation.has(c)) continue;

    const p = plain[i];
    const prior = staged.get(c);
    if (prior !== undefined) {
      if (prior !== p) return undefined;
      continue;
    }
    if (taken.has(p)) return undefined;

    staged.set(c, p);
    taken.add(p);
  }

  if (staged.size === 0) return translation;
  return new Map([...translation, ...staged]);
}

/** Apply a translation to every character of normalized ciphertext. */
export function decodeText(text: string, translation: Translation): string {
  let out = '';
  for (const ch of text) out += translation.get(ch) ?? ch;
  return out;
}

export function isInjective(translation: Translation): boolean {
  return new Set(translation.values()).size === translation.size;
}

/**
 * Substitution pairs sorted by their `CIPHER -> plain` rendering
 */
export function substitutionPairs(translation: Translation): Array<[CipherChar, PlainChar]> {
  return [...translation.entries()]
    .map(([c, p]): [string, [CipherChar, PlainChar]] => [`${c} -> ${p}`, [c, p]])
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([, pair]) => pair);
}
