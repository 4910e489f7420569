/**
 * Corpus generation from saved ranked word-frequency pages
 */

import type { RankedWord } from './types.js';

const ROW = /<tr>\r?\n<td>([0-9]+)<\/td>\r?\n<td><a[^>]*>([^<]*)<\/a><\/td>/g;

/**
 * Pull `{ rank, word }` rows out of one page, in page order
 * @param html - Page source with one table row per ranked word
 */
export function extractRankedWords(html: string): RankedWord[] {
  const out: RankedWord[] = [];
  for (const m of html.matchAll(ROW)) {
    out.push({ rank: parseInt(m[1], 10), word: m[2] });
  }
  return out;
}

/**
 * Merge the rows of several pages into corpus text, most frequent first.
 * Rows sharing a rank keep the order their pages were given in.
 */
export function buildCorpusText(pages: string[]): string {
  const rows = pages.flatMap(extractRankedWords);
  return rows
    .map((row, i) => ({ row, i }))
    .sort((a, b) => (a.row.rank - b.row.rank) || (a.i - b.i))
    .map(e => e.row.word)
    .join('\n');
}
