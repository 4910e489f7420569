import fs from 'node:fs';
import { CorpusUnavailableError } from './errors.js';
import { PatternIndex } from './patternIndex.js';
import type { Word } from './types.js';

/**
 * Split corpus text into words, one per line, most frequent first.
 * Lines pass through untouched; a final line terminator adds no empty word.
 */
export function parseCorpus(text: string): Word[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Read a corpus file into its word list.
 * @throws CorpusUnavailableError when the file is missing or unreadable
 */
export function readCorpusFile(path: string): Word[] {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf8');
  } catch (err) {
    throw new CorpusUnavailableError(path, err);
  }
  return parseCorpus(text);
}

/** Load a corpus file into a pattern index. */
export function loadCorpus(path: string): PatternIndex {
  return PatternIndex.build(readCorpusFile(path));
}
