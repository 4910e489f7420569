/**
 * Backtracking search for a substitution-cipher translation
 */

import type { PatternIndex } from './patternIndex.js';
import { extractWords, normalizeCiphertext, orderForSearch } from './tokenize.js';
import { EMPTY_TRANSLATION, decodeText, extend, render } from './translation.js';
import type { Translation, Word } from './types.js';

export interface SearchVisit {
  tolerance: number;
  depth: number;          // index of the next word to resolve
  skipped: number;
  translation: Translation;
}

export interface SolverOptions {
  tolerances?: readonly number[];            // overrides the default schedule
  maxNodes?: number;                         // per tolerance level
  timeLimitMs?: number;                      // per tolerance level
  onVisit?: (visit: SearchVisit) => void;
}

export interface SolveStats {
  nodes: number;
  levels: number[];
}

export interface Solution {
  status: 'solved';
  translation: Translation;
  decodedText: string;
  tolerance: number;
  unmatched: Word[];
  stats: SolveStats;
}

export interface Unsolved {
  status: 'unsolved';
  aborted: number[];      // levels cut short by a budget
  stats: SolveStats;
}

export type SolveOutcome = Solution | Unsolved;

type SearchResult =
  | { kind: 'found'; translation: Translation; unmatched: Word[] }
  | { kind: 'exhausted' }
  | { kind: 'aborted' };

interface Frame {
  depth: number;
  translation: Translation;
  skipped: number;
  unmatched: readonly Word[];
  candidates?: Word[];
  next: number;
  skipTried: boolean;
}

function frame(depth: number, translation: Translation, skipped: number, unmatched: readonly Word[]): Frame {
  return { depth, translation, skipped, unmatched, next: 0, skipTried: false };
}

/**
 * Default schedule: tolerances 0 .. max(3, n / 10) - 1
 * @param wordCount - Number of words extracted from the ciphertext
 */
export function defaultTolerances(wordCount: number): number[] {
  const max = Math.max(3, Math.floor(wordCount / 10));
  return Array.from({ length: max }, (_, i) => i);
}

export class SubstitutionSolver {
  constructor(
    private readonly index: PatternIndex,
    private readonly options: SolverOptions = {}
  ) {}

  /**
   * Solve a cipher.
   *
   * Runs the search once per tolerance level, starting strict on unknown
   * words (proper nouns, words missing from the corpus) and loosening until
   * a translation is found or the schedule runs out.
   */
  solve(ciphertext: string): SolveOutcome {
    const text = normalizeCiphertext(ciphertext);
    const words = orderForSearch(extractWords(text));
    const stats: SolveStats = { nodes: 0, levels: [] };

    if (words.length === 0) {
      return { status: 'solved', translation: EMPTY_TRANSLATION, decodedText: '', tolerance: 0, unmatched: [], stats };
    }

    const schedule = this.options.tolerances ?? defaultTolerances(words.length);
    const aborted: number[] = [];

    for (const tolerance of schedule) {
      stats.levels.push(tolerance);
      const result = this.search(words, tolerance, stats);
      if (result.kind === 'found') {
        return {
          status: 'solved',
          translation: result.translation,
          decodedText: decodeText(text, result.translation),
          tolerance,
          unmatched: result.unmatched,
          stats
        };
      }
      if (result.kind === 'aborted') aborted.push(tolerance);
    }

    return { status: 'unsolved', aborted, stats };
  }

  /**
   * Depth-first search over an explicit frame stack.
   *
   * Each frame tries its candidates in corpus order, then once more with its
   * word skipped. The first complete translation wins. Frames own their
   * translation, so a failed branch never leaks assignments into siblings.
   */
  private search(words: readonly Word[], tolerance: number, stats: SolveStats): SearchResult {
    const { maxNodes, timeLimitMs, onVisit } = this.options;
    const started = Date.now();
    let nodes = 0;

    const stack: Frame[] = [frame(0, EMPTY_TRANSLATION, 0, [])];

    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      const word = words[top.depth];

      if (top.candidates === undefined) {
        nodes++;
        stats.nodes++;
        onVisit?.({ tolerance, depth: top.depth, skipped: top.skipped, translation: top.translation });

        if (top.depth === words.length) {
          return { kind: 'found', translation: top.translation, unmatched: [...top.unmatched] };
        }
        if (top.skipped > tolerance) {
          stack.pop();
          continue;
        }
        if (maxNodes !== undefined && nodes > maxNodes) return { kind: 'aborted' };
        if (timeLimitMs !== undefined && Date.now() - started >= timeLimitMs) return { kind: 'aborted' };

        top.candidates = this.index.candidates(render(word, top.translation));
      }

      let child: Frame | undefined;
      while (child === undefined && top.next < top.candidates.length) {
        const extended = extend(word, top.candidates[top.next++], top.translation);
        if (extended) child = frame(top.depth + 1, extended, top.skipped, top.unmatched);
      }

      // Out of candidates: the word may be a proper noun or missing from the corpus
      if (child === undefined && !top.skipTried) {
        top.skipTried = true;
        child = frame(top.depth + 1, top.translation, top.skipped + 1, [...top.unmatched, word]);
      }

      if (child) stack.push(child);
      else stack.pop();
    }

    return { kind: 'exhausted' };
  }
}

function isSchedule(value: SolverOptions | readonly number[]): value is readonly number[] {
  return Array.isArray(value);
}

/**
 * One-shot entry point
 * @param ciphertext - Text to decode
 * @param corpus - Index built from a frequency-ordered word list
 * @param scheduleOrOptions - Tolerance schedule, or full solver options
 */
export function solve(
  ciphertext: string,
  corpus: PatternIndex,
  scheduleOrOptions: SolverOptions | readonly number[] = {}
): SolveOutcome {
  const options = isSchedule(scheduleOrOptions) ? { tolerances: scheduleOrOptions } : scheduleOrOptions;
  return new SubstitutionSolver(corpus, options).solve(ciphertext);
}
