import { normalizeCiphertext, substitutionPairs } from '@subsolve/core';
import type { SolveOutcome, Translation } from '@subsolve/core';

export const FAILURE_MESSAGE = 'Failed to translate ciphertext.';

/**
 * Sorted `CIPHER -> plain` pairs, a fixed number per line
 */
export function formatSubstitutions(translation: Translation, perLine = 5): string[] {
  const items = substitutionPairs(translation).map(([c, p]) => `${c} -> ${p}`);
  const lines: string[] = [];
  for (let i = 0; i < items.length; i += perLine) {
    lines.push(items.slice(i, i + perLine).join(' '));
  }
  return lines;
}

export function formatReport(outcome: SolveOutcome, ciphertext: string): string[] {
  if (outcome.status === 'unsolved') return [FAILURE_MESSAGE];

  const lines = [
    'Ciphertext:',
    normalizeCiphertext(ciphertext),
    '',
    'Plaintext:',
    outcome.decodedText,
    '',
    'Substitutions:',
    ...formatSubstitutions(outcome.translation)
  ];

  if (outcome.unmatched.length > 0) {
    lines.push('', 'Unmatched words:', outcome.unmatched.join(' '));
  }

  return lines;
}

export function outcomeToJson(outcome: SolveOutcome) {
  if (outcome.status === 'unsolved') {
    return { status: outcome.status, aborted: outcome.aborted, stats: outcome.stats };
  }
  return {
    status: outcome.status,
    decodedText: outcome.decodedText,
    translation: Object.fromEntries(substitutionPairs(outcome.translation)),
    tolerance: outcome.tolerance,
    unmatched: outcome.unmatched,
    stats: outcome.stats
  };
}
