import fs from 'node:fs';
import path from 'node:path';
import { glob } from 'glob';
import {
  SubstitutionSolver, UsageError, buildCorpusText, decodeText, ingestCorpus, loadCorpus,
  loadCorpusFromStore, normalizeCiphertext, parseCorpus, readCorpusFile
} from '@subsolve/core';
import type { SolverOptions } from '@subsolve/core';
import { parseCorpusArgs, parseIngestArgs, parseSolveArgs } from './args.js';
import { formatReport, outcomeToJson } from './report.js';

export const VERSION = '0.1.0';

function usage(){console.log(`Usage:
  subsolve solve <ciphertext-file> [options]
  subsolve ingest <corpus-file> [--db <file>]
  subsolve corpus <pages-dir-or-files...> [--output <file>]

Solve options:
  -c, --corpus <file>     Word corpus, one word per line, most frequent first (default: corpus.txt)
  --db <file>             Load the corpus from a SQLite store built by "ingest"
  -v, --verbose           Print the ciphertext under every translation the search visits
  --tolerance <list>      Comma-separated unmatched-word tolerances to try (default: 0..max(3, words/10)-1)
  --max-nodes <n>         Abandon a tolerance level after visiting n search states
  --time-limit <ms>       Abandon a tolerance level after ms milliseconds
  --json                  Print the outcome as JSON

Ingest options:
  --db <file>             SQLite store to write (default: corpus.db)

Corpus options:
  -o, --output <file>     Corpus file to write (default: corpus.txt)`);}

function solveCommand(args: string[]): number {
  const { input, options } = parseSolveArgs(args);
  if (!input) throw new UsageError('Missing ciphertext file');

  const ciphertext = fs.readFileSync(input, 'utf8').trim();
  const index = options.db ? loadCorpusFromStore(options.db) : loadCorpus(options.corpus);
  const normalized = normalizeCiphertext(ciphertext);

  const solverOptions: SolverOptions = {
    tolerances: options.tolerances,
    maxNodes: options.maxNodes,
    timeLimitMs: options.timeLimitMs,
    onVisit: options.verbose ? visit => console.log(decodeText(normalized, visit.translation)) : undefined
  };
  const outcome = new SubstitutionSolver(index, solverOptions).solve(ciphertext);

  if (options.json) {
    console.log(JSON.stringify(outcomeToJson(outcome), null, 2));
  } else {
    for (const line of formatReport(outcome, ciphertext)) console.log(line);
  }
  return outcome.status === 'solved' ? 0 : 1;
}

function ingestCommand(args: string[]): number {
  const { input, options } = parseIngestArgs(args);
  if (!input) throw new UsageError('Missing corpus file');

  const words = readCorpusFile(input);
  const stats = ingestCorpus(words, options.db);
  console.log('Ingest complete:', stats);
  return 0;
}

function corpusCommand(args: string[]): number {
  const { inputs, options } = parseCorpusArgs(args);
  if (inputs.length === 0) throw new UsageError('Missing page files or directories');

  const files: string[] = [];
  for (const a of inputs) {
    if (fs.statSync(a).isDirectory()) {
      const found = glob.sync('**/*.{html,htm}', { cwd: a, nodir: true }).sort();
      for (const f of found) files.push(path.join(a, f));
    } else {
      files.push(a);
    }
  }

  const text = buildCorpusText(files.map(f => fs.readFileSync(f, 'utf8')));
  fs.writeFileSync(options.output, text);
  console.log(`Wrote ${parseCorpus(text).length} words from ${files.length} pages to ${options.output}`);
  return 0;
}

/**
 * Run one CLI invocation
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export function run(argv: string[]): number {
  const [cmd, ...args] = argv;
  // stdout carries nothing but the document under --json
  if (!argv.includes('--json')) console.log(`SubSolver v${VERSION}\n`);
  if (!cmd) { usage(); return 1; }
  try {
    switch (cmd) {
      case 'solve': return solveCommand(args);
      case 'ingest': return ingestCommand(args);
      case 'corpus': return corpusCommand(args);
      default: throw new UsageError(`Unknown command: ${cmd}`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      usage();
      return 1;
    }
    if (err instanceof Error) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
}
