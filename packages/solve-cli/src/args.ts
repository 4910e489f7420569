import { UsageError } from '@subsolve/core';

export interface SolveCliOptions {
  corpus: string;
  db?: string;
  verbose: boolean;
  tolerances?: number[];
  maxNodes?: number;
  timeLimitMs?: number;
  json: boolean;
}

export interface IngestCliOptions {
  db: string;
}

export interface CorpusCliOptions {
  output: string;
}

export const DEFAULT_CORPUS = 'corpus.txt';
export const DEFAULT_DB = 'corpus.db';

function valueFor(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('-')) throw new UsageError(`Missing value for ${flag}`);
  return value;
}

function count(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) throw new UsageError(`Expected a non-negative integer for ${flag}, got "${value}"`);
  return parseInt(value, 10);
}

function toleranceList(value: string): number[] {
  return value.split(',').map(part => count(part.trim(), '--tolerance'));
}

export function parseSolveArgs(args: string[]): { input?: string; options: SolveCliOptions } {
  const options: SolveCliOptions = {
    corpus: DEFAULT_CORPUS,
    verbose: false,
    json: false
  };

  let input: string | undefined;
  let i = 0;

  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('-')) {
      switch (arg) {
        case '-c':
        case '--corpus':
          options.corpus = valueFor(args, ++i, arg);
          break;
        case '--db':
          options.db = valueFor(args, ++i, arg);
          break;
        case '-v':
        case '--verbose':
          options.verbose = true;
          break;
        case '--tolerance':
          options.tolerances = toleranceList(valueFor(args, ++i, arg));
          break;
        case '--max-nodes':
          options.maxNodes = count(valueFor(args, ++i, arg), arg);
          break;
        case '--time-limit':
          options.timeLimitMs = count(valueFor(args, ++i, arg), arg);
          break;
        case '--json':
          options.json = true;
          break;
        default:
          throw new UsageError(`Unknown option: ${arg}`);
      }
    } else if (input === undefined) {
      input = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    i++;
  }

  return { input, options };
}

export function parseIngestArgs(args: string[]): { input?: string; options: IngestCliOptions } {
  const options: IngestCliOptions = { db: DEFAULT_DB };
  let input: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--db') {
      options.db = valueFor(args, ++i, arg);
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (input === undefined) {
      input = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return { input, options };
}

export function parseCorpusArgs(args: string[]): { inputs: string[]; options: CorpusCliOptions } {
  const options: CorpusCliOptions = { output: DEFAULT_CORPUS };
  const inputs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--output' || arg === '-o') {
      options.output = valueFor(args, ++i, arg);
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      inputs.push(arg);
    }
  }

  return { inputs, options };
}
