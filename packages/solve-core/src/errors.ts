/** The corpus file or database could not be read. */
export class CorpusUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Corpus unavailable at ${path}${reason}`, { cause });
    this.name = 'CorpusUnavailableError';
    this.path = path;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
