export type Word = string;
export type Pattern = string;
export type CipherChar = string;
export type PlainChar = string;

/** Partial, injective cipher -> plain mapping. Never mutated once built. */
export type Translation = ReadonlyMap<CipherChar, PlainChar>;

export interface RankedWord { rank: number; word: Word; }
export interface IngestStats { words: number; patterns: number; }
