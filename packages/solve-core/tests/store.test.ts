import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { ingestCorpus, loadCorpusFromStore, openCorpusStore } from "../src/store.js";
import type { CorpusStore } from "../src/store.js";
import { CorpusUnavailableError } from "../src/errors.js";

describe("CorpusStore", () => {
  let store: CorpusStore;

  beforeEach(() => {
    store = openCorpusStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("stores words with their patterns", () => {
    store.batchWords([
      { rank: 1, word: "the" },
      { rank: 2, word: "wow" },
      { rank: 3, word: "cat" },
    ]);

    expect(store.count()).toBe(3);
    expect(store.patternCount()).toBe(2);
    expect(store.wordsForPattern("012")).toEqual(["the", "cat"]);
    expect(store.wordsForPattern("010")).toEqual(["wow"]);
    expect(store.wordsForPattern("0123")).toEqual([]);
  });

  it("returns words in rank order regardless of insert order", () => {
    store.batchWords([
      { rank: 3, word: "and" },
      { rank: 1, word: "the" },
      { rank: 2, word: "of" },
    ]);

    expect(store.allWords()).toEqual(["the", "of", "and"]);
  });

  it("clears all words", () => {
    store.batchWords([{ rank: 1, word: "the" }]);
    store.clear();
    expect(store.count()).toBe(0);
  });
});

describe("ingestCorpus / loadCorpusFromStore", () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "subsolve-store-"));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("round-trips a corpus in frequency order", () => {
    const db = path.join(dir, "round-trip.db");

    expect(ingestCorpus(["the", "cat", "wow", "the"], db)).toEqual({ words: 4, patterns: 2 });

    const index = loadCorpusFromStore(db);
    expect(index.size).toBe(4);
    expect(index.candidates("ABC")).toEqual(["the", "cat", "the"]);
  });

  it("replaces earlier contents on re-ingest", () => {
    const db = path.join(dir, "replace.db");

    ingestCorpus(["the", "cat", "wow"], db);
    expect(ingestCorpus(["dog"], db)).toEqual({ words: 1, patterns: 1 });
    expect(loadCorpusFromStore(db).bucket("012")).toEqual(["dog"]);
  });

  it("throws CorpusUnavailableError for a missing database", () => {
    expect(() => loadCorpusFromStore(path.join(dir, "missing.db"))).toThrow(CorpusUnavailableError);
  });

  it("throws CorpusUnavailableError for a database with another words table", () => {
    const db = path.join(dir, "foreign.db");
    const other = new Database(db);
    other.exec("CREATE TABLE words(rank INTEGER PRIMARY KEY, pattern TEXT)");
    other.close();

    expect(() => loadCorpusFromStore(db)).toThrow(CorpusUnavailableError);
    expect(() => ingestCorpus(["cat"], db)).toThrow(CorpusUnavailableError);
  });

  it("throws CorpusUnavailableError for a file that is not a database", () => {
    const file = path.join(dir, "notes.db");
    fs.writeFileSync(file, "the\ncat\n".repeat(100));

    expect(() => loadCorpusFromStore(file)).toThrow(CorpusUnavailableError);
  });
});
