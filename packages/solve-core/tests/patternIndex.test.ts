import { describe, it, expect } from "vitest";
import { PatternIndex } from "../src/patternIndex.js";

describe("PatternIndex", () => {
  describe("build", () => {
    it("groups words by pattern in input order", () => {
      const index = PatternIndex.build(["dog", "wow", "cat", "dad", "the"]);
      expect(index.size).toBe(5);
      expect(index.patternCount).toBe(2);
      expect(index.bucket("012")).toEqual(["dog", "cat", "the"]);
      expect(index.bucket("010")).toEqual(["wow", "dad"]);
    });

    it("keeps duplicates", () => {
      const index = PatternIndex.build(["the", "the"]);
      expect(index.size).toBe(2);
      expect(index.bucket("012")).toEqual(["the", "the"]);
    });

    it("builds an empty index from no words", () => {
      const index = PatternIndex.build([]);
      expect(index.size).toBe(0);
      expect(index.patternCount).toBe(0);
      expect(index.candidates("ABC")).toEqual([]);
    });
  });

  describe("candidates", () => {
    it("matches unknown letters by structure only", () => {
      const index = PatternIndex.build(["cat", "wow", "dad"]);
      expect(index.candidates("MXM")).toEqual(["wow", "dad"]);
    });

    it("requires decoded letters to match exactly", () => {
      const index = PatternIndex.build(["cat", "bat"]);
      expect(index.candidates("cIF")).toEqual(["cat"]);
    });

    it("preserves corpus order among matches", () => {
      const index = PatternIndex.build(["the", "and", "for", "was"]);
      expect(index.candidates("QBC")).toEqual(["the", "and", "for", "was"]);
      expect(index.candidates("QaC")).toEqual(["was"]);
    });

    it("matches apostrophes literally on both sides", () => {
      const index = PatternIndex.build(["don't", "about"]);
      expect(index.candidates("ABC'D")).toEqual(["don't"]);
      expect(index.candidates("ABCDE")).toEqual(["about"]);
    });

    it("returns nothing for an unknown pattern or an empty probe", () => {
      const index = PatternIndex.build(["cat"]);
      expect(index.candidates("ABAB")).toEqual([]);
      expect(index.candidates("")).toEqual([]);
    });

    it("is case-sensitive against the corpus", () => {
      const index = PatternIndex.build(["Cat", "cat"]);
      expect(index.candidates("cQR")).toEqual(["cat"]);
      expect(index.candidates("PQR")).toEqual(["Cat", "cat"]);
    });
  });
});
