import { describe, it, expect } from "vitest";
import { buildCorpusText, extractRankedWords } from "../src/extract.js";

function row(rank: number, word: string): string {
  return `<tr>\n<td>${rank}</td>\n<td><a href="/wiki/${word}" title="${word}">${word}</a></td>\n</tr>\n`;
}

describe("extractRankedWords", () => {
  it("reads rank and word from each table row in page order", () => {
    const html = `<table>\n${row(2, "of")}${row(1, "the")}</table>`;
    expect(extractRankedWords(html)).toEqual([
      { rank: 2, word: "of" },
      { rank: 1, word: "the" },
    ]);
  });

  it("ignores rows that do not match the layout", () => {
    const html = `<tr><td>1</td><td>the</td></tr>\n${row(7, "it's")}`;
    expect(extractRankedWords(html)).toEqual([{ rank: 7, word: "it's" }]);
  });
});

describe("buildCorpusText", () => {
  it("merges pages by ascending rank", () => {
    const pages = [row(3, "and") + row(1, "the"), row(2, "of") + row(4, "to")];
    expect(buildCorpusText(pages)).toBe("the\nof\nand\nto");
  });

  it("keeps page order for equal ranks", () => {
    expect(buildCorpusText([row(1, "b"), row(1, "a")])).toBe("b\na");
  });

  it("returns empty text when nothing matches", () => {
    expect(buildCorpusText(["<html></html>"])).toBe("");
  });
});
