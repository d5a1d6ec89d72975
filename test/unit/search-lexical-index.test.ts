import { describe, expect, it } from "vitest";
import { LexicalIndex, tokenize } from "../../src/modules/search/lexical-index.js";
import { makeChunk } from "../../tests/helpers/corpus.js";

const corpus = [
  makeChunk("c1", "The cat sat on the mat"),
  makeChunk("c2", "Dogs chase cats"),
  makeChunk("c3", "A cat and a dog")
];

describe("tokenize", () => {
  it("lowercases and keeps alphanumeric runs", () => {
    expect(tokenize("Hello, World! 42-x")).toEqual(["hello", "world", "42", "x"]);
  });

  it("returns an empty list for punctuation only", () => {
    expect(tokenize("?!-- ...")).toEqual([]);
  });
});

describe("modules/search/lexical-index", () => {
  it("ranks shorter documents first for the same term frequency", () => {
    const index = LexicalIndex.build(corpus);

    expect(index.search("cat", 10).map((match) => match.chunk_id)).toEqual(["c3", "c1"]);
  });

  it("scores with BM25 at k1=1.5 and b=0.75", () => {
    const index = LexicalIndex.build(corpus);
    const idf = Math.log((3 - 2 + 0.5) / (2 + 0.5) + 1);
    const lengthRatio = 5 / (14 / 3);
    const expected = idf * ((1 * 2.5) / (1 + 1.5 * (1 - 0.75 + 0.75 * lengthRatio)));

    const [top] = index.search("cat", 1);
    expect(top.chunk_id).toBe("c3");
    expect(top.score).toBeCloseTo(expected, 10);
  });

  it("counts repeated query tokens once per occurrence", () => {
    const index = LexicalIndex.build(corpus);
    const single = index.search("dogs", 1)[0].score;
    const repeated = index.search("dogs dogs", 1)[0].score;

    expect(repeated).toBeCloseTo(single * 2, 10);
  });

  it("breaks ties by insertion order", () => {
    const index = LexicalIndex.build([
      makeChunk("first", "alpha beta"),
      makeChunk("second", "alpha beta"),
      makeChunk("third", "gamma")
    ]);

    expect(index.search("alpha", 10).map((match) => match.chunk_id)).toEqual(["first", "second"]);
  });

  it("truncates to n and omits non-matching chunks", () => {
    const index = LexicalIndex.build(corpus);

    expect(index.search("cat", 1).map((match) => match.chunk_id)).toEqual(["c3"]);
    expect(index.search("giraffe", 10)).toEqual([]);
    expect(index.search("cat", 0)).toEqual([]);
  });

  it("returns identical results for identical queries", () => {
    const index = LexicalIndex.build(corpus);

    expect(index.search("cat dog", 5)).toEqual(index.search("cat dog", 5));
  });

  it("builds identical statistics and rankings from the same chunks", () => {
    const first = LexicalIndex.build(corpus);
    const second = LexicalIndex.build(corpus);

    expect(second.termStatistics()).toEqual(first.termStatistics());
    expect(second.search("cat dogs mat", 10)).toEqual(first.search("cat dogs mat", 10));
  });

  it("returns nothing from an empty index", () => {
    const index = LexicalIndex.empty();

    expect(index.documentCount).toBe(0);
    expect(index.averageDocumentLength).toBe(0);
    expect(index.search("anything", 5)).toEqual([]);
  });

  it("exposes term statistics for the indexed corpus", () => {
    const stats = LexicalIndex.build(corpus.slice(0, 2)).termStatistics();

    expect(stats.documentCount).toBe(2);
    expect(stats.averageDocumentLength).toBe(4.5);
    expect(stats.documentLengths).toEqual([6, 3]);
    expect(stats.documentFrequencies).toEqual({
      cat: 1,
      cats: 1,
      chase: 1,
      dogs: 1,
      mat: 1,
      on: 1,
      sat: 1,
      the: 1
    });
  });

  it("is frozen after build", () => {
    const index = LexicalIndex.build(corpus);

    expect(Object.isFrozen(index)).toBe(true);
  });
});
