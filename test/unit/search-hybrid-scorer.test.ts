import { describe, expect, it } from "vitest";
import { DEFAULT_HYBRID_WEIGHTS, fuseScores } from "../../src/modules/search/hybrid-scorer.js";
import { createSearchResult, normalizeLexicalScores, toSimilarity } from "../../src/modules/search/score-normalizer.js";
import { makeResult } from "../../tests/helpers/corpus.js";

describe("modules/search/score-normalizer", () => {
  it("converts distance to similarity without clamping", () => {
    expect(toSimilarity(0.25)).toBe(0.75);
    expect(toSimilarity(1.4)).toBeCloseTo(-0.4, 10);
    expect(createSearchResult({ chunk_id: "c1", content: "x", metadata: {}, distance: 2 }).similarity_score).toBe(-1);
  });

  it("divides lexical scores by the batch maximum", () => {
    const normalized = normalizeLexicalScores([
      { chunk_id: "a", score: 4 },
      { chunk_id: "b", score: 2 }
    ]);

    expect(Object.fromEntries(normalized)).toEqual({ a: 1, b: 0.5 });
  });

  it("returns an empty map for empty or all-zero input", () => {
    expect(normalizeLexicalScores([]).size).toBe(0);
    expect(normalizeLexicalScores([{ chunk_id: "a", score: 0 }]).size).toBe(0);
  });
});

describe("modules/search/hybrid-scorer", () => {
  it("blends similarity and lexical score with the given weights", () => {
    const fused = fuseScores(
      [makeResult("r1", 0.1), makeResult("r2", 0.5)],
      new Map([["r2", 1]]),
      DEFAULT_HYBRID_WEIGHTS,
      10
    );

    expect(fused.map((result) => result.chunk_id)).toEqual(["r2", "r1"]);
    expect(fused[0].hybrid_score).toBeCloseTo(0.65, 10);
    expect(fused[1].hybrid_score).toBeCloseTo(0.63, 10);
    expect(fused[1].lexical_score).toBe(0);
  });

  it("uses similarity as the hybrid score when no lexical scores exist", () => {
    const fused = fuseScores([makeResult("r1", 0.2), makeResult("r2", 0.4)], undefined, DEFAULT_HYBRID_WEIGHTS, 10);

    expect(fused.map((result) => [result.chunk_id, result.hybrid_score])).toEqual([
      ["r1", 0.8],
      ["r2", 0.6]
    ]);
    expect(fused[0].lexical_score).toBeUndefined();
  });

  it("uses similarity as the hybrid score for an empty lexical map", () => {
    const [fused] = fuseScores([makeResult("r1", 0.2)], new Map(), DEFAULT_HYBRID_WEIGHTS, 10);

    expect(fused.hybrid_score).toBe(fused.similarity_score);
    expect(fused.hybrid_score).toBe(0.8);
    expect(fused.lexical_score).toBeUndefined();
  });

  it("treats an explicit zero as a lexical score, not a missing one", () => {
    const [fused] = fuseScores([makeResult("r1", 0.2)], new Map([["r1", 0]]), DEFAULT_HYBRID_WEIGHTS, 10);

    expect(fused.lexical_score).toBe(0);
    expect(fused.hybrid_score).toBeCloseTo(0.56, 10);
  });

  it("truncates to the limit after sorting", () => {
    const fused = fuseScores(
      [makeResult("r1", 0.5), makeResult("r2", 0.2), makeResult("r3", 0.3)],
      undefined,
      DEFAULT_HYBRID_WEIGHTS,
      2
    );

    expect(fused.map((result) => result.chunk_id)).toEqual(["r2", "r3"]);
  });

  it("keeps input order among equal hybrid scores", () => {
    const fused = fuseScores([makeResult("a", 0.3), makeResult("b", 0.3)], new Map(), DEFAULT_HYBRID_WEIGHTS, 10);

    expect(fused.map((result) => result.chunk_id)).toEqual(["a", "b"]);
  });

  it("does not mutate the dense results", () => {
    const dense = [makeResult("r1", 0.2)];
    fuseScores(dense, new Map([["r1", 1]]), DEFAULT_HYBRID_WEIGHTS, 10);

    expect(dense[0].hybrid_score).toBeUndefined();
  });
});
