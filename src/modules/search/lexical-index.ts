import type { Chunk } from "../corpus/types.js";
import type { LexicalMatch } from "./types.js";

export interface LexicalIndexOptions {
  /** Term-frequency saturation. */
  k1?: number;
  /** Length normalisation, 0 disables it. */
  b?: number;
}

export type TermStatistics = {
  documentCount: number;
  averageDocumentLength: number;
  documentLengths: number[];
  documentFrequencies: Record<string, number>;
};

type Posting = readonly [docIndex: number, termFrequency: number];

const DEFAULT_K1 = 1.5;
const DEFAULT_B = 0.75;

export const tokenize = (text: string): string[] => text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

/**
 * BM25 index over chunk text. Instances are frozen once built; a new corpus
 * snapshot means a new index.
 */
export class LexicalIndex {
  readonly k1: number;
  readonly b: number;
  private readonly chunkIds: readonly string[];
  private readonly lengths: readonly number[];
  private readonly avgLength: number;
  private readonly postings: ReadonlyMap<string, readonly Posting[]>;

  private constructor(
    chunkIds: string[],
    lengths: number[],
    postings: Map<string, Posting[]>,
    options: Required<LexicalIndexOptions>
  ) {
    this.k1 = options.k1;
    this.b = options.b;
    this.chunkIds = Object.freeze(chunkIds);
    this.lengths = Object.freeze(lengths);
    this.avgLength = lengths.length > 0 ? lengths.reduce((sum, value) => sum + value, 0) / lengths.length : 0;
    this.postings = postings;
    Object.freeze(this);
  }

  static build(chunks: readonly Chunk[], options: LexicalIndexOptions = {}): LexicalIndex {
    const chunkIds: string[] = [];
    const lengths: number[] = [];
    const postings = new Map<string, Posting[]>();

    chunks.forEach((chunk, docIndex) => {
      const tokens = tokenize(chunk.content);
      const termFrequencies = new Map<string, number>();
      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }
      for (const [term, frequency] of termFrequencies) {
        const list = postings.get(term);
        if (list) {
          list.push([docIndex, frequency]);
        } else {
          postings.set(term, [[docIndex, frequency]]);
        }
      }
      chunkIds.push(chunk.id);
      lengths.push(tokens.length);
    });

    return new LexicalIndex(chunkIds, lengths, postings, {
      k1: options.k1 ?? DEFAULT_K1,
      b: options.b ?? DEFAULT_B
    });
  }

  static empty(): LexicalIndex {
    return LexicalIndex.build([]);
  }

  get documentCount(): number {
    return this.chunkIds.length;
  }

  get averageDocumentLength(): number {
    return this.avgLength;
  }

  termStatistics(): TermStatistics {
    const documentFrequencies: Record<string, number> = {};
    for (const term of [...this.postings.keys()].sort()) {
      documentFrequencies[term] = this.postings.get(term)?.length ?? 0;
    }
    return {
      documentCount: this.documentCount,
      averageDocumentLength: this.avgLength,
      documentLengths: [...this.lengths],
      documentFrequencies
    };
  }

  search(query: string, n: number): LexicalMatch[] {
    if (this.chunkIds.length === 0 || n <= 0) {
      return [];
    }

    const queryTokens = tokenize(query);
    if (queryTokens.length === 0) {
      return [];
    }

    const totalDocs = this.chunkIds.length;
    const scores = new Map<number, number>();

    for (const term of queryTokens) {
      const termPostings = this.postings.get(term);
      if (!termPostings) {
        continue;
      }
      const df = termPostings.length;
      const idf = Math.log((totalDocs - df + 0.5) / (df + 0.5) + 1);

      for (const [docIndex, tf] of termPostings) {
        const lengthRatio = this.avgLength > 0 ? this.lengths[docIndex] / this.avgLength : 0;
        const termScore = idf * ((tf * (this.k1 + 1)) / (tf + this.k1 * (1 - this.b + this.b * lengthRatio)));
        scores.set(docIndex, (scores.get(docIndex) ?? 0) + termScore);
      }
    }

    return [...scores.entries()]
      .filter(([, score]) => score > 0)
      .sort((left, right) => right[1] - left[1] || left[0] - right[0])
      .slice(0, Math.floor(n))
      .map(([docIndex, score]) => ({ chunk_id: this.chunkIds[docIndex], score }));
  }
}
