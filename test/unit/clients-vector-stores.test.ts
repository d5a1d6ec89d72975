import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { cosineSimilarity, createLocalVectorStoreClient } from "../../src/clients/local-vector-store.js";
import {
  buildPointFilter,
  createQdrantVectorStore,
  payloadToMetadata,
  toVectorMatch,
  type CollectionClient
} from "../../src/clients/qdrant.js";

describe("clients/local-vector-store", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  const makeClient = async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "corpus-local-store-"));
    tempDirs.push(dir);
    return createLocalVectorStoreClient({ filePath: path.join(dir, "store.json") });
  };

  it("upserts, searches by cosine similarity, filters and pages", async () => {
    const client = await makeClient();

    await expect(client.getCollections()).resolves.toEqual({ collections: [] });

    await client.upsert("docs", {
      points: [
        { id: "p1", vector: [1, 0], payload: { format: "md" } },
        { id: "p2", vector: [0, 1], payload: { format: "pdf" } },
        { id: "p3", vector: [1, 1], payload: { format: "md" } }
      ]
    });

    await expect(client.getCollections()).resolves.toEqual({ collections: [{ name: "docs" }] });
    await expect(client.count("docs")).resolves.toEqual({ count: 3 });

    const top = await client.search("docs", { vector: [1, 0], limit: 2 });
    expect(top.map((point) => point.id)).toEqual(["p1", "p3"]);
    expect(top[0].score).toBe(1);

    const filtered = await client.search("docs", {
      vector: [1, 0],
      filter: { must: [{ key: "format", match: { value: "pdf" } }] }
    });
    expect(filtered.map((point) => point.id)).toEqual(["p2"]);

    const firstPage = await client.scroll("docs", { limit: 2 });
    expect(firstPage.points.map((point) => point.id)).toEqual(["p1", "p2"]);
    expect(firstPage.next_page_offset).toBe(2);
    const lastPage = await client.scroll("docs", { limit: 2, offset: 2 });
    expect(lastPage.points.map((point) => point.id)).toEqual(["p3"]);
    expect(lastPage.next_page_offset).toBeNull();
  });

  it("scores mismatched or zero vectors as 0", () => {
    expect(cosineSimilarity([1, 0], [1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe("clients/qdrant", () => {
  it("builds a match filter from quality and format only", () => {
    expect(buildPointFilter(undefined)).toBeUndefined();
    expect(buildPointFilter({})).toBeUndefined();
    expect(buildPointFilter({ quality_rating: "preferred", format: "md" })).toEqual({
      must: [
        { key: "quality_rating", match: { value: "preferred" } },
        { key: "format", match: { value: "md" } }
      ]
    });
  });

  it("normalises payload metadata", () => {
    expect(
      payloadToMetadata({
        content: "body",
        doc_id: "doc-7",
        quality_rating: "excellent",
        tags: "ops, sre ,",
        filename: "runbook.md"
      })
    ).toEqual({
      doc_id: "doc-7",
      document_id: "doc-7",
      quality_rating: undefined,
      tags: ["ops", "sre"],
      filename: "runbook.md"
    });
  });

  it("converts cosine scores to distances and skips points without text", () => {
    expect(toVectorMatch({ id: 4, score: 0.75, payload: { text: "hello", document_id: "d1" } })).toEqual({
      chunk_id: "4",
      distance: 0.25,
      content: "hello",
      metadata: { document_id: "d1", quality_rating: undefined, tags: undefined }
    });
    expect(toVectorMatch({ id: 5, score: 0.9, payload: {} })).toBeNull();
  });

  it("pages through the whole collection when listing chunks", async () => {
    const scroll = vi
      .fn<CollectionClient["scroll"]>()
      .mockResolvedValueOnce({
        points: [{ id: "a", payload: { content: "first", document_id: "d1" } }],
        next_page_offset: "b"
      })
      .mockResolvedValueOnce({
        points: [
          { id: "b", payload: { content: "second", document_id: "d2" } },
          { id: "c", payload: { title: "no text" } }
        ],
        next_page_offset: null
      });
    const client: CollectionClient = {
      getCollections: vi.fn(async () => ({ collections: [{ name: "corpus" }] })),
      count: vi.fn(async () => ({ count: 3 })),
      search: vi.fn(async () => []),
      scroll
    };
    const store = createQdrantVectorStore(client, "corpus");

    const chunks = await store.listChunks();

    expect(chunks.map((chunk) => [chunk.id, chunk.document_id, chunk.content])).toEqual([
      ["a", "d1", "first"],
      ["b", "d2", "second"]
    ]);
    expect(scroll).toHaveBeenNthCalledWith(2, "corpus", expect.objectContaining({ offset: "b", limit: 256 }));
    await expect(store.exists()).resolves.toBe(true);
    await expect(store.count()).resolves.toBe(3);
    expect(client.count).toHaveBeenCalledWith("corpus", { exact: true });
  });

  it("queries with payloads and the translated filter", async () => {
    const search = vi.fn<CollectionClient["search"]>(async () => [
      { id: "x", score: 0.5, payload: { content: "body", quality_rating: "preferred" } }
    ]);
    const store = createQdrantVectorStore(
      {
        getCollections: vi.fn(async () => ({ collections: [] })),
        count: vi.fn(async () => ({ count: 0 })),
        search,
        scroll: vi.fn(async () => ({ points: [] }))
      },
      "corpus"
    );

    const matches = await store.query([0.1, 0.2], { filter: { format: "md" }, limit: 4 });

    expect(matches).toEqual([
      { chunk_id: "x", distance: 0.5, content: "body", metadata: { quality_rating: "preferred", tags: undefined } }
    ]);
    expect(search).toHaveBeenCalledWith("corpus", {
      vector: [0.1, 0.2],
      limit: 4,
      filter: { must: [{ key: "format", match: { value: "md" } }] },
      with_payload: true,
      with_vector: false
    });
    await expect(store.exists()).resolves.toBe(false);
  });
});
