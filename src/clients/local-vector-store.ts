import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { CollectionClient, PointFilter, ScoredPoint, StoredPoint } from "./qdrant.js";

const storedPointSchema = z.object({
  id: z.string(),
  vector: z.array(z.number()),
  payload: z.record(z.string(), z.unknown()).default({})
});

const storeSchema = z.object({
  collections: z.record(z.string(), z.array(storedPointSchema)).default({})
});

type StoreShape = z.infer<typeof storeSchema>;

const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";
const DEFAULT_SCROLL_LIMIT = 10;

function resolveStorePath(configured: string | undefined): string {
  const relative = configured && configured.trim().length > 0 ? configured.trim() : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative) ? relative : path.resolve(process.cwd(), relative);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function matchesFilter(payload: Record<string, unknown>, filter?: PointFilter): boolean {
  const must = filter?.must ?? [];
  return must.every((clause) => payload[clause.key] === clause.match.value);
}

async function readStore(filePath: string): Promise<StoreShape> {
  try {
    const raw = await fs.readFile(filePath, "utf8");
    return storeSchema.parse(JSON.parse(raw));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { collections: {} };
    }
    throw error;
  }
}

async function writeStore(filePath: string, store: StoreShape): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(store, null, 2), "utf8");
}

export interface LocalVectorStoreClient extends CollectionClient {
  readonly filePath: string;
  upsert(
    collection: string,
    payload: { points: Array<{ id: string; vector: number[]; payload?: Record<string, unknown> }> }
  ): Promise<{ status: "ok" }>;
}

export function createLocalVectorStoreClient(options: { filePath?: string } = {}): LocalVectorStoreClient {
  const filePath = resolveStorePath(options.filePath);

  return {
    filePath,

    async getCollections() {
      const store = await readStore(filePath);
      return {
        collections: Object.keys(store.collections).map((name) => ({ name }))
      };
    },

    async count(collection) {
      const store = await readStore(filePath);
      return { count: store.collections[collection]?.length ?? 0 };
    },

    async search(collection, request): Promise<ScoredPoint[]> {
      const store = await readStore(filePath);
      const points = store.collections[collection] ?? [];
      return points
        .filter((point) => matchesFilter(point.payload, request.filter))
        .map((point) => ({
          id: point.id,
          score: cosineSimilarity(point.vector, request.vector),
          payload: point.payload
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, Math.max(1, request.limit ?? 10));
    },

    async scroll(collection, request = {}) {
      const store = await readStore(filePath);
      const points = store.collections[collection] ?? [];
      const start = typeof request.offset === "number" ? request.offset : 0;
      const limit = Math.max(1, request.limit ?? DEFAULT_SCROLL_LIMIT);
      const page: StoredPoint[] = points
        .slice(start, start + limit)
        .map((point) => ({ id: point.id, payload: point.payload }));
      const next = start + limit;
      return {
        points: page,
        next_page_offset: next < points.length ? next : null
      };
    },

    async upsert(collection, payload) {
      const store = await readStore(filePath);
      const current = store.collections[collection] ?? [];
      const byId = new Map(current.map((point) => [point.id, point]));

      for (const point of payload.points) {
        byId.set(point.id, {
          id: point.id,
          vector: point.vector,
          payload: point.payload ?? {}
        });
      }

      store.collections[collection] = Array.from(byId.values());
      await writeStore(filePath, store);
      return { status: "ok" };
    }
  };
}
