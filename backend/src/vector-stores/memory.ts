import { logger } from "../logger.js";
import type {
  IndexStats,
  StoredVector,
  VectorIndex,
  VectorMatch,
  VectorQuery,
  VectorRecord,
} from "./types.js";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Process-local index used with `VECTOR_STORE_TYPE=memory` and in tests.
 * Ties keep insertion order.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private namespaces = new Map<string, Map<string, VectorRecord>>();

  constructor(readonly dimension: number) {}

  async upsert(records: VectorRecord[], namespace: string): Promise<number> {
    let store = this.namespaces.get(namespace);
    if (!store) {
      store = new Map();
      this.namespaces.set(namespace, store);
    }

    for (const record of records) {
      if (record.values.length !== this.dimension) {
        throw new Error(
          `Vector ${record.id} has dimension ${record.values.length}, expected ${this.dimension}`,
        );
      }
      store.set(record.id, { ...record, metadata: { ...record.metadata } });
    }

    logger.debug({ namespace, count: records.length }, "Upserted vectors into memory index");
    return records.length;
  }

  async query(vector: number[], query: VectorQuery): Promise<VectorMatch[]> {
    const store = this.namespaces.get(query.namespace);
    if (!store) {
      return [];
    }

    const filter = Object.entries(query.filter ?? {});
    const matches: VectorMatch[] = [];
    for (const record of store.values()) {
      if (!filter.every(([key, value]) => record.metadata[key] === value)) {
        continue;
      }
      const similarity = cosineSimilarity(vector, record.values);
      matches.push({
        id: record.id,
        score: Math.min(1, Math.max(0, similarity)),
        metadata: { ...record.metadata },
      });
    }

    return matches.sort((a, b) => b.score - a.score).slice(0, query.topK);
  }

  async fetch(ids: string[], namespace: string): Promise<StoredVector[]> {
    const store = this.namespaces.get(namespace);
    if (!store) {
      return [];
    }
    const found: StoredVector[] = [];
    for (const id of ids) {
      const record = store.get(id);
      if (record) {
        found.push({ id, metadata: { ...record.metadata } });
      }
    }
    return found;
  }

  async deleteAll(namespace: string): Promise<void> {
    this.namespaces.delete(namespace);
  }

  async stats(): Promise<IndexStats> {
    const namespaces: Record<string, number> = {};
    let totalCount = 0;
    for (const [name, store] of this.namespaces) {
      namespaces[name] = store.size;
      totalCount += store.size;
    }
    return { totalCount, dimension: this.dimension, namespaces };
  }
}
