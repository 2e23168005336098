export type VectorMetadataValue = string | number | boolean;
export type VectorMetadata = Record<string, VectorMetadataValue>;

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

export interface VectorMatch {
  id: string;
  /** Similarity in [0, 1]; higher is closer. */
  score: number;
  metadata: VectorMetadata;
}

/** A stored entry read back by id, without its vector. */
export interface StoredVector {
  id: string;
  metadata: VectorMetadata;
}

export interface VectorQuery {
  topK: number;
  namespace: string;
  /** Exact-match metadata filter. */
  filter?: Record<string, string>;
}

export interface IndexStats {
  totalCount: number;
  dimension: number;
  namespaces: Record<string, number>;
}

/**
 * Nearest-neighbour index partitioned by namespace. `query` resolves matches
 * ordered by descending score.
 */
export interface VectorIndex {
  upsert(records: VectorRecord[], namespace: string): Promise<number>;
  query(vector: number[], query: VectorQuery): Promise<VectorMatch[]>;
  /** Entries with the given ids, in request order; unknown ids are left out. */
  fetch(ids: string[], namespace: string): Promise<StoredVector[]>;
  deleteAll(namespace: string): Promise<void>;
  stats(): Promise<IndexStats>;
}
