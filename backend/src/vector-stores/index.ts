import type { Config } from "../config/env.js";
import type { EmbeddingProvider } from "../embeddings/index.js";
import { createChromaVectorIndex } from "./chroma.js";
import { InMemoryVectorIndex } from "./memory.js";
import type { VectorIndex } from "./types.js";

export function createVectorIndex(config: Config, embeddings: EmbeddingProvider): VectorIndex {
  if (config.vectorStoreType === "memory") {
    return new InMemoryVectorIndex(embeddings.dimension);
  }
  return createChromaVectorIndex(config, embeddings);
}

export { ChromaVectorIndex, createChromaVectorIndex } from "./chroma.js";
export { InMemoryVectorIndex, cosineSimilarity } from "./memory.js";
export type {
  IndexStats,
  VectorIndex,
  VectorMatch,
  VectorMetadata,
  VectorMetadataValue,
  VectorQuery,
  VectorRecord,
} from "./types.js";
