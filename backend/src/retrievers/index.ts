import type { Config } from "../config/env.js";
import type { EmbeddingProvider } from "../embeddings/index.js";
import type { VectorIndex } from "../vector-stores/types.js";
import { KnowledgeRetriever } from "./knowledge-retriever.js";

export function createKnowledgeRetriever(
  config: Config,
  embeddings: EmbeddingProvider,
  index: VectorIndex,
): KnowledgeRetriever {
  return new KnowledgeRetriever(embeddings, index, {
    namespace: config.knowledgeNamespace,
    topK: config.topK,
    minScore: config.scoreThreshold,
    timeoutMs: config.retrievalTimeoutMs,
  });
}

export {
  KnowledgeRetriever,
  matchToHit,
  toKnowledgeEntry,
  DEFAULT_RETRIEVER_OPTIONS,
  type RetrieveOptions,
  type RetrieverDefaults,
} from "./knowledge-retriever.js";
