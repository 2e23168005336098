import { ChromaClient, type Collection, type Metadata, type Where } from "chromadb";
import type { Config } from "../config/env.js";
import type { EmbeddingProvider } from "../embeddings/index.js";
import { logger } from "../logger.js";
import type {
  IndexStats,
  StoredVector,
  VectorIndex,
  VectorMatch,
  VectorMetadata,
  VectorQuery,
  VectorRecord,
} from "./types.js";

const UPSERT_BATCH_SIZE = 100;

function createChromaClient(config: Config): ChromaClient {
  return new ChromaClient({
    host: config.chromaHost,
    port: config.chromaPort,
    ssl: config.chromaSsl,
    ...(config.chromaApiKey && {
      headers: { "x-chroma-token": config.chromaApiKey },
    }),
  });
}

function toVectorMetadata(metadata: Metadata | null | undefined): VectorMetadata {
  const result: VectorMetadata = {};
  if (!metadata) {
    return result;
  }
  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      result[key] = value;
    }
  }
  return result;
}

export function isMissingCollection(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes("does not exist") || message.includes("not found");
}

/** Resolves null when the collection was dropped underneath the call. */
export function unlessCollectionMissing<T>(operation: Promise<T>): Promise<T | null> {
  return operation.catch((error: unknown) => {
    if (!isMissingCollection(error)) {
      throw error;
    }
    return null;
  });
}

/**
 * Chroma-backed index. Each namespace is its own collection
 * (`<collection>-<namespace>`) in cosine space, so a match's score is
 * `1 - distance`.
 */
export class ChromaVectorIndex implements VectorIndex {
  private collections = new Map<string, Collection>();

  constructor(
    private readonly client: ChromaClient,
    private readonly collectionName: string,
    private readonly embeddings: EmbeddingProvider,
  ) {}

  private nameFor(namespace: string): string {
    return `${this.collectionName}-${namespace}`;
  }

  private async collection(namespace: string): Promise<Collection> {
    const cached = this.collections.get(namespace);
    if (cached) {
      return cached;
    }

    const name = this.nameFor(namespace);
    const collection = await this.client.getOrCreateCollection({
      name,
      metadata: { "hnsw:space": "cosine" },
      embeddingFunction: {
        generate: (texts: string[]) => this.embeddings.embedBatch(texts),
      },
    });
    this.collections.set(namespace, collection);
    logger.debug({ collection: name }, "ChromaDB collection ready");
    return collection;
  }

  async upsert(records: VectorRecord[], namespace: string): Promise<number> {
    const collection = await this.collection(namespace);

    for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
      const batch = records.slice(i, i + UPSERT_BATCH_SIZE);
      await collection.upsert({
        ids: batch.map((record) => record.id),
        embeddings: batch.map((record) => record.values),
        metadatas: batch.map((record) => record.metadata),
      });
      logger.info(
        { namespace, batch: i / UPSERT_BATCH_SIZE + 1, size: batch.length },
        "Upserted vector batch",
      );
    }

    return records.length;
  }

  async query(vector: number[], query: VectorQuery): Promise<VectorMatch[]> {
    const collection = await this.collection(query.namespace);
    const where: Where | undefined =
      query.filter && Object.keys(query.filter).length > 0 ? { ...query.filter } : undefined;

    const result = await unlessCollectionMissing(
      collection.query({ queryEmbeddings: [vector], nResults: query.topK, where }),
    );
    if (!result) {
      // Cleared by a concurrent ingest; the next call recreates it.
      this.collections.delete(query.namespace);
      logger.warn({ namespace: query.namespace }, "ChromaDB collection vanished during query");
      return [];
    }

    const ids = result.ids[0] ?? [];
    const distances = result.distances[0] ?? [];
    const metadatas = result.metadatas[0] ?? [];

    const matches = ids.map((id, position) => {
      const distance = distances[position] ?? 1;
      return {
        id,
        score: Math.min(1, Math.max(0, 1 - distance)),
        metadata: toVectorMetadata(metadatas[position]),
      };
    });

    logger.debug({ namespace: query.namespace, matches: matches.length }, "ChromaDB query complete");
    return matches;
  }

  async fetch(ids: string[], namespace: string): Promise<StoredVector[]> {
    if (ids.length === 0) {
      return [];
    }
    const collection = await this.collection(namespace);

    const result = await unlessCollectionMissing(collection.get({ ids }));
    if (!result) {
      this.collections.delete(namespace);
      return [];
    }

    const byId = new Map(
      result.ids.map((id, position): [string, VectorMetadata] => [
        id,
        toVectorMetadata(result.metadatas[position]),
      ]),
    );
    return ids.flatMap((id) => {
      const metadata = byId.get(id);
      return metadata ? [{ id, metadata }] : [];
    });
  }

  async deleteAll(namespace: string): Promise<void> {
    const name = this.nameFor(namespace);
    try {
      await this.client.deleteCollection({ name });
      logger.info({ collection: name }, "Deleted ChromaDB collection");
    } catch (error: unknown) {
      if (!isMissingCollection(error)) {
        throw error;
      }
      logger.debug({ collection: name }, "ChromaDB collection did not exist");
    } finally {
      this.collections.delete(namespace);
    }
  }

  async stats(): Promise<IndexStats> {
    const prefix = `${this.collectionName}-`;
    const collections = await this.client.listCollections();
    const namespaces: Record<string, number> = {};
    let totalCount = 0;

    for (const collection of collections) {
      if (!collection.name.startsWith(prefix)) {
        continue;
      }
      const count = await collection.count();
      namespaces[collection.name.slice(prefix.length)] = count;
      totalCount += count;
    }

    return { totalCount, dimension: this.embeddings.dimension, namespaces };
  }
}

export function createChromaVectorIndex(
  config: Config,
  embeddings: EmbeddingProvider,
): ChromaVectorIndex {
  logger.debug(
    { host: config.chromaHost, port: config.chromaPort, collection: config.knowledgeCollection },
    "Connecting to ChromaDB",
  );
  return new ChromaVectorIndex(createChromaClient(config), config.knowledgeCollection, embeddings);
}
