import type { EmbeddingProvider } from "../embeddings/index.js";
import { RetrievalError, errorMessage } from "../errors.js";
import { splitMetadataList } from "../loaders/faq-loader.js";
import { componentLogger } from "../logger.js";
import { StoredFaqMetadataSchema, type KnowledgeEntry, type KnowledgeHit } from "../models/faq.js";
import { withTimeout } from "../utils/timeout.js";
import type { StoredVector, VectorIndex, VectorMatch } from "../vector-stores/types.js";

const logger = componentLogger("knowledge-retriever");

export interface RetrieverDefaults {
  namespace: string;
  topK: number;
  minScore: number;
  timeoutMs: number;
}

export interface RetrieveOptions {
  topK?: number;
  minScore?: number;
  category?: string;
  namespace?: string;
}

export const DEFAULT_RETRIEVER_OPTIONS: RetrieverDefaults = {
  namespace: "default",
  topK: 3,
  minScore: 0.7,
  timeoutMs: 10000,
};

export function toKnowledgeEntry(stored: StoredVector): KnowledgeEntry | null {
  const parsed = StoredFaqMetadataSchema.safeParse(stored.metadata);
  if (!parsed.success) {
    logger.warn({ id: stored.id, issues: parsed.error.issues }, "Skipping entry with malformed metadata");
    return null;
  }

  const metadata = parsed.data;
  const entry: KnowledgeEntry = {
    id: metadata.id,
    question: metadata.question,
    answer: metadata.answer,
    category: metadata.category,
    keywords: splitMetadataList(metadata.keywords),
  };
  if (metadata.related_faqs !== undefined) {
    entry.relatedIds = splitMetadataList(metadata.related_faqs);
  }
  return entry;
}

export function matchToHit(match: VectorMatch): KnowledgeHit | null {
  const entry = toKnowledgeEntry(match);
  return entry ? { ...entry, score: match.score } : null;
}

/**
 * Semantic search over the FAQ index.
 *
 * `retrieve` over-fetches `2 * topK` neighbours and then drops everything
 * below `minScore`, so it can return fewer than `topK` hits even when more
 * relevant entries sit just outside the fetch window.
 */
export class KnowledgeRetriever {
  private readonly defaults: RetrieverDefaults;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly index: VectorIndex,
    defaults: Partial<RetrieverDefaults> = {},
  ) {
    this.defaults = { ...DEFAULT_RETRIEVER_OPTIONS, ...defaults };
  }

  private async embedQuery(query: string): Promise<number[] | null> {
    try {
      return await this.embeddings.embed(query);
    } catch (error) {
      logger.error({ error }, "Query embedding failed");
      throw new RetrievalError(`embedding failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async search(
    vector: number[],
    topK: number,
    namespace: string,
    category?: string,
  ): Promise<VectorMatch[]> {
    try {
      return await withTimeout(
        this.index.query(vector, {
          topK,
          namespace,
          filter: category ? { category } : undefined,
        }),
        this.defaults.timeoutMs,
        "Vector index query",
      );
    } catch (error) {
      logger.error({ error, namespace }, "Vector index query failed");
      throw new RetrievalError(`index query failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<KnowledgeHit[]> {
    const topK = options.topK ?? this.defaults.topK;
    const minScore = options.minScore ?? this.defaults.minScore;
    const namespace = options.namespace ?? this.defaults.namespace;

    const vector = await this.embedQuery(query);
    if (!vector || vector.length === 0) {
      logger.warn({ query: query.substring(0, 50) }, "No embedding for query, returning no hits");
      return [];
    }

    const matches = await this.search(vector, topK * 2, namespace, options.category);

    const hits: KnowledgeHit[] = [];
    for (const match of matches) {
      if (match.score < minScore) {
        continue;
      }
      const hit = matchToHit(match);
      if (hit) {
        hits.push(hit);
      }
    }
    const results = hits.slice(0, topK);

    logger.info(
      { query: query.substring(0, 50), fetched: matches.length, returned: results.length },
      "Knowledge retrieval complete",
    );
    for (const hit of results) {
      logger.debug({ id: hit.id, score: hit.score }, "Knowledge hit");
    }
    return results;
  }

  async getByCategory(category: string, topK = 10, namespace?: string): Promise<KnowledgeHit[]> {
    const vector = await this.embedQuery(`Tell me about ${category}`);
    if (!vector || vector.length === 0) {
      return [];
    }

    const matches = await this.search(vector, topK, namespace ?? this.defaults.namespace, category);
    const hits = matches.map(matchToHit).filter((hit): hit is KnowledgeHit => hit !== null);
    logger.info({ category, count: hits.length }, "Retrieved FAQs by category");
    return hits;
  }

  async searchKeywords(keywords: string[], topK = 5, namespace?: string): Promise<KnowledgeHit[]> {
    const query = keywords.map((keyword) => keyword.trim()).filter(Boolean).join(" ");
    if (!query) {
      return [];
    }
    return this.retrieve(query, { topK, namespace });
  }

  async getById(id: string, namespace?: string): Promise<KnowledgeEntry | null> {
    const target = namespace ?? this.defaults.namespace;
    let stored: StoredVector[];
    try {
      stored = await withTimeout(
        this.index.fetch([id], target),
        this.defaults.timeoutMs,
        "Vector index fetch",
      );
    } catch (error) {
      logger.error({ error, id, namespace: target }, "Vector index fetch failed");
      throw new RetrievalError(`index fetch failed: ${errorMessage(error)}`, { cause: error });
    }

    const found = stored.find((entry) => entry.id === id);
    return found ? toKnowledgeEntry(found) : null;
  }

  /** Nearest neighbours of an entry's own question, excluding the entry itself. */
  async getRelated(id: string, topK = 3, namespace?: string): Promise<KnowledgeHit[]> {
    const entry = await this.getById(id, namespace);
    if (!entry) {
      logger.info({ id }, "No FAQ to find related entries for");
      return [];
    }

    const hits = await this.retrieve(entry.question, { topK: topK + 1, namespace });
    const related = hits.filter((hit) => hit.id !== id).slice(0, topK);
    logger.info({ id, count: related.length }, "Found related FAQs");
    return related;
  }
}
