import type { EmbeddingProvider } from "../embeddings/index.js";
import { IngestionError, errorMessage } from "../errors.js";
import { faqToEmbeddingText, faqToMetadata, loadFaqFile } from "../loaders/faq-loader.js";
import { componentLogger } from "../logger.js";
import type { FaqEntry } from "../models/faq.js";
import type { IndexStats, VectorIndex, VectorRecord } from "../vector-stores/types.js";
import { NamespaceLock } from "./namespace-lock.js";

const logger = componentLogger("faq-ingestor");

export interface IngestOptions {
  namespace?: string;
  clearFirst?: boolean;
}

export interface IngestReport {
  faqsLoaded: number;
  vectorsCreated: number;
  vectorsUpserted: number;
  indexStats: IndexStats;
  namespace: string;
}

/**
 * Loads FAQ sources into the vector index. Every mutating call holds the
 * namespace lock for its whole duration, so a clear can never interleave
 * with another ingest into the same namespace.
 */
export class FaqIngestor {
  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly lock: NamespaceLock = new NamespaceLock(),
    private readonly defaultNamespace = "default",
  ) {}

  async prepareRecords(faqs: FaqEntry[]): Promise<VectorRecord[]> {
    const vectors = await this.embeddings.embedBatch(faqs.map(faqToEmbeddingText));
    if (vectors.length !== faqs.length) {
      throw new IngestionError(
        `embedding provider returned ${vectors.length} vectors for ${faqs.length} entries`,
      );
    }

    const records: VectorRecord[] = [];
    faqs.forEach((faq, position) => {
      const values = vectors[position];
      if (values.length === 0) {
        logger.warn({ id: faq.id }, "Skipping FAQ without embedding");
        return;
      }
      records.push({ id: faq.id, values, metadata: faqToMetadata(faq) });
    });

    logger.info({ count: records.length }, "Prepared vectors for ingestion");
    return records;
  }

  async ingestFaqs(faqs: FaqEntry[], options: IngestOptions = {}): Promise<IngestReport> {
    const namespace = options.namespace ?? this.defaultNamespace;
    if (faqs.length === 0) {
      throw new IngestionError("no FAQs found");
    }

    return this.lock.run(namespace, async () => {
      try {
        if (options.clearFirst) {
          logger.info({ namespace }, "Clearing namespace before ingestion");
          await this.index.deleteAll(namespace);
        }

        const records = await this.prepareRecords(faqs);
        if (records.length === 0) {
          throw new IngestionError("no vectors prepared");
        }

        const upserted = await this.index.upsert(records, namespace);
        const indexStats = await this.index.stats();
        logger.info({ namespace, upserted }, "FAQ ingestion complete");

        return {
          faqsLoaded: faqs.length,
          vectorsCreated: records.length,
          vectorsUpserted: upserted,
          indexStats,
          namespace,
        };
      } catch (error) {
        logger.error({ error, namespace }, "FAQ ingestion failed");
        if (error instanceof IngestionError) {
          throw error;
        }
        throw new IngestionError(errorMessage(error), { cause: error });
      }
    });
  }

  async ingestFile(filePath: string, options: IngestOptions = {}): Promise<IngestReport> {
    logger.info({ filePath }, "Starting FAQ ingestion");
    const source = await loadFaqFile(filePath);
    return this.ingestFaqs(source.faqs, options);
  }

  async upsertEntry(faq: FaqEntry, namespace = this.defaultNamespace): Promise<number> {
    return this.lock.run(namespace, async () => {
      const records = await this.prepareRecords([faq]);
      if (records.length === 0) {
        return 0;
      }
      const count = await this.index.upsert(records, namespace);
      logger.info({ id: faq.id, namespace }, "Updated FAQ");
      return count;
    });
  }

  async clear(namespace = this.defaultNamespace): Promise<void> {
    await this.lock.run(namespace, () => this.index.deleteAll(namespace));
    logger.info({ namespace }, "Namespace cleared");
  }
}
