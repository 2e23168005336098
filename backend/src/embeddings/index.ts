import { OpenAIEmbeddings } from "@langchain/openai";
import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { Config } from "../config/env.js";
import { logger } from "../logger.js";
import { withTimeout } from "../utils/timeout.js";

export const EMBEDDING_BATCH_SIZE = 100;

/**
 * Turns text into fixed-length vectors. `embed` resolves to `null` for input
 * that is empty once cleaned; `embedBatch` preserves input order.
 */
export interface EmbeddingProvider {
  readonly dimension: number;
  embed(text: string): Promise<number[] | null>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export function createOpenAIEmbeddings(config: Config): OpenAIEmbeddings {
  if (!config.openaiApiKey) {
    throw new Error("OpenAI API key is required for embeddings");
  }

  const embeddings = new OpenAIEmbeddings({
    apiKey: config.openaiApiKey,
    model: config.embeddingModel,
    batchSize: EMBEDDING_BATCH_SIZE,
    timeout: config.retrievalTimeoutMs,
    maxRetries: 1,
  });

  logger.debug(
    { provider: "openai", model: config.embeddingModel },
    "OpenAI embeddings instance created",
  );
  return embeddings;
}

export function cleanEmbeddingText(text: string): string {
  return text.replace(/\n/g, " ").trim();
}

export class LangChainEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly embeddings: EmbeddingsInterface,
    readonly dimension: number,
    private readonly timeoutMs: number,
  ) {}

  async embed(text: string): Promise<number[] | null> {
    const cleaned = cleanEmbeddingText(text);
    if (!cleaned) {
      logger.warn("Empty text provided for embedding");
      return null;
    }

    const vector = await withTimeout(
      this.embeddings.embedQuery(cleaned),
      this.timeoutMs,
      "Embedding request",
    );
    logger.debug({ text: cleaned.substring(0, 50) }, "Generated embedding");
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(i, i + EMBEDDING_BATCH_SIZE).map(cleanEmbeddingText);
      const batchVectors = await withTimeout(
        this.embeddings.embedDocuments(batch),
        this.timeoutMs,
        "Batch embedding request",
      );
      vectors.push(...batchVectors);
      logger.info(
        { batch: i / EMBEDDING_BATCH_SIZE + 1, size: batch.length },
        "Generated embeddings for batch",
      );
    }

    logger.info({ total: vectors.length }, "Batch embedding complete");
    return vectors;
  }
}
