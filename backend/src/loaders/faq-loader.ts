import { readFile } from "fs/promises";
import { ZodError } from "zod";
import { IngestionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { FaqSourceSchema, type FaqEntry, type FaqSource } from "../models/faq.js";
import type { VectorMetadata } from "../vector-stores/types.js";

const LIST_SEPARATOR = ", ";

export async function readJsonFile(filePath: string): Promise<unknown> {
  const fileContent = await readFile(filePath, "utf-8");
  return JSON.parse(fileContent);
}

export async function loadFaqFile(filePath: string): Promise<FaqSource> {
  logger.debug({ filePath }, "Loading FAQ source file");

  try {
    const source = FaqSourceSchema.parse(await readJsonFile(filePath));
    logger.info({ filePath, count: source.faqs.length }, "FAQ source loaded");
    return source;
  } catch (error) {
    logger.error({ error, filePath }, "Failed to load FAQ source");
    const reason =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
        : errorMessage(error);
    throw new IngestionError(`could not load ${filePath}: ${reason}`, { cause: error });
  }
}

export function faqToEmbeddingText(faq: FaqEntry): string {
  let text = `Question: ${faq.question} Answer: ${faq.answer}`;
  if (faq.keywords.length > 0) {
    text += ` Keywords: ${faq.keywords.join(LIST_SEPARATOR)}`;
  }
  return text;
}

export function faqToMetadata(faq: FaqEntry): VectorMetadata {
  const metadata: VectorMetadata = {
    id: faq.id,
    question: faq.question,
    answer: faq.answer,
    category: faq.category || "general",
    keywords: faq.keywords.join(LIST_SEPARATOR),
  };

  if (faq.related_faqs.length > 0) {
    metadata.related_faqs = faq.related_faqs.join(LIST_SEPARATOR);
  }

  return metadata;
}

export function splitMetadataList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
