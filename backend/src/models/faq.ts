import { z } from "zod";

export const FAQ_CATEGORIES = [
  "products",
  "pricing",
  "ordering",
  "shipping",
  "returns",
  "brewing",
  "tea_production",
  "tea_processing",
  "quality_standards",
  "wholesale",
  "company",
  "general",
] as const;

export type FaqCategory = (typeof FAQ_CATEGORIES)[number];

export function isFaqCategory(value: string): value is FaqCategory {
  return FAQ_CATEGORIES.some((category) => category === value);
}

export const FaqEntrySchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  question: z.string().min(1),
  answer: z.string().min(1),
  keywords: z.array(z.string()).default([]),
  related_faqs: z.array(z.string()).default([]),
});

export const FaqMetadataSchema = z.object({
  version: z.string().optional(),
  language: z.string().optional(),
  lastUpdated: z.string().optional(),
  totalFaqs: z.number().int().nonnegative().optional(),
});

export const FaqSourceSchema = z.object({
  metadata: FaqMetadataSchema.optional(),
  faqs: z.array(FaqEntrySchema),
});

export type FaqEntry = z.infer<typeof FaqEntrySchema>;
export type FaqMetadata = z.infer<typeof FaqMetadataSchema>;
export type FaqSource = z.infer<typeof FaqSourceSchema>;

/** Flattened form of a `FaqEntry` as it is stored beside its vector. */
export const StoredFaqMetadataSchema = z.object({
  id: z.string().min(1),
  question: z.string(),
  answer: z.string(),
  category: z.string().default("general"),
  keywords: z.string().optional(),
  related_faqs: z.string().optional(),
});

export type StoredFaqMetadata = z.infer<typeof StoredFaqMetadataSchema>;

export interface KnowledgeEntry {
  id: string;
  question: string;
  answer: string;
  category: string;
  keywords: string[];
  relatedIds?: string[];
}

export interface KnowledgeHit extends KnowledgeEntry {
  /** Similarity in [0, 1]. */
  score: number;
}
