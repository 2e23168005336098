import { readFile } from "fs/promises";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { FAQ_CATEGORIES, isFaqCategory } from "../models/faq.js";

export const REQUIRED_FAQ_FIELDS = ["id", "category", "question", "answer"] as const;
export const RECOMMENDED_METADATA_FIELDS = ["version", "language", "lastUpdated", "totalFaqs"] as const;
export const MAX_QUESTION_LENGTH = 500;
export const MAX_ANSWER_LENGTH = 2000;

/** Errors reject a source file; warnings are reported but the file is accepted. */
export interface ValidationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
  faqCount: number;
  categories: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null || value === "") {
    return true;
  }
  return typeof value === "string" && value.trim() === "";
}

function validateEntry(
  entry: unknown,
  position: number,
  seenIds: Set<string>,
  errors: string[],
  warnings: string[],
): void {
  const ref = `FAQ #${position + 1}`;

  if (!isRecord(entry)) {
    errors.push(`${ref}: Entry must be an object`);
    return;
  }

  for (const field of REQUIRED_FAQ_FIELDS) {
    if (!(field in entry)) {
      errors.push(`${ref}: Missing required field '${field}'`);
    } else if (isBlank(entry[field])) {
      errors.push(`${ref}: Field '${field}' is empty`);
    }
  }

  const id = entry.id;
  if (id !== undefined) {
    const key = String(id);
    if (seenIds.has(key)) {
      errors.push(`${ref}: Duplicate ID '${key}'`);
    } else {
      seenIds.add(key);
    }
    if (typeof id !== "string" || !id.startsWith("faq_")) {
      warnings.push(`${ref}: ID should start with 'faq_' (e.g., 'faq_001')`);
    }
  }

  const category = entry.category;
  if (typeof category === "string" && category && !isFaqCategory(category)) {
    warnings.push(
      `${ref}: Category '${category}' not in standard list. Valid: ${FAQ_CATEGORIES.join(", ")}`,
    );
  }

  const question = entry.question;
  if (typeof question === "string" && question.length > MAX_QUESTION_LENGTH) {
    warnings.push(`${ref}: Question is very long (${question.length} chars)`);
  }

  const answer = entry.answer;
  if (typeof answer === "string" && answer.length > MAX_ANSWER_LENGTH) {
    warnings.push(`${ref}: Answer is very long (${answer.length} chars)`);
  }

  if ("keywords" in entry) {
    if (!Array.isArray(entry.keywords)) {
      errors.push(`${ref}: 'keywords' must be a list`);
    } else if (entry.keywords.length === 0) {
      warnings.push(`${ref}: 'keywords' is empty`);
    }
  }

  if ("related_faqs" in entry && !Array.isArray(entry.related_faqs)) {
    errors.push(`${ref}: 'related_faqs' must be a list`);
  }
}

export function validateFaqSource(data: unknown): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];
  const report = (faqCount = 0, categories: string[] = []): ValidationReport => ({
    valid: errors.length === 0,
    errors,
    warnings,
    faqCount,
    categories,
  });

  if (!isRecord(data) || !("faqs" in data)) {
    errors.push("Missing 'faqs' key in JSON");
    return report();
  }
  if (!Array.isArray(data.faqs)) {
    errors.push("'faqs' must be a list");
    return report();
  }

  if (isRecord(data.metadata)) {
    for (const field of RECOMMENDED_METADATA_FIELDS) {
      if (!(field in data.metadata)) {
        warnings.push(`Metadata missing recommended field: ${field}`);
      }
    }
  } else {
    warnings.push("No metadata found (recommended but not required)");
  }

  const seenIds = new Set<string>();
  const categories = new Set<string>();
  data.faqs.forEach((entry: unknown, position: number) => {
    validateEntry(entry, position, seenIds, errors, warnings);
    if (isRecord(entry) && typeof entry.category === "string" && entry.category) {
      categories.add(entry.category);
    }
  });

  return report(data.faqs.length, [...categories].sort());
}

export async function validateFaqFile(filePath: string): Promise<ValidationReport> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (error) {
    const reason =
      error instanceof SyntaxError
        ? `Invalid JSON format: ${error.message}`
        : `Could not read ${filePath}: ${errorMessage(error)}`;
    logger.error({ filePath, reason }, "FAQ validation failed");
    return { valid: false, errors: [reason], warnings: [], faqCount: 0, categories: [] };
  }

  const result = validateFaqSource(data);
  if (result.valid) {
    logger.info({ filePath, warnings: result.warnings.length }, "FAQ validation passed");
  } else {
    logger.error({ filePath, errors: result.errors.length }, "FAQ validation failed");
  }
  return result;
}
