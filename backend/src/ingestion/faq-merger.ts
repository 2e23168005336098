import { copyFile, writeFile } from "fs/promises";
import path from "path";
import { format } from "date-fns";
import { IngestionError } from "../errors.js";
import { loadFaqFile } from "../loaders/faq-loader.js";
import { logger } from "../logger.js";
import type { FaqEntry, FaqSource } from "../models/faq.js";
import { validateFaqFile, type ValidationReport } from "./faq-validator.js";

export interface MergeStats {
  baseFaqs: number;
  newFaqs: number;
  added: number;
  updated: number;
  duplicatesSkipped: number;
  totalFaqs: number;
}

export interface MergeResult {
  source: FaqSource;
  stats: MergeStats;
  addedIds: string[];
  updatedIds: string[];
}

export interface MergeFilesOptions {
  baseFile: string;
  newFile: string;
  /** Defaults to overwriting `baseFile`. */
  outputFile?: string;
  backup?: boolean;
  now?: Date;
}

export interface MergeFilesResult extends MergeResult {
  outputFile: string;
  backupFile?: string;
  validation: ValidationReport;
}

function contentKey(entry: FaqEntry): string {
  return JSON.stringify([
    entry.category,
    entry.question,
    entry.answer,
    entry.keywords,
    entry.related_faqs,
  ]);
}

/**
 * Merges `incoming` into `base`. Base order is kept; changed entries are
 * replaced in place with the incoming version and new ids are appended in
 * the order they appear in `incoming`.
 */
export function mergeFaqSources(base: FaqSource, incoming: FaqSource, now = new Date()): MergeResult {
  const merged = base.faqs.map((entry) => ({ ...entry }));
  const positions = new Map(merged.map((entry, position) => [entry.id, position]));
  const seenIncoming = new Set<string>();
  const addedIds: string[] = [];
  const updatedIds: string[] = [];
  let duplicatesSkipped = 0;

  for (const entry of incoming.faqs) {
    if (seenIncoming.has(entry.id)) {
      logger.warn({ id: entry.id }, "Repeated id in incoming FAQ file, skipping");
      duplicatesSkipped++;
      continue;
    }
    seenIncoming.add(entry.id);

    const position = positions.get(entry.id);
    if (position === undefined) {
      positions.set(entry.id, merged.length);
      merged.push({ ...entry });
      addedIds.push(entry.id);
    } else if (contentKey(merged[position]) === contentKey(entry)) {
      duplicatesSkipped++;
    } else {
      merged[position] = { ...entry };
      updatedIds.push(entry.id);
    }
  }

  const source: FaqSource = {
    metadata: {
      ...base.metadata,
      lastUpdated: now.toISOString(),
      totalFaqs: merged.length,
    },
    faqs: merged,
  };

  const stats: MergeStats = {
    baseFaqs: base.faqs.length,
    newFaqs: incoming.faqs.length,
    added: addedIds.length,
    updated: updatedIds.length,
    duplicatesSkipped,
    totalFaqs: merged.length,
  };

  logger.info(stats, "FAQ sources merged");
  return { source, stats, addedIds, updatedIds };
}

export function backupPathFor(filePath: string, now: Date): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}_backup_${format(now, "yyyyMMdd_HHmmss")}${parsed.ext}`);
}

export async function mergeFaqFiles(options: MergeFilesOptions): Promise<MergeFilesResult> {
  const { baseFile, newFile, backup = true, now = new Date() } = options;
  const outputFile = options.outputFile ?? baseFile;

  for (const filePath of [baseFile, newFile]) {
    const report = await validateFaqFile(filePath);
    if (!report.valid) {
      throw new IngestionError(`${filePath} is invalid: ${report.errors.join("; ")}`);
    }
  }

  const [base, incoming] = await Promise.all([loadFaqFile(baseFile), loadFaqFile(newFile)]);
  const result = mergeFaqSources(base, incoming, now);

  let backupFile: string | undefined;
  if (backup) {
    backupFile = backupPathFor(baseFile, now);
    await copyFile(baseFile, backupFile);
    logger.info({ backupFile }, "Base FAQ file backed up");
  }

  await writeFile(outputFile, `${JSON.stringify(result.source, null, 2)}\n`, "utf-8");
  logger.info({ outputFile, totalFaqs: result.stats.totalFaqs }, "Merged FAQ file written");

  const validation = await validateFaqFile(outputFile);
  return { ...result, outputFile, backupFile, validation };
}
