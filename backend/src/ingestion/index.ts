export { FaqIngestor, type IngestOptions, type IngestReport } from "./faq-ingestor.js";
export {
  backupPathFor,
  mergeFaqFiles,
  mergeFaqSources,
  type MergeFilesOptions,
  type MergeFilesResult,
  type MergeResult,
  type MergeStats,
} from "./faq-merger.js";
export { validateFaqFile, validateFaqSource, type ValidationReport } from "./faq-validator.js";
export { NamespaceLock } from "./namespace-lock.js";
