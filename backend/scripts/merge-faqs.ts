import { Command } from "commander";
import { createKnowledgeServices } from "../src/bootstrap.js";
import { getConfig } from "../src/config/env.js";
import { mergeFaqFiles, validateFaqFile, type ValidationReport } from "../src/ingestion/index.js";
import { logger } from "../src/logger.js";
import { getDefaultFaqPath } from "../src/utils/paths.js";

interface MergeCliOptions {
  newFile: string;
  baseFile: string;
  outputFile?: string;
  backup: boolean;
  autoIngest: boolean;
  validateOnly: boolean;
}

const program = new Command()
  .name("merge-faqs")
  .description("Merge a new FAQ file into the base file and optionally re-ingest it")
  .option("--new-file <path>", "FAQ file with new or changed entries", getDefaultFaqPath("faq_new.json"))
  .option("--base-file <path>", "FAQ file to merge into", getDefaultFaqPath())
  .option("--output-file <path>", "where to write the merged file (defaults to the base file)")
  .option("--no-backup", "do not back up the base file")
  .option("--auto-ingest", "re-ingest the merged file with a cleared namespace", false)
  .option("--validate-only", "validate both files and stop", false);

function reportValidation(filePath: string, report: ValidationReport): boolean {
  for (const warning of report.warnings) {
    logger.warn({ filePath }, warning);
  }
  if (!report.valid) {
    logger.error({ filePath, errors: report.errors }, "FAQ file is invalid");
    return false;
  }
  logger.info({ filePath, faqs: report.faqCount, categories: report.categories }, "FAQ file is valid");
  return true;
}

async function main(): Promise<void> {
  const options = program.parse().opts<MergeCliOptions>();

  const baseValid = reportValidation(options.baseFile, await validateFaqFile(options.baseFile));
  const newValid = reportValidation(options.newFile, await validateFaqFile(options.newFile));
  if (!baseValid || !newValid) {
    process.exitCode = 1;
    return;
  }
  if (options.validateOnly) {
    logger.info("Validation complete");
    return;
  }

  const result = await mergeFaqFiles({
    baseFile: options.baseFile,
    newFile: options.newFile,
    outputFile: options.outputFile,
    backup: options.backup,
  });
  logger.info({ ...result.stats, outputFile: result.outputFile, backupFile: result.backupFile }, "Merge complete");

  if (!reportValidation(result.outputFile, result.validation)) {
    process.exitCode = 1;
    return;
  }

  if (options.autoIngest) {
    const config = getConfig();
    const { ingestor } = createKnowledgeServices(config);
    const report = await ingestor.ingestFile(result.outputFile, {
      namespace: config.knowledgeNamespace,
      clearFirst: true,
    });
    logger.info({ vectorsUpserted: report.vectorsUpserted }, "Merged FAQs ingested");
  } else {
    logger.info(`To ingest the merged FAQs run: npm run ingest -- --file ${result.outputFile} --clear`);
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, "FAQ merge failed");
  process.exit(1);
});
