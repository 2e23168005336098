import { Command } from "commander";
import { createKnowledgeServices } from "../src/bootstrap.js";
import { getConfig } from "../src/config/env.js";
import { validateFaqFile } from "../src/ingestion/index.js";
import { logger } from "../src/logger.js";
import { getDefaultFaqPath } from "../src/utils/paths.js";

interface IngestCliOptions {
  file: string;
  namespace?: string;
  clear: boolean;
  verify: boolean;
}

const program = new Command()
  .name("ingest-faq")
  .description("Embed a FAQ source file and upsert it into the knowledge index")
  .option("-f, --file <path>", "FAQ source file", getDefaultFaqPath())
  .option("-n, --namespace <name>", "index namespace (defaults to KNOWLEDGE_NAMESPACE)")
  .option("--clear", "delete the namespace before ingesting", false)
  .option("--no-verify", "skip the sample query after ingestion");

async function main(): Promise<void> {
  const options = program.parse().opts<IngestCliOptions>();
  const config = getConfig();
  const namespace = options.namespace ?? config.knowledgeNamespace;

  logger.info({ file: options.file, namespace, clear: options.clear }, "Starting FAQ ingestion");

  const validation = await validateFaqFile(options.file);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.valid) {
    logger.error({ errors: validation.errors }, "FAQ file is invalid, nothing ingested");
    process.exitCode = 1;
    return;
  }

  const { ingestor, retriever } = createKnowledgeServices(config);
  const report = await ingestor.ingestFile(options.file, { namespace, clearFirst: options.clear });
  logger.info(report, "Ingestion complete");

  if (options.verify) {
    const sampleQuery = "What teas do you sell?";
    const hits = await retriever.retrieve(sampleQuery, { namespace });
    logger.info(
      { query: sampleQuery, hits: hits.map((hit) => ({ id: hit.id, score: hit.score })) },
      "Sample query complete",
    );

    if (hits.length > 0) {
      const related = await retriever.getRelated(hits[0].id, 3, namespace);
      logger.info({ id: hits[0].id, related: related.map((hit) => hit.id) }, "Related FAQs");
    }
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, "FAQ ingestion failed");
  process.exit(1);
});
