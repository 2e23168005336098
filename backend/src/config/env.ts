import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const ConfigSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  llmModel: z.string().default("gpt-4o-mini"),
  llmTimeoutMs: z.number().int().positive().default(30000),
  classifierTemperature: z.number().min(0).max(2).default(0.3),
  synthesisTemperature: z.number().min(0).max(2).default(0.7),
  embeddingModel: z.string().default("text-embedding-3-small"),
  embeddingDimension: z.number().int().positive().default(1536),
  vectorStoreType: z.enum(["chromadb", "memory"]).default("chromadb"),
  chromaHost: z.string().default("localhost"),
  chromaPort: z.number().int().positive().default(8000),
  chromaSsl: z.boolean().default(false),
  chromaApiKey: z.string().optional(),
  knowledgeCollection: z.string().min(1).default("faq"),
  knowledgeNamespace: z.string().min(1).default("default"),
  topK: z.number().int().positive().default(3),
  scoreThreshold: z.number().min(0).max(1).default(0.7),
  retrievalTimeoutMs: z.number().int().positive().default(10000),
  lockDir: z.string().min(1).optional(),
  dhlApiKey: z.string().min(1).optional(),
  dhlBaseUrl: z.string().url().default("https://api-eu.dhl.com/track/shipments"),
  trackingTimeoutMs: z.number().int().positive().default(10000),
  turnTimeoutMs: z.number().int().positive().optional(),
  businessName: z.string().default("Leafline Tea"),
  supportEmail: z.string().email().default("support@leaflinetea.example"),
  port: z.number().int().positive().default(3001),
  corsOrigin: z.string().default("http://localhost:5173"),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "silent"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  langfuseEnabled: z.boolean().default(false),
  langfuseSecretKey: z.string().optional(),
  langfusePublicKey: z.string().optional(),
  langfuseBaseUrl: z.string().default("https://cloud.langfuse.com"),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

function readInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function readFloat(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

function readOptional(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

export function getConfig(): Config {
  if (config) {
    return config;
  }

  const rawConfig = {
    openaiApiKey: readOptional(process.env.OPENAI_API_KEY),
    llmModel: process.env.LLM_MODEL,
    llmTimeoutMs: readInt(process.env.LLM_TIMEOUT_MS),
    classifierTemperature: readFloat(process.env.CLASSIFIER_TEMPERATURE),
    synthesisTemperature: readFloat(process.env.SYNTHESIS_TEMPERATURE),
    embeddingModel: process.env.EMBEDDING_MODEL,
    embeddingDimension: readInt(process.env.EMBEDDING_DIMENSION),
    vectorStoreType: process.env.VECTOR_STORE_TYPE,
    chromaHost: process.env.CHROMA_HOST,
    chromaPort: readInt(process.env.CHROMA_PORT),
    chromaSsl: process.env.CHROMA_SSL === "true",
    chromaApiKey: readOptional(process.env.CHROMA_API_KEY),
    knowledgeCollection: process.env.KNOWLEDGE_COLLECTION,
    knowledgeNamespace: process.env.KNOWLEDGE_NAMESPACE,
    topK: readInt(process.env.TOP_K),
    scoreThreshold: readFloat(process.env.SCORE_THRESHOLD),
    retrievalTimeoutMs: readInt(process.env.RETRIEVAL_TIMEOUT_MS),
    lockDir: readOptional(process.env.INGEST_LOCK_DIR),
    // An empty key keeps the tracker in mock mode.
    dhlApiKey: readOptional(process.env.DHL_API_KEY),
    dhlBaseUrl: process.env.DHL_BASE_URL,
    trackingTimeoutMs: readInt(process.env.TRACKING_TIMEOUT_MS),
    turnTimeoutMs: readInt(process.env.TURN_TIMEOUT_MS),
    businessName: process.env.BUSINESS_NAME,
    supportEmail: process.env.SUPPORT_EMAIL,
    port: readInt(process.env.PORT),
    corsOrigin: process.env.CORS_ORIGIN,
    logLevel: process.env.LOG_LEVEL,
    nodeEnv: process.env.NODE_ENV,
    langfuseEnabled: process.env.LANGFUSE_ENABLED === "true",
    langfuseSecretKey: process.env.LANGFUSE_SECRET_KEY,
    langfusePublicKey: process.env.LANGFUSE_PUBLIC_KEY,
    langfuseBaseUrl: process.env.LANGFUSE_BASE_URL,
  };

  config = ConfigSchema.parse(rawConfig);
  return config;
}
