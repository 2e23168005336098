import { Langfuse, type LangfuseSpanClient, type LangfuseTraceClient } from "langfuse";
import type { Config } from "../config/env.js";
import { logger } from "../logger.js";

export type TraceParent = LangfuseTraceClient | LangfuseSpanClient;

let langfuseInstance: Langfuse | null = null;

export function getLangfuse(config: Config): Langfuse | null {
  if (!config.langfuseEnabled) {
    return null;
  }

  if (langfuseInstance) {
    return langfuseInstance;
  }

  if (!config.langfuseSecretKey || !config.langfusePublicKey) {
    logger.warn(
      "Langfuse is enabled but LANGFUSE_SECRET_KEY or LANGFUSE_PUBLIC_KEY is not set. Tracing is disabled.",
    );
    return null;
  }

  try {
    langfuseInstance = new Langfuse({
      secretKey: config.langfuseSecretKey,
      publicKey: config.langfusePublicKey,
      baseUrl: config.langfuseBaseUrl,
    });
    logger.info("Langfuse initialized");
    return langfuseInstance;
  } catch (error) {
    logger.error({ error }, "Failed to initialize Langfuse");
    return null;
  }
}

/** Opens a child span; tracer failures are logged and never reach the caller. */
export function startSpan(
  parent: TraceParent | undefined,
  name: string,
  metadata?: Record<string, unknown>,
): LangfuseSpanClient | undefined {
  if (!parent) {
    return undefined;
  }
  try {
    return parent.span({ name, metadata });
  } catch (error) {
    logger.warn({ error, span: name }, "Langfuse span could not be started");
    return undefined;
  }
}

export function endSpan(
  span: LangfuseSpanClient | undefined,
  metadata?: Record<string, unknown>,
  failed = false,
): void {
  if (!span) {
    return;
  }
  try {
    span.end({ metadata, ...(failed && { level: "ERROR" as const }) });
  } catch (error) {
    logger.warn({ error }, "Langfuse span could not be ended");
  }
}

export async function shutdownLangfuse(): Promise<void> {
  if (!langfuseInstance) {
    return;
  }
  try {
    await langfuseInstance.shutdownAsync();
  } catch (error) {
    logger.warn({ error }, "Langfuse shutdown failed");
  } finally {
    langfuseInstance = null;
  }
}
