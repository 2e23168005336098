import { createApp } from "./app.js";
import { createAssistantServices } from "./bootstrap.js";
import { getConfig } from "./config/env.js";
import { logger } from "./logger.js";
import { shutdownLangfuse } from "./utils/langfuse.js";

const config = getConfig();
const services = createAssistantServices(config);

const app = createApp({
  config,
  orchestrator: services.orchestrator,
  sessions: services.sessions,
  mockTracking: services.tracker.mockMode,
});

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, env: config.nodeEnv }, "Server started successfully");
});

process.on("SIGTERM", () => {
  logger.info("SIGTERM received, shutting down gracefully");
  server.close(() => {
    shutdownLangfuse()
      .catch((error: unknown) => logger.error({ error }, "Langfuse shutdown failed"))
      .finally(() => {
        logger.info("Server closed");
        process.exit(0);
      });
  });
});
