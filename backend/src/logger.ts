import pino, { type Logger } from "pino";
import { getConfig } from "./config/env.js";

const config = getConfig();

const isDevelopment = config.nodeEnv === "development";

export const logger = pino({
  level: config.logLevel,
  base: { service: "leafline-assistant" },
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname,service",
        },
      }
    : undefined,
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
