import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Config } from "./config/env.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { TurnOrchestrator } from "./orchestrator/index.js";
import { MAX_MESSAGE_LENGTH, messageLength } from "./orchestrator/types.js";
import type { SessionStore } from "./session/session-store.js";
import { getLangfuse } from "./utils/langfuse.js";

export const ChatRequestSchema = z.object({
  message: z
    .string({ required_error: "message is required" })
    .trim()
    .min(1, "message must not be blank")
    .refine(
      (message) => messageLength(message) <= MAX_MESSAGE_LENGTH,
      `message must be at most ${MAX_MESSAGE_LENGTH} characters`,
    ),
  session_id: z.string().trim().min(1).max(100).optional(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface AppDependencies {
  config: Config;
  orchestrator: TurnOrchestrator;
  sessions: SessionStore;
  mockTracking: boolean;
}

export function createApp({ config, orchestrator, sessions, mockTracking }: AppDependencies) {
  const app = express();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      service: "leafline-assistant",
      features: {
        knowledgeBase: true,
        shipmentTracking: true,
        tracing: config.langfuseEnabled,
      },
      mockTracking,
    });
  });

  app.post("/api/chat", async (req, res) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues }, "Invalid chat request");
      return res.status(400).json({
        error: "Invalid request data",
        details: parsed.error.flatten().fieldErrors,
      });
    }

    const { message } = parsed.data;
    const sessionId = parsed.data.session_id ?? uuidv4();
    const trace = getLangfuse(config)?.trace({
      name: "conversation-turn",
      sessionId,
      metadata: { endpoint: "/api/chat", messageLength: messageLength(message) },
    });

    try {
      const history = await sessions.getHistory(sessionId);
      const result = await orchestrator.execute(message, sessionId, history, { trace });
      await sessions.saveHistory(sessionId, result.history);

      trace?.update({
        output: result.reply,
        metadata: {
          intent: result.intent,
          toolsUsed: result.toolsUsed,
          errorCategory: result.errorCategory,
          status: result.error ? "ERROR" : "OK",
        },
      });

      return res.json({
        reply: result.reply,
        session_id: sessionId,
        response_time_ms: result.elapsedMs,
        intent: result.intent,
        tools_used: result.toolsUsed,
      });
    } catch (error) {
      logger.error({ error, sessionId }, "Error processing chat message");
      trace?.update({ metadata: { error: errorMessage(error), status: "ERROR" } });
      return res.status(500).json({
        error: "Failed to process message",
        message: errorMessage(error),
      });
    }
  });

  app.get("/api/conversations/:sessionId", async (req, res) => {
    const { sessionId } = req.params;
    try {
      if (!(await sessions.has(sessionId))) {
        return res.status(404).json({ error: "Conversation not found" });
      }
      return res.json({ session_id: sessionId, messages: await sessions.getHistory(sessionId) });
    } catch (error) {
      logger.error({ error, sessionId }, "Error getting conversation");
      return res.status(500).json({
        error: "Failed to get conversation",
        message: errorMessage(error),
      });
    }
  });

  app.delete("/api/conversations/:sessionId", async (req, res) => {
    const { sessionId } = req.params;
    try {
      await sessions.clear(sessionId);
      return res.json({ success: true, session_id: sessionId });
    } catch (error) {
      logger.error({ error, sessionId }, "Error clearing conversation");
      return res.status(500).json({
        error: "Failed to clear conversation",
        message: errorMessage(error),
      });
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: "Invalid JSON body" });
    }
    logger.error({ error }, "Unhandled request error");
    return res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
