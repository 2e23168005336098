import { logger } from "../logger.js";
import { HISTORY_LIMIT, type Message } from "./history.js";

/**
 * Sliding-window history per session. The orchestrator never touches the
 * store; the HTTP layer reads a session's history before a turn and saves
 * the returned history afterwards.
 */
export interface SessionStore {
  getHistory(sessionId: string): Promise<Message[]>;
  saveHistory(sessionId: string, history: Message[]): Promise<void>;
  has(sessionId: string): Promise<boolean>;
  clear(sessionId: string): Promise<void>;
}

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, Message[]>();

  async getHistory(sessionId: string): Promise<Message[]> {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  async saveHistory(sessionId: string, history: Message[]): Promise<void> {
    if (!this.sessions.has(sessionId)) {
      logger.debug({ sessionId }, "Creating new session");
    }
    this.sessions.set(sessionId, history.slice(-HISTORY_LIMIT));
  }

  async has(sessionId: string): Promise<boolean> {
    return this.sessions.has(sessionId);
  }

  async clear(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
    logger.debug({ sessionId }, "Session history cleared");
  }
}
