import { z } from "zod";

export const HISTORY_LIMIT = 10;
export const CONTEXT_WINDOW = 5;
export const NO_CONTEXT = "No previous context";

export const MessageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
  timestamp: z.string(),
});

export type Message = z.infer<typeof MessageSchema>;
export type MessageRole = Message["role"];

export function createMessage(role: MessageRole, content: string, now = new Date()): Message {
  return { role, content, timestamp: now.toISOString() };
}

/** Returns a new history with `messages` appended, keeping the newest `HISTORY_LIMIT`. */
export function appendToHistory(history: readonly Message[], ...messages: Message[]): Message[] {
  return [...history, ...messages].slice(-HISTORY_LIMIT);
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function renderHistoryContext(history: readonly Message[]): string {
  if (history.length === 0) {
    return NO_CONTEXT;
  }

  const lines = history
    .slice(-CONTEXT_WINDOW)
    .map((message) => `${capitalize(message.role)}: ${message.content}`);
  return `Previous conversation:\n${lines.join("\n")}`;
}
