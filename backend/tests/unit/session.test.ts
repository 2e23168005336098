import { describe, test, expect } from "vitest";
import {
  HISTORY_LIMIT,
  MessageSchema,
  NO_CONTEXT,
  appendToHistory,
  createMessage,
  renderHistoryContext,
} from "../../src/session/history.js";
import { InMemorySessionStore } from "../../src/session/session-store.js";

const now = new Date("2026-03-01T12:00:00.000Z");

function messages(count: number) {
  return Array.from({ length: count }, (_, position) => createMessage("user", `m${position}`, now));
}

describe("conversation history", () => {
  test("should stamp messages with an ISO timestamp", () => {
    expect(createMessage("assistant", "Hello", now)).toEqual({
      role: "assistant",
      content: "Hello",
      timestamp: "2026-03-01T12:00:00.000Z",
    });
  });

  test("should cap appended history at the limit", () => {
    const history = appendToHistory(messages(9), ...messages(3));

    expect(history).toHaveLength(HISTORY_LIMIT);
    expect(history[0].content).toBe("m2");
    expect(history[9].content).toBe("m2");
  });

  test("should not modify the input array", () => {
    const original = messages(2);

    appendToHistory(original, createMessage("assistant", "reply", now));

    expect(original).toHaveLength(2);
  });

  test("should render the placeholder for an empty history", () => {
    expect(renderHistoryContext([])).toBe(NO_CONTEXT);
  });

  test("should render the last five messages with capitalized roles", () => {
    const history = [
      ...messages(4),
      createMessage("assistant", "a1", now),
      createMessage("system", "s1", now),
    ];

    expect(renderHistoryContext(history)).toBe(
      "Previous conversation:\nUser: m1\nUser: m2\nUser: m3\nAssistant: a1\nSystem: s1",
    );
  });

  test("should reject messages with an unknown role", () => {
    expect(MessageSchema.safeParse({ role: "bot", content: "x", timestamp: "t" }).success).toBe(false);
  });
});

describe("InMemorySessionStore", () => {
  test("should return an empty history for a new session", async () => {
    const store = new InMemorySessionStore();

    expect(await store.getHistory("unknown")).toEqual([]);
    expect(await store.has("unknown")).toBe(false);
  });

  test("should save, cap and clear a session", async () => {
    const store = new InMemorySessionStore();

    await store.saveHistory("s1", messages(12));

    expect(await store.has("s1")).toBe(true);
    expect((await store.getHistory("s1")).map((message) => message.content)[0]).toBe("m2");
    expect(await store.getHistory("s1")).toHaveLength(HISTORY_LIMIT);

    await store.clear("s1");

    expect(await store.has("s1")).toBe(false);
  });

  test("should hand out copies of the stored history", async () => {
    const store = new InMemorySessionStore();
    await store.saveHistory("s1", messages(1));

    (await store.getHistory("s1")).push(createMessage("user", "extra", now));

    expect(await store.getHistory("s1")).toHaveLength(1);
  });
});
