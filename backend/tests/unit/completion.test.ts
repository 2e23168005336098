import { describe, test, expect, vi } from "vitest";
import { FakeListChatModel } from "@langchain/core/utils/testing";
import { ChatModelCompletionProvider, CompletionError } from "../../src/llm/completion.js";

const request = { temperature: 0.3, maxTokens: 500 };

describe("ChatModelCompletionProvider", () => {
  test("should return the trimmed model text", async () => {
    const provider = new ChatModelCompletionProvider(
      () => new FakeListChatModel({ responses: ["  Hello from the model \n"] }),
      1000,
    );

    await expect(provider.complete("Say hello", request)).resolves.toBe("Hello from the model");
  });

  test("should create one model per temperature and token budget", async () => {
    const createModel = vi.fn(() => new FakeListChatModel({ responses: ["ok"] }));
    const provider = new ChatModelCompletionProvider(createModel, 1000);

    await provider.complete("first", request);
    await provider.complete("second", request);
    await provider.complete("third", { temperature: 0.7, maxTokens: 1000 });

    expect(createModel).toHaveBeenCalledTimes(2);
    expect(createModel).toHaveBeenNthCalledWith(1, { temperature: 0.3, maxTokens: 500 });
    expect(createModel).toHaveBeenNthCalledWith(2, { temperature: 0.7, maxTokens: 1000 });
  });

  test("should report a blank answer as empty_output", async () => {
    const provider = new ChatModelCompletionProvider(
      () => new FakeListChatModel({ responses: ["   "] }),
      1000,
    );

    const error = await provider.complete("prompt", request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CompletionError);
    expect(error).toHaveProperty("kind", "empty_output");
  });

  test("should wrap model failures as provider errors", async () => {
    const model = new FakeListChatModel({ responses: ["unused"] });
    vi.spyOn(model, "invoke").mockRejectedValue(new Error("rate limited"));
    const provider = new ChatModelCompletionProvider(() => model, 1000);

    const error = await provider.complete("prompt", request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CompletionError);
    expect(error).toHaveProperty("kind", "provider");
    expect(error).toHaveProperty("message", "completion provider error: rate limited");
    expect(error).toHaveProperty("category", "internal");
  });

  test("should give up on a model slower than the timeout", async () => {
    const provider = new ChatModelCompletionProvider(
      () => new FakeListChatModel({ responses: ["late"], sleep: 200 }),
      10,
    );

    await expect(provider.complete("prompt", request)).rejects.toThrow(
      "completion provider error: Completion request timed out after 10ms",
    );
  });
});
