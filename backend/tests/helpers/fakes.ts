import type { EmbeddingProvider } from "../../src/embeddings/index.js";
import { CompletionError, type CompletionProvider, type CompletionRequest } from "../../src/llm/completion.js";
import type { FaqEntry } from "../../src/models/faq.js";

type ScriptedReply = string | Error | (() => Promise<string>);

/** Answers each `complete` call with the next scripted reply, recording the prompts it saw. */
export class ScriptedCompletion implements CompletionProvider {
  readonly prompts: string[] = [];
  readonly requests: CompletionRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async complete(prompt: string, request: CompletionRequest): Promise<string> {
    this.prompts.push(prompt);
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new CompletionError("provider", "no scripted reply left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply() : reply;
  }
}

/**
 * Bag-of-words embeddings over a fixed vocabulary: component i counts the
 * occurrences of `vocabulary[i]` in the lowercased text.
 */
export class KeywordEmbeddings implements EmbeddingProvider {
  readonly dimension: number;
  readonly queries: string[] = [];

  constructor(private readonly vocabulary: string[]) {
    this.dimension = vocabulary.length;
  }

  vectorFor(text: string): number[] {
    const lowered = text.toLowerCase();
    return this.vocabulary.map((word) => lowered.split(word).length - 1);
  }

  async embed(text: string): Promise<number[] | null> {
    this.queries.push(text);
    return text.trim() ? this.vectorFor(text) : null;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorFor(text));
  }
}

export function faqEntry(overrides: Partial<FaqEntry> & Pick<FaqEntry, "id">): FaqEntry {
  return {
    category: "general",
    question: `Question for ${overrides.id}?`,
    answer: `Answer for ${overrides.id}.`,
    keywords: [],
    related_faqs: [],
    ...overrides,
  };
}
