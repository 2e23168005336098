import { describe, test, expect } from "vitest";
import {
  IntentClassifier,
  extractTrackingNumber,
  toIntentDecision,
} from "../../src/agents/intent-classifier.js";
import { ClassificationError } from "../../src/errors.js";
import { CompletionError } from "../../src/llm/completion.js";
import { createMessage } from "../../src/session/history.js";
import { ScriptedCompletion } from "../helpers/fakes.js";

describe("extractTrackingNumber", () => {
  test("should pick the first code-like token", () => {
    expect(extractTrackingNumber("Track my shipment JD014600006281230704 please")).toBe(
      "JD014600006281230704",
    );
  });

  test("should accept an all-caps token when the message is about tracking", () => {
    expect(extractTrackingNumber("track ABCDEFGHIJ for me")).toBe("ABCDEFGHIJ");
  });

  test("should ignore all-caps words outside a tracking context", () => {
    expect(extractTrackingNumber("I love ABCDEFGHIJ tea")).toBeUndefined();
  });

  test("should ignore tokens shorter than eight characters", () => {
    expect(extractTrackingNumber("Track TEST123")).toBeUndefined();
  });
});

describe("toIntentDecision", () => {
  test("should normalize intent labels", () => {
    expect(toIntentDecision({ intent: " FAQ ", confidence: 0.5 }, "q").intent).toBe("faq");
    expect(toIntentDecision({ intent: "shopping", confidence: 0.5 }, "q").intent).toBe("unknown");
    expect(toIntentDecision({ confidence: 0.5 }, "q").intent).toBe("unknown");
  });

  test("should clamp and parse confidence", () => {
    expect(toIntentDecision({ intent: "faq", confidence: 1.7 }, "q").confidence).toBe(1);
    expect(toIntentDecision({ intent: "faq", confidence: -0.2 }, "q").confidence).toBe(0);
    expect(toIntentDecision({ intent: "faq", confidence: "0.8" }, "q").confidence).toBe(0.8);
    expect(toIntentDecision({ intent: "faq", confidence: "high" }, "q").confidence).toBe(0);
  });

  test("should treat the string null as absent", () => {
    const decision = toIntentDecision(
      { intent: "faq", confidence: 0.9, tracking_number: "null", faq_query: "null" },
      "Do you sell oolong?",
    );

    expect(decision).toEqual({ intent: "faq", confidence: 0.9, faqQuery: "Do you sell oolong?" });
  });

  test("should fall back to the heuristic only for tracking intent", () => {
    const message = "Where is parcel 1234567890?";

    expect(toIntentDecision({ intent: "dhl_tracking", confidence: 0.9 }, message)).toEqual({
      intent: "dhl_tracking",
      confidence: 0.9,
      trackingNumber: "1234567890",
    });
    expect(toIntentDecision({ intent: "general_chat", confidence: 0.9 }, message)).toEqual({
      intent: "general_chat",
      confidence: 0.9,
    });
  });
});

describe("IntentClassifier", () => {
  test("should classify a FAQ question", async () => {
    const completion = new ScriptedCompletion([
      '{"intent": "faq", "confidence": 0.95, "tracking_number": null, "faq_query": "What teas do you sell?"}',
    ]);
    const classifier = new IntentClassifier(completion, { businessName: "Leafline Tea" });

    const decision = await classifier.classify("What teas do you sell?", []);

    expect(decision).toEqual({ intent: "faq", confidence: 0.95, faqQuery: "What teas do you sell?" });
    expect(completion.requests).toEqual([{ temperature: 0.3, maxTokens: 500 }]);
    expect(completion.prompts[0]).toContain('User Message: "What teas do you sell?"');
    expect(completion.prompts[0]).toContain("No previous context");
    expect(completion.prompts[0]).toContain("general information about Leafline Tea");
  });

  test("should include recent history in the prompt", async () => {
    const completion = new ScriptedCompletion(['{"intent": "general_chat", "confidence": 0.6}']);
    const classifier = new IntentClassifier(completion, { businessName: "Leafline Tea" });
    const history = [
      createMessage("user", "hello", new Date("2026-03-01T10:00:00Z")),
      createMessage("assistant", "Hi! How can I help?", new Date("2026-03-01T10:00:01Z")),
    ];

    await classifier.classify("thanks", history);

    expect(completion.prompts[0]).toContain(
      "Previous conversation:\nUser: hello\nAssistant: Hi! How can I help?",
    );
  });

  test("should read JSON wrapped in a markdown fence", async () => {
    const completion = new ScriptedCompletion([
      '```json\n{"intent": "dhl_tracking", "confidence": 0.98, "tracking_number": "TEST123"}\n```',
    ]);
    const classifier = new IntentClassifier(completion, { businessName: "Leafline Tea" });

    await expect(classifier.classify("Track my shipment TEST123", [])).resolves.toEqual({
      intent: "dhl_tracking",
      confidence: 0.98,
      trackingNumber: "TEST123",
    });
  });

  test("should raise ClassificationError for unparseable output", async () => {
    const completion = new ScriptedCompletion(["not json"]);
    const classifier = new IntentClassifier(completion, { businessName: "Leafline Tea" });

    const error = await classifier.classify("hmm", []).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ClassificationError);
    expect(error).toHaveProperty(
      "message",
      "Intent analysis failed: could not parse model output as JSON: not json",
    );
    expect(error).toHaveProperty("category", "classification");
  });

  test("should raise ClassificationError when the provider fails", async () => {
    const completion = new ScriptedCompletion([
      new CompletionError("provider", "completion provider error: timeout"),
    ]);
    const classifier = new IntentClassifier(completion, { businessName: "Leafline Tea" });

    await expect(classifier.classify("hmm", [])).rejects.toThrow(
      "Intent analysis failed: completion provider error: timeout",
    );
  });
});
