import { PromptTemplate } from "@langchain/core/prompts";

export const intentPrompt = PromptTemplate.fromTemplate(`Analyze the user's message and determine their intent.

User Message: "{userMessage}"

Previous Context:
{context}

Intent Categories:
1. faq - Questions about tea, products, the company, ordering, pricing, or general information about {businessName}
2. dhl_tracking - Tracking a shipment or the delivery status of a package
3. greeting - Hello, hi, greetings, how are you
4. general_chat - Small talk, casual conversation, or unclear intent
5. unknown - Cannot determine the intent clearly

Rules:
- A tracking number, or words like "track", "shipment", "delivery", "package" mean dhl_tracking
- Questions about tea, products, prices or the company mean faq
- A bare "hi", "hello" or "hey" means greeting

Also extract:
- tracking_number: the DHL tracking code in the message (alphanumeric, usually 10-39 characters), or null
- faq_query: for faq intent, the core question restated, or null

Respond ONLY with one JSON object, no markdown and no explanation:
{{
  "intent": "one of: faq, dhl_tracking, greeting, general_chat, unknown",
  "confidence": 0.85,
  "tracking_number": "extracted code or null",
  "faq_query": "extracted question or null"
}}

Examples:

User: "What teas do you sell?"
{{"intent": "faq", "confidence": 0.95, "tracking_number": null, "faq_query": "What teas do you sell?"}}

User: "Track my shipment TEST123"
{{"intent": "dhl_tracking", "confidence": 0.98, "tracking_number": "TEST123", "faq_query": null}}

User: "Hi there!"
{{"intent": "greeting", "confidence": 1.0, "tracking_number": null, "faq_query": null}}

Now analyze the message above.`);
