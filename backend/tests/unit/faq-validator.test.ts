import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { validateFaqFile, validateFaqSource } from "../../src/ingestion/faq-validator.js";
import { getDefaultFaqPath } from "../../src/utils/paths.js";

const metadata = { version: "1.0", language: "en", lastUpdated: "2026-03-01", totalFaqs: 1 };

describe("validateFaqSource", () => {
  test("should require a faqs list", () => {
    expect(validateFaqSource({})).toEqual({
      valid: false,
      errors: ["Missing 'faqs' key in JSON"],
      warnings: [],
      faqCount: 0,
      categories: [],
    });
    expect(validateFaqSource({ faqs: "none" }).errors).toEqual(["'faqs' must be a list"]);
    expect(validateFaqSource([]).errors).toEqual(["Missing 'faqs' key in JSON"]);
  });

  test("should accept a clean source", () => {
    const report = validateFaqSource({
      metadata,
      faqs: [
        { id: "faq_001", category: "shipping", question: "Q1?", answer: "A1.", keywords: ["dhl"] },
        { id: "faq_002", category: "brewing", question: "Q2?", answer: "A2." },
      ],
    });

    expect(report).toEqual({
      valid: true,
      errors: [],
      warnings: [],
      faqCount: 2,
      categories: ["brewing", "shipping"],
    });
  });

  test("should warn about missing metadata", () => {
    expect(validateFaqSource({ faqs: [] }).warnings).toEqual([
      "No metadata found (recommended but not required)",
    ]);
    expect(validateFaqSource({ metadata: { version: "1.0" }, faqs: [] }).warnings).toEqual([
      "Metadata missing recommended field: language",
      "Metadata missing recommended field: lastUpdated",
      "Metadata missing recommended field: totalFaqs",
    ]);
  });

  test("should report entry errors and warnings by position", () => {
    const report = validateFaqSource({
      metadata,
      faqs: [
        "not an entry",
        { id: "faq_1", category: "products", question: "", answer: "A" },
        { id: "faq_1", category: "products", question: "Q", answer: "A", keywords: "tea" },
        { id: "x2", category: "gifts", question: "Q", answer: "A", keywords: [], related_faqs: "faq_1" },
        { category: "products", question: "Q", answer: "A" },
      ],
    });

    expect(report.valid).toBe(false);
    expect(report.errors).toEqual([
      "FAQ #1: Entry must be an object",
      "FAQ #2: Field 'question' is empty",
      "FAQ #3: Duplicate ID 'faq_1'",
      "FAQ #3: 'keywords' must be a list",
      "FAQ #4: 'related_faqs' must be a list",
      "FAQ #5: Missing required field 'id'",
    ]);
    expect(report.warnings).toEqual([
      "FAQ #4: ID should start with 'faq_' (e.g., 'faq_001')",
      "FAQ #4: Category 'gifts' not in standard list. Valid: products, pricing, ordering, shipping, returns, brewing, tea_production, tea_processing, quality_standards, wholesale, company, general",
      "FAQ #4: 'keywords' is empty",
    ]);
    expect(report.faqCount).toBe(5);
    expect(report.categories).toEqual(["gifts", "products"]);
  });

  test("should warn about very long questions and answers", () => {
    const report = validateFaqSource({
      metadata,
      faqs: [{ id: "faq_001", category: "general", question: "q".repeat(501), answer: "a".repeat(2001) }],
    });

    expect(report.valid).toBe(true);
    expect(report.warnings).toEqual([
      "FAQ #1: Question is very long (501 chars)",
      "FAQ #1: Answer is very long (2001 chars)",
    ]);
  });
});

describe("validateFaqFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "faq-validate-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("should accept the bundled FAQ files", async () => {
    const report = await validateFaqFile(getDefaultFaqPath());

    expect(report.valid).toBe(true);
    expect(report.warnings).toEqual([]);
    expect(report.faqCount).toBe(12);
    expect((await validateFaqFile(getDefaultFaqPath("faq_new.json"))).valid).toBe(true);
  });

  test("should report malformed JSON", async () => {
    const filePath = path.join(dir, "broken.json");
    await writeFile(filePath, "{ not json", "utf-8");

    const report = await validateFaqFile(filePath);

    expect(report.valid).toBe(false);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].startsWith("Invalid JSON format: ")).toBe(true);
  });

  test("should report an unreadable file", async () => {
    const report = await validateFaqFile(path.join(dir, "missing.json"));

    expect(report.valid).toBe(false);
    expect(report.errors[0].startsWith(`Could not read ${path.join(dir, "missing.json")}: `)).toBe(true);
  });
});
