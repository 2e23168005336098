import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { backupPathFor, mergeFaqFiles, mergeFaqSources } from "../../src/ingestion/faq-merger.js";
import type { FaqSource } from "../../src/models/faq.js";
import { faqEntry } from "../helpers/fakes.js";

const now = new Date("2026-03-01T12:00:00.000Z");

const base: FaqSource = {
  metadata: { version: "1.0", language: "en", lastUpdated: "2026-01-01", totalFaqs: 2 },
  faqs: [
    faqEntry({ id: "faq_a", category: "brewing" }),
    faqEntry({ id: "faq_b", category: "shipping" }),
  ],
};

describe("mergeFaqSources", () => {
  test("should update in place, append new ids and skip duplicates", () => {
    const incoming: FaqSource = {
      faqs: [
        faqEntry({ id: "faq_b", category: "shipping", answer: "Now with tracking." }),
        faqEntry({ id: "faq_a", category: "brewing" }),
        faqEntry({ id: "faq_c", category: "returns" }),
        faqEntry({ id: "faq_c", category: "returns", answer: "Second copy." }),
      ],
    };

    const result = mergeFaqSources(base, incoming, now);

    expect(result.source.faqs.map((entry) => entry.id)).toEqual(["faq_a", "faq_b", "faq_c"]);
    expect(result.source.faqs[1].answer).toBe("Now with tracking.");
    expect(result.source.faqs[2].answer).toBe("Answer for faq_c.");
    expect(result.addedIds).toEqual(["faq_c"]);
    expect(result.updatedIds).toEqual(["faq_b"]);
    expect(result.stats).toEqual({
      baseFaqs: 2,
      newFaqs: 4,
      added: 1,
      updated: 1,
      duplicatesSkipped: 2,
      totalFaqs: 3,
    });
    expect(result.source.metadata).toEqual({
      version: "1.0",
      language: "en",
      lastUpdated: "2026-03-01T12:00:00.000Z",
      totalFaqs: 3,
    });
  });

  test("should not modify the base source", () => {
    mergeFaqSources(base, { faqs: [faqEntry({ id: "faq_a", answer: "Changed." })] }, now);

    expect(base.faqs[0].answer).toBe("Answer for faq_a.");
    expect(base.metadata?.totalFaqs).toBe(2);
  });
});

describe("backupPathFor", () => {
  test("should add a timestamp before the extension", () => {
    const localTime = new Date(2026, 2, 1, 9, 5, 7);

    expect(backupPathFor("/srv/data/faq/faq_en.json", localTime)).toBe(
      "/srv/data/faq/faq_en_backup_20260301_090507.json",
    );
  });
});

describe("mergeFaqFiles", () => {
  let dir: string;
  let baseFile: string;
  let newFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "faq-merge-"));
    baseFile = path.join(dir, "faq_en.json");
    newFile = path.join(dir, "faq_new.json");
    await writeFile(baseFile, JSON.stringify(base), "utf-8");
    await writeFile(
      newFile,
      JSON.stringify({ metadata: base.metadata, faqs: [faqEntry({ id: "faq_c", category: "returns" })] }),
      "utf-8",
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("should back up the base file and write the merged source", async () => {
    const result = await mergeFaqFiles({ baseFile, newFile, now });

    expect(result.outputFile).toBe(baseFile);
    expect(result.backupFile).toBe(backupPathFor(baseFile, now));
    expect(result.validation.valid).toBe(true);
    expect(result.stats.totalFaqs).toBe(3);

    const written = await readFile(baseFile, "utf-8");
    expect(written.endsWith("}\n")).toBe(true);
    expect(JSON.parse(written).faqs.map((entry: { id: string }) => entry.id)).toEqual([
      "faq_a",
      "faq_b",
      "faq_c",
    ]);
    expect(JSON.parse(await readFile(backupPathFor(baseFile, now), "utf-8"))).toEqual(base);
  });

  test("should write to a separate output file without a backup", async () => {
    const outputFile = path.join(dir, "merged.json");

    const result = await mergeFaqFiles({ baseFile, newFile, outputFile, backup: false, now });

    expect(result.backupFile).toBeUndefined();
    expect(JSON.parse(await readFile(baseFile, "utf-8"))).toEqual(base);
    expect(JSON.parse(await readFile(outputFile, "utf-8")).metadata.totalFaqs).toBe(3);
  });

  test("should refuse to merge an invalid file", async () => {
    await writeFile(newFile, JSON.stringify({ entries: [] }), "utf-8");

    await expect(mergeFaqFiles({ baseFile, newFile, now })).rejects.toThrow(
      `Knowledge ingestion failed: ${newFile} is invalid: Missing 'faqs' key in JSON`,
    );
  });
});
