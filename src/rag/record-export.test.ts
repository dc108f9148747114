import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { attachMetadata } from "./metadata-attacher.js";
import { formatRecords, saveRecords } from "./record-export.js";
import { makeTempDir, SAMPLE_METADATA } from "./test-helpers/fakes.js";

const METADATA = { title: "T", authors: ["A, B."], year: null, citation: null };

describe("formatRecords", () => {
  it("writes one block per record", () => {
    const records = [
      attachMetadata({ text: "First one.", position: 1 }, METADATA),
      attachMetadata({ text: "Second one.", position: 2 }, METADATA),
    ];

    expect(formatRecords(records)).toBe(
      'Sentence: First one.\nMetadata: {"title":"T","authors":["A, B."],"year":null,"citation":null,"phraseNumber":1}\n\n' +
        'Sentence: Second one.\nMetadata: {"title":"T","authors":["A, B."],"year":null,"citation":null,"phraseNumber":2}\n\n',
    );
  });

  it("is empty for no records", () => {
    expect(formatRecords([])).toBe("");
  });
});

describe("saveRecords", () => {
  it("creates missing directories and writes the formatted records", async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const outputFile = path.join(dir, "out", "records.txt");
      const records = [attachMetadata({ text: "Only one.", position: 1 }, SAMPLE_METADATA)];

      await saveRecords(records, outputFile);

      expect(await readFile(outputFile, "utf-8")).toBe(formatRecords(records));
    } finally {
      await cleanup();
    }
  });
});

describe("attachMetadata", () => {
  it("copies the document metadata and numbers the segment", () => {
    const record = attachMetadata({ text: "Widgets matter.", position: 7 }, SAMPLE_METADATA);

    expect(record).toEqual({
      sentence: "Widgets matter.",
      metadata: { ...SAMPLE_METADATA, phraseNumber: 7 },
    });
    expect(record.metadata.authors).not.toBe(SAMPLE_METADATA.authors);
  });
});
