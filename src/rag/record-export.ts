import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { SegmentRecord } from "./types.js";

/** Human-readable dump of a run, one block per record. Not meant to be parsed back. */
export function formatRecords(records: SegmentRecord[]): string {
  return records
    .map((r) => `Sentence: ${r.sentence}\nMetadata: ${JSON.stringify(r.metadata)}\n\n`)
    .join("");
}

export async function saveRecords(records: SegmentRecord[], outputFile: string): Promise<void> {
  await mkdir(path.dirname(outputFile), { recursive: true });
  await writeFile(outputFile, formatRecords(records));
}
