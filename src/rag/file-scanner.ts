import { readdir } from "node:fs/promises";
import path from "node:path";
import { RAG_CONFIG } from "./config.js";

export interface ScanResult {
  documents: string[];
  otherFiles: string[];
}

async function walk(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Lists every file under `dir` and splits them by extension. Files with another
 * extension are reported, never opened.
 */
export async function scanFiles(
  dir: string,
  extension: string = RAG_CONFIG.documentExtension,
): Promise<ScanResult> {
  const result: ScanResult = { documents: [], otherFiles: [] };
  const wanted = extension.toLowerCase();

  const files = (await walk(dir)).sort();
  for (const filePath of files) {
    if (path.extname(filePath).toLowerCase() === wanted) {
      result.documents.push(filePath);
    } else {
      result.otherFiles.push(filePath);
    }
  }
  return result;
}
