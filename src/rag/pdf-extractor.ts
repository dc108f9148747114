import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import type { DocumentLoader, ExtractedDocument, PageContent } from "./types.js";

export async function extractPdf(filePath: string): Promise<ExtractedDocument> {
  const buffer = await readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));

  const pages: PageContent[] = [];
  for (let i = 1; i <= pdf.numPages; i++) {
    const page = await pdf.getPage(i);
    const textContent = await page.getTextContent();
    // Keep line breaks: header/footer and paragraph detection work on lines
    const text = textContent.items
      .map((item: { str?: string; hasEOL?: boolean }) => (item.str ?? "") + (item.hasEOL ? "\n" : ""))
      .join("");
    pages.push({ pageNumber: i, text });
  }
  await pdf.destroy();

  return {
    source: path.basename(filePath),
    filePath: path.resolve(filePath),
    pages,
  };
}

export const pdfLoader: DocumentLoader = { load: extractPdf };
