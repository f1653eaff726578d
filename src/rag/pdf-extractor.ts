import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import { SourceError } from "./errors.js";
import type { ExtractedDocument, PageContent } from "./types.js";

export type PageExtractor = (filePath: string) => Promise<ExtractedDocument>;

export const extractPdf: PageExtractor = async (filePath) => {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (err) {
    throw new SourceError(filePath, `Cannot open PDF: ${filePath}`, { cause: err });
  }

  const pages: PageContent[] = [];
  try {
    const pdf = await getDocumentProxy(new Uint8Array(buffer));
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      const text = textContent.items
        .map((item: { str?: string }) => item.str ?? "")
        .join(" ");
      pages.push({ pageNumber: i, text });
    }
  } catch (err) {
    throw new SourceError(filePath, `Cannot parse PDF: ${filePath}`, { cause: err });
  }

  return {
    source: path.basename(filePath),
    filePath: path.resolve(filePath),
    pages,
  };
};
