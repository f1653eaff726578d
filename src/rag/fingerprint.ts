import { createHash } from "node:crypto";
import { stat } from "node:fs/promises";
import path from "node:path";
import { SourceError } from "./errors.js";
import type { DocumentInfo } from "./types.js";

/**
 * Stable across re-reads of an unmodified file. Not a content hash: two files
 * with the same name and byte size share an id.
 */
export async function getDocumentId(filePath: string): Promise<string> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (err) {
    throw new SourceError(filePath, `Cannot open PDF: ${filePath}`, { cause: err });
  }
  return fingerprint(path.basename(filePath), size);
}

export function fingerprint(fileName: string, byteSize: number): string {
  return createHash("md5").update(`${fileName}_${byteSize}`).digest("hex").slice(0, 8);
}

export function describeDocument(document: DocumentInfo): string {
  return `PDF '${document.name}' with ${document.pageCount} pages (ID: ${document.id})`;
}
