import { readdir } from "node:fs/promises";
import path from "node:path";

/** PDFs directly inside `dir`, sorted by name. A missing directory has none. */
export async function scanPdfFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch {
    // no data directory yet
    return [];
  }

  return entries
    .filter((f) => f.toLowerCase().endsWith(".pdf"))
    .sort()
    .map((f) => path.join(dir, f));
}
