import { ConfigError } from "../errors.js";
import type { Chunk, DocumentInfo, PageContent } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

export function assertChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap <= 0 || overlap >= chunkSize) {
    throw new ConfigError(
      `overlap must be a positive integer below chunkSize (${chunkSize}), got ${overlap}`,
    );
  }
}

/**
 * Slides a window of `chunkSize` words over each page, advancing by
 * `chunkSize - overlap`. The last window of a page may be short. Chunk indices
 * run across the whole document.
 */
export class WordWindowChunker implements ChunkingStrategy {
  readonly name = "word-window";

  chunk(document: DocumentInfo, pages: PageContent[], options: ChunkingOptions): Chunk[] {
    assertChunkingOptions(options);
    const { chunkSize, overlap } = options;
    const step = chunkSize - overlap;

    const chunks: Chunk[] = [];
    let chunkIndex = 0;

    for (const page of pages) {
      const words = page.text.split(/\s+/).filter((w) => w.length > 0);
      if (words.length === 0) continue;

      for (let start = 0; start < words.length; start += step) {
        const window = words.slice(start, start + chunkSize);
        chunks.push({
          documentId: document.id,
          documentName: document.name,
          chunkIndex: chunkIndex++,
          page: page.pageNumber,
          text: window.join(" "),
          startWord: start,
          endWord: start + window.length,
        });
      }
    }

    return chunks;
  }
}
