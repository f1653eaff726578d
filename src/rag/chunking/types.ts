import type { Chunk, DocumentInfo, PageContent } from "../types.js";

export interface ChunkingOptions {
  /** Words per chunk. */
  chunkSize: number;
  /** Words shared by consecutive chunks of a page. */
  overlap: number;
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(document: DocumentInfo, pages: PageContent[], options: ChunkingOptions): Chunk[];
}
