import type { ChunkingStrategy } from "./types.js";
import { WordWindowChunker } from "./word-window-chunker.js";

const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new Error(`Unknown chunking strategy: ${name}`);
  }
  return strategy;
}

// Register defaults
registerChunkingStrategy(new WordWindowChunker());

export const DEFAULT_CHUNKING_STRATEGY = "word-window";

export { WordWindowChunker } from "./word-window-chunker.js";
export { chunkPdf, chunkPdfs, type ChunkedCorpus, type ChunkedDocument } from "./pdf-chunker.js";
export type { ChunkingOptions, ChunkingStrategy } from "./types.js";
