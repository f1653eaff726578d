import { getDocumentId } from "../fingerprint.js";
import { extractPdf, type PageExtractor } from "../pdf-extractor.js";
import type { Chunk, DocumentInfo } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";
import { WordWindowChunker } from "./word-window-chunker.js";

export interface ChunkedDocument {
  document: DocumentInfo;
  chunks: Chunk[];
}

export interface ChunkedCorpus {
  documents: DocumentInfo[];
  chunks: Chunk[];
}

export interface PdfChunkerDeps {
  extract?: PageExtractor;
  strategy?: ChunkingStrategy;
}

const defaultStrategy = new WordWindowChunker();

export async function chunkPdf(
  filePath: string,
  options: ChunkingOptions,
  { extract = extractPdf, strategy = defaultStrategy }: PdfChunkerDeps = {},
): Promise<ChunkedDocument> {
  const id = await getDocumentId(filePath);
  const extracted = await extract(filePath);

  const document: DocumentInfo = {
    id,
    name: extracted.source,
    filePath: extracted.filePath,
    pageCount: extracted.pages.length,
  };

  return { document, chunks: strategy.chunk(document, extracted.pages, options) };
}

/** Chunks each file in order and concatenates the results without reindexing. */
export async function chunkPdfs(
  filePaths: string[],
  options: ChunkingOptions,
  deps: PdfChunkerDeps = {},
): Promise<ChunkedCorpus> {
  const corpus: ChunkedCorpus = { documents: [], chunks: [] };
  for (const filePath of filePaths) {
    const { document, chunks } = await chunkPdf(filePath, options, deps);
    corpus.documents.push(document);
    corpus.chunks.push(...chunks);
  }
  return corpus;
}
