export type Logger = (msg: string) => void;

export const noopLogger: Logger = () => {};

export interface PageContent {
  pageNumber: number;
  text: string;
}

export interface ExtractedDocument {
  source: string;
  filePath: string;
  pages: PageContent[];
}

export interface DocumentInfo {
  /** 8-character fingerprint of file name and byte size. */
  id: string;
  name: string;
  filePath: string;
  pageCount: number;
}

export interface Chunk {
  documentId: string;
  documentName: string;
  /** Zero-based, unique within the owning document only. */
  chunkIndex: number;
  /** 1-based page number. */
  page: number;
  text: string;
  startWord: number;
  /** Exclusive. */
  endWord: number;
}

export interface ScoredChunk extends Chunk {
  score: number;
}

export type EmbeddingVector = number[];

/** Persisted per-document mapping of chunk key to vector. */
export interface CacheStore {
  [chunkKey: string]: EmbeddingVector;
}
