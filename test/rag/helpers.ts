import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { EMBEDDING_DIM } from "../../src/rag/config.js";
import type { EmbeddingModel } from "../../src/rag/embedding-service.js";
import { SourceError } from "../../src/rag/errors.js";
import type { CrossEncoder, QueryPair } from "../../src/rag/reranker.js";
import type { Chunk, ExtractedDocument, PageContent } from "../../src/rag/types.js";

/** Bag-of-words vector: each word bumps one slot chosen by a string hash. */
export function hashEmbed(text: string, dims = EMBEDDING_DIM): number[] {
  const vector = new Array<number>(dims).fill(0);
  for (const word of text.toLowerCase().split(/\s+/).filter(Boolean)) {
    let h = 0;
    for (const ch of word) h = (h * 31 + ch.charCodeAt(0)) >>> 0;
    vector[h % dims] = (vector[h % dims] ?? 0) + 1;
  }
  return vector;
}

export function fakeEmbeddingModel(dims = EMBEDDING_DIM) {
  const encode = vi.fn(async (texts: string[]) => texts.map((t) => hashEmbed(t, dims)));
  const model: EmbeddingModel = { encode };
  return { model, encode };
}

/** Scores a pair by how many query words appear in the text. */
export function fakeCrossEncoder() {
  const predict = vi.fn(async (pairs: QueryPair[]) =>
    pairs.map(([query, text]) => {
      const words = new Set(text.toLowerCase().split(/\s+/));
      return query
        .toLowerCase()
        .split(/\s+/)
        .filter((w) => words.has(w)).length;
    }),
  );
  const model: CrossEncoder = { predict };
  return { model, predict };
}

export function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  const text = overrides.text ?? "sample text";
  return {
    documentId: "doc00001",
    documentName: "sample.pdf",
    chunkIndex: 0,
    page: 1,
    text,
    startWord: 0,
    endWord: text.split(/\s+/).length,
    ...overrides,
  };
}

export function fakeExtractor(pagesByName: Record<string, string[]>) {
  return vi.fn(async (filePath: string): Promise<ExtractedDocument> => {
    const source = path.basename(filePath);
    const texts = pagesByName[source];
    if (!texts) throw new SourceError(filePath, `Cannot parse PDF: ${filePath}`);
    const pages: PageContent[] = texts.map((text, i) => ({ pageNumber: i + 1, text }));
    return { source, filePath, pages };
  });
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "pdf-rag-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Writes a placeholder file; only its name and size matter to the fingerprint. */
export async function touchFile(dir: string, name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, content);
  return filePath;
}
