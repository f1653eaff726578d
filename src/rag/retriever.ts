import { chunkKey, type EmbeddingCache } from "./embedding-cache.js";
import type { Reranker } from "./reranker.js";
import { cosineSimilarity, jaccardSimilarity } from "./similarity.js";
import type { Chunk, EmbeddingVector, ScoredChunk } from "./types.js";

/** Given a query and candidate chunks, produce the best `topK`, highest score first. */
export interface RetrievalStrategy {
  readonly name: string;
  retrieve(query: string, chunks: Chunk[], topK: number): Promise<ScoredChunk[]>;
}

/**
 * Stage 1: cosine similarity of the query against every chunk that has a
 * vector. Chunks without one are skipped.
 */
export function semanticSearch(
  chunks: Chunk[],
  embeddings: ReadonlyMap<string, EmbeddingVector>,
  queryVector: EmbeddingVector,
  topK: number,
): ScoredChunk[] {
  const scored: ScoredChunk[] = [];
  for (const chunk of chunks) {
    const vector = embeddings.get(chunkKey(chunk));
    if (!vector) continue;
    scored.push({ ...chunk, score: cosineSimilarity(queryVector, vector) });
  }

  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, Math.max(0, topK));
}

/**
 * Two-stage retrieval: a cheap cosine pre-filter down to `retrievalTopK`
 * candidates, then the cross-encoder down to `topK`.
 */
export async function retrieveWithReranking(
  query: string,
  chunks: Chunk[],
  embeddingCache: EmbeddingCache,
  reranker: Reranker,
  topK: number,
  retrievalTopK: number,
): Promise<ScoredChunk[]> {
  if (chunks.length === 0 || topK <= 0) return [];

  const embeddings = await embeddingCache.getEmbeddings(chunks);
  const queryVector = await embeddingCache.embedText(query);

  const candidates = semanticSearch(chunks, embeddings, queryVector, retrievalTopK);
  if (candidates.length === 0) return [];

  return reranker.rerank(query, candidates, topK);
}

/** Keyword fallback that needs no model: Jaccard overlap of word sets. */
export function simpleSimilaritySearch(
  query: string,
  chunks: Chunk[],
  topK: number,
): ScoredChunk[] {
  const scored = chunks.map((chunk) => ({
    ...chunk,
    score: jaccardSimilarity(query, chunk.text),
  }));
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, Math.max(0, topK));
}

export function filterByDocument(chunks: Chunk[], documentId: string): Chunk[] {
  return chunks.filter((c) => c.documentId === documentId);
}

export class SemanticRerankRetriever implements RetrievalStrategy {
  readonly name = "semantic";

  constructor(
    private readonly embeddingCache: EmbeddingCache,
    private readonly reranker: Reranker,
    private readonly retrievalTopK: number,
  ) {}

  retrieve(query: string, chunks: Chunk[], topK: number): Promise<ScoredChunk[]> {
    return retrieveWithReranking(
      query,
      chunks,
      this.embeddingCache,
      this.reranker,
      topK,
      this.retrievalTopK,
    );
  }
}

export class KeywordRetriever implements RetrievalStrategy {
  readonly name = "keyword";

  async retrieve(query: string, chunks: Chunk[], topK: number): Promise<ScoredChunk[]> {
    return simpleSimilaritySearch(query, chunks, topK);
  }
}
