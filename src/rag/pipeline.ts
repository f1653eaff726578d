import path from "node:path";
import {
  chunkPdf,
  getChunkingStrategy,
  DEFAULT_CHUNKING_STRATEGY,
  type ChunkedDocument,
} from "./chunking/index.js";
import type { RagConfig } from "./config.js";
import { buildRagPrompt, formatSourcesForUI } from "./context-builder.js";
import { EmbeddingCache } from "./embedding-cache.js";
import { SourceError } from "./errors.js";
import type { EmbeddingModel } from "./embedding-service.js";
import { describeDocument, getDocumentId } from "./fingerprint.js";
import type { PageExtractor } from "./pdf-extractor.js";
import { Reranker, type CrossEncoder } from "./reranker.js";
import {
  KeywordRetriever,
  SemanticRerankRetriever,
  filterByDocument,
  type RetrievalStrategy,
} from "./retriever.js";
import { noopLogger, type Chunk, type DocumentInfo, type Logger, type ScoredChunk } from "./types.js";

export type StrategyName = "semantic" | "keyword";

export interface QueryOptions {
  /** Restrict retrieval to one document's chunks. */
  documentId?: string;
  strategy?: StrategyName;
}

export interface QueryResult {
  retrieved: ScoredChunk[];
  prompt: string;
  sourcesLine: string | null;
}

export interface RagPipeline {
  query(question: string, options?: QueryOptions): Promise<QueryResult>;
  loadDocuments(filePaths: string[]): Promise<DocumentInfo[]>;
  readonly documents: readonly DocumentInfo[];
  readonly chunks: readonly Chunk[];
}

export interface RagPipelineDeps {
  config: RagConfig;
  embeddingModel: EmbeddingModel;
  crossEncoder: CrossEncoder;
  extract?: PageExtractor;
  log?: Logger;
}

/**
 * Document loading and retrieval. Generation is left to the caller. A file that
 * cannot be read or parsed is logged and skipped; the rest still load.
 */
export function createRagPipeline({
  config,
  embeddingModel,
  crossEncoder,
  extract,
  log = noopLogger,
}: RagPipelineDeps): RagPipeline {
  const embeddingCache = new EmbeddingCache(embeddingModel, {
    cacheDir: config.cacheDir,
    embeddingDimensions: config.embeddingDimensions,
    log,
  });
  const strategies: Record<StrategyName, RetrievalStrategy> = {
    semantic: new SemanticRerankRetriever(
      embeddingCache,
      new Reranker(crossEncoder),
      config.retrievalTopK,
    ),
    keyword: new KeywordRetriever(),
  };
  const chunkingStrategy = getChunkingStrategy(DEFAULT_CHUNKING_STRATEGY);

  const documents: DocumentInfo[] = [];
  const chunks: Chunk[] = [];

  return {
    documents,
    chunks,

    async loadDocuments(filePaths: string[]) {
      log(`RAG: loading ${filePaths.length} PDF(s)...`);
      const options = { chunkSize: config.chunkSize, overlap: config.chunkOverlap };

      const added: DocumentInfo[] = [];
      const newChunks: Chunk[] = [];
      for (const filePath of filePaths) {
        let loaded: ChunkedDocument;
        try {
          const id = await getDocumentId(filePath);
          if (documents.some((d) => d.id === id)) {
            log(`RAG: ${path.basename(filePath)} already loaded, skipping`);
            continue;
          }
          loaded = await chunkPdf(filePath, options, { extract, strategy: chunkingStrategy });
        } catch (err) {
          if (!(err instanceof SourceError)) throw err;
          log(`RAG: failed to load ${path.basename(filePath)}: ${err.message}`);
          continue;
        }

        const { document, chunks: docChunks } = loaded;
        if (docChunks.length === 0) {
          log(`RAG: ${document.name} produced no chunks, skipping`);
          continue;
        }

        documents.push(document);
        chunks.push(...docChunks);
        added.push(document);
        newChunks.push(...docChunks);
        log(`RAG: ${describeDocument(document)}, ${docChunks.length} chunks`);
      }

      if (newChunks.length > 0) {
        await embeddingCache.getEmbeddings(newChunks);
      }

      log(`RAG ready: ${documents.length} document(s), ${chunks.length} chunks`);
      return added;
    },

    async query(question: string, options: QueryOptions = {}) {
      const strategy = strategies[options.strategy ?? "semantic"];
      const candidates = options.documentId
        ? filterByDocument(chunks, options.documentId)
        : chunks;

      const retrieved = await strategy.retrieve(question, candidates, config.finalTopK);
      return {
        retrieved,
        prompt: buildRagPrompt(question, retrieved),
        sourcesLine: retrieved.length > 0 ? formatSourcesForUI(retrieved) : null,
      };
    },
  };
}
