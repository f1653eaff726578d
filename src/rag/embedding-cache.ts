import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { EmbeddingModel } from "./embedding-service.js";
import { ModelError, errorMessage } from "./errors.js";
import { noopLogger, type CacheStore, type Chunk, type EmbeddingVector, type Logger } from "./types.js";

const cacheStoreSchema = z.record(z.string(), z.array(z.number()));

export function chunkKey(chunk: Pick<Chunk, "documentId" | "chunkIndex">): string {
  return `${chunk.documentId}_${chunk.chunkIndex}`;
}

export interface EmbeddingCacheOptions {
  cacheDir: string;
  embeddingDimensions: number;
  log?: Logger;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read-through cache of chunk embeddings. Each document owns one JSON store on
 * disk; stores are loaded into memory on first use and rewritten whenever new
 * vectors are computed for that document.
 */
export class EmbeddingCache {
  private readonly stores = new Map<string, Map<string, EmbeddingVector>>();
  private readonly log: Logger;

  constructor(
    private readonly model: EmbeddingModel,
    private readonly options: EmbeddingCacheOptions,
  ) {
    this.log = options.log ?? noopLogger;
  }

  cachePath(documentId: string): string {
    return path.join(this.options.cacheDir, `${documentId}_embeddings.json`);
  }

  async getEmbeddings(chunks: Chunk[]): Promise<Map<string, EmbeddingVector>> {
    const embeddings = new Map<string, EmbeddingVector>();

    const documentIds = new Set(chunks.map((c) => c.documentId));
    for (const documentId of documentIds) {
      await this.storeFor(documentId);
    }

    const pending: Chunk[] = [];
    const pendingKeys = new Set<string>();
    for (const chunk of chunks) {
      const key = chunkKey(chunk);
      const cached = this.stores.get(chunk.documentId)?.get(key);
      if (cached) {
        embeddings.set(key, cached);
      } else if (!pendingKeys.has(key)) {
        pendingKeys.add(key);
        pending.push(chunk);
      }
    }

    if (pending.length === 0) return embeddings;

    this.log(`RAG: computing embeddings for ${pending.length} chunks...`);
    const vectors = await this.model.encode(pending.map((c) => c.text));
    if (vectors.length !== pending.length) {
      throw new ModelError(
        "embedding",
        `Expected ${pending.length} embeddings, received ${vectors.length}`,
      );
    }

    // validate the whole batch before any store changes
    const checked = vectors.map((v) => this.checkDimensions(v));

    const touched = new Set<string>();
    for (let i = 0; i < pending.length; i++) {
      const chunk = pending[i];
      const vector = checked[i];
      if (!chunk || !vector) continue;

      const key = chunkKey(chunk);
      embeddings.set(key, vector);
      (await this.storeFor(chunk.documentId)).set(key, vector);
      touched.add(chunk.documentId);
    }

    for (const documentId of touched) {
      await this.saveStore(documentId);
    }

    return embeddings;
  }

  /** Uncached; always calls the model. */
  async embedText(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.model.encode([text]);
    return this.checkDimensions(vector);
  }

  /** Reads a document's store from disk. Missing or unreadable stores are empty. */
  async loadStore(documentId: string): Promise<Map<string, EmbeddingVector>> {
    const store = new Map<string, EmbeddingVector>();
    const filePath = this.cachePath(documentId);

    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        this.log(`RAG: failed to read embeddings cache ${filePath}: ${errorMessage(err)}`);
      }
      return store;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.log(`RAG: failed to load embeddings cache ${filePath}: ${errorMessage(err)}`);
      return store;
    }

    const parsed = cacheStoreSchema.safeParse(json);
    if (!parsed.success) {
      this.log(`RAG: ignoring malformed embeddings cache ${filePath}`);
      return store;
    }

    let skipped = 0;
    for (const [key, vector] of Object.entries(parsed.data)) {
      if (vector.length === this.options.embeddingDimensions) {
        store.set(key, vector);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      this.log(`RAG: ${skipped} cached embedding(s) in ${filePath} have the wrong size, recomputing`);
    }
    return store;
  }

  private async storeFor(documentId: string): Promise<Map<string, EmbeddingVector>> {
    let store = this.stores.get(documentId);
    if (!store) {
      store = await this.loadStore(documentId);
      this.stores.set(documentId, store);
    }
    return store;
  }

  /** Best effort: a failed write only costs a recompute on the next run. */
  private async saveStore(documentId: string): Promise<void> {
    const store = this.stores.get(documentId);
    if (!store) return;

    const filePath = this.cachePath(documentId);
    const data: CacheStore = Object.fromEntries(store);
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, JSON.stringify(data));
      this.log(`RAG: cached ${store.size} embeddings for document ${documentId}`);
    } catch (err) {
      this.log(`RAG: failed to save embeddings cache ${filePath}: ${errorMessage(err)}`);
    }
  }

  private checkDimensions(vector: EmbeddingVector | undefined): EmbeddingVector {
    const expected = this.options.embeddingDimensions;
    if (!vector || vector.length !== expected) {
      throw new ModelError(
        "embedding",
        `Expected ${expected}-dimensional embedding, received ${vector?.length ?? "none"}`,
      );
    }
    return vector;
  }
}
