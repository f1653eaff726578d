import { z } from "zod";
import type { RagConfig } from "./config.js";
import { ModelError, errorMessage } from "./errors.js";
import type { EmbeddingVector } from "./types.js";

export interface EmbeddingModel {
  /** One vector per input text, in input order. */
  encode(texts: string[]): Promise<EmbeddingVector[]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().optional(),
      embedding: z.array(z.number()),
    }),
  ),
});

export type HttpEmbeddingOptions = Pick<
  RagConfig,
  | "embeddingUrl"
  | "embeddingModel"
  | "embeddingDimensions"
  | "embeddingBatchSize"
  | "embeddingConcurrency"
> & {
  apiKey?: string;
  onProgress?: (done: number, total: number) => void;
};

/**
 * Client for an OpenAI-compatible `/embeddings` endpoint, such as a
 * text-embeddings-inference server hosting a sentence-transformers model.
 */
export class HttpEmbeddingModel implements EmbeddingModel {
  constructor(private readonly options: HttpEmbeddingOptions) {}

  async encode(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    const { embeddingBatchSize, embeddingConcurrency, onProgress } = this.options;

    // Split into batches
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += embeddingBatchSize) {
      batches.push({
        texts: texts.slice(i, i + embeddingBatchSize),
        startIdx: i,
      });
    }

    const results: EmbeddingVector[] = new Array(texts.length);
    let completed = 0;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(embeddingConcurrency, queue.length) },
      async () => {
        while (queue.length > 0) {
          const batch = queue.shift();
          if (!batch) break;
          const embeddings = await this.embedBatch(batch.texts);
          embeddings.forEach((embedding, j) => {
            results[batch.startIdx + j] = embedding;
          });
          completed += batch.texts.length;
          onProgress?.(Math.min(completed, texts.length), texts.length);
        }
      },
    );

    await Promise.all(workers);
    return results;
  }

  private async embedBatch(batch: string[]): Promise<EmbeddingVector[]> {
    const { embeddingUrl, embeddingModel, embeddingDimensions, apiKey } = this.options;

    let res: Response;
    try {
      res = await fetch(embeddingUrl, {
        method: "POST",
        headers: {
          ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: embeddingModel, input: batch }),
      });
    } catch (err) {
      throw new ModelError("embedding", `Embedding request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ModelError("embedding", `Embedding API error (${res.status}): ${text}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ModelError("embedding", "Malformed embedding response", {
        cause: parsed.error,
      });
    }

    const data = parsed.data.data;
    if (data.length !== batch.length) {
      throw new ModelError(
        "embedding",
        `Expected ${batch.length} embeddings, received ${data.length}`,
      );
    }

    const ordered = data.every((item) => item.index !== undefined)
      ? [...data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      : data;

    return ordered.map(({ embedding }) => {
      if (embedding.length !== embeddingDimensions) {
        throw new ModelError(
          "embedding",
          `Expected ${embeddingDimensions}-dimensional embedding, received ${embedding.length}`,
        );
      }
      return embedding;
    });
  }
}
