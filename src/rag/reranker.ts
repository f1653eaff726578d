import { z } from "zod";
import type { RagConfig } from "./config.js";
import { ModelError, errorMessage } from "./errors.js";
import type { Chunk, ScoredChunk } from "./types.js";

export type QueryPair = [query: string, text: string];

export interface CrossEncoder {
  /** One relevance score per pair, in pair order. */
  predict(pairs: QueryPair[]): Promise<number[]>;
}

const rerankResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number(),
  }),
);

export type HttpCrossEncoderOptions = Pick<RagConfig, "rerankUrl" | "rerankerModel"> & {
  apiKey?: string;
};

/**
 * Client for a text-embeddings-inference style `/rerank` endpoint hosting a
 * cross-encoder. Pairs are grouped by query so each distinct query costs one
 * request; raw logits are requested so scores match the model's output.
 */
export class HttpCrossEncoder implements CrossEncoder {
  constructor(private readonly options: HttpCrossEncoderOptions) {}

  async predict(pairs: QueryPair[]): Promise<number[]> {
    const scores = new Array<number | undefined>(pairs.length).fill(undefined);

    const byQuery = new Map<string, number[]>();
    pairs.forEach(([query], i) => {
      const positions = byQuery.get(query) ?? [];
      positions.push(i);
      byQuery.set(query, positions);
    });

    for (const [query, positions] of byQuery) {
      const texts = positions.map((i) => pairs[i]?.[1] ?? "");
      const results = await this.rerankRequest(query, texts);
      if (results.length !== texts.length) {
        throw new ModelError(
          "reranker",
          `Expected ${texts.length} rerank scores, received ${results.length}`,
        );
      }
      for (const { index, score } of results) {
        const position = positions[index];
        if (position === undefined) {
          throw new ModelError("reranker", `Rerank result index ${index} out of range`);
        }
        scores[position] = score;
      }
    }

    return scores.map((score, i) => {
      if (score === undefined) {
        throw new ModelError("reranker", `Rerank response has no score for pair ${i}`);
      }
      return score;
    });
  }

  private async rerankRequest(
    query: string,
    texts: string[],
  ): Promise<Array<{ index: number; score: number }>> {
    const { rerankUrl, rerankerModel, apiKey } = this.options;

    let res: Response;
    try {
      res = await fetch(rerankUrl, {
        method: "POST",
        headers: {
          ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: rerankerModel, query, texts, raw_scores: true }),
      });
    } catch (err) {
      throw new ModelError("reranker", `Rerank request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ModelError("reranker", `Rerank API error (${res.status}): ${text}`);
    }

    const parsed = rerankResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ModelError("reranker", "Malformed rerank response", { cause: parsed.error });
    }
    return parsed.data;
  }
}

export class Reranker {
  constructor(private readonly model: CrossEncoder) {}

  /**
   * Scores every chunk against the query and returns the best `topK`, highest
   * first. Any score already on the input is replaced. Equal scores keep their
   * input order.
   */
  async rerank(query: string, chunks: Chunk[], topK: number): Promise<ScoredChunk[]> {
    if (chunks.length === 0 || topK <= 0) return [];

    const scores = await this.model.predict(chunks.map((c): QueryPair => [query, c.text]));
    if (scores.length !== chunks.length) {
      throw new ModelError(
        "reranker",
        `Expected ${chunks.length} rerank scores, received ${scores.length}`,
      );
    }

    const ranked: ScoredChunk[] = chunks.map((chunk, i) => ({
      ...chunk,
      score: scores[i] ?? 0,
    }));

    ranked.sort((a, b) => b.score - a.score);
    return ranked.slice(0, topK);
  }
}
