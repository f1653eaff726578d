import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EMBEDDING_DIM } from "../../src/rag/config.js";
import { EmbeddingCache } from "../../src/rag/embedding-cache.js";
import { Reranker } from "../../src/rag/reranker.js";
import {
  KeywordRetriever,
  SemanticRerankRetriever,
  filterByDocument,
  retrieveWithReranking,
  semanticSearch,
  simpleSimilaritySearch,
} from "../../src/rag/retriever.js";
import { cosineSimilarity, jaccardSimilarity } from "../../src/rag/similarity.js";
import {
  fakeCrossEncoder,
  fakeEmbeddingModel,
  hashEmbed,
  makeChunk,
  makeTempDir,
  removeTempDir,
} from "./helpers.js";

const corpus = [
  makeChunk({ chunkIndex: 0, text: "copper wire carries signal" }),
  makeChunk({ chunkIndex: 1, text: "fiber optic cable" }),
  makeChunk({ chunkIndex: 2, text: "Electronic signal processing" }),
  makeChunk({ chunkIndex: 3, text: "signal" }),
  makeChunk({ chunkIndex: 4, text: "" }),
  makeChunk({ documentId: "doc00002", documentName: "other.pdf", chunkIndex: 0, text: "electronic mail" }),
  makeChunk({ documentId: "doc00002", documentName: "other.pdf", chunkIndex: 1, text: "signal to noise ratio" }),
  makeChunk({ documentId: "doc00002", documentName: "other.pdf", chunkIndex: 2, text: "analog electronic signal" }),
];

describe("cosineSimilarity", () => {
  it("is 1 for a vector with itself", () => {
    const v = hashEmbed("electronic signal processing");
    expect(cosineSimilarity(v, v)).toBeCloseTo(1, 6);
    expect(cosineSimilarity([3, 4], [3, 4])).toBeCloseTo(1, 6);
  });

  it("handles orthogonal, opposite and zero vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 6);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different lengths", () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(RangeError);
  });
});

describe("jaccardSimilarity", () => {
  it("divides shared words by all words, ignoring case", () => {
    expect(jaccardSimilarity("electronic signal", "Electronic signal processing")).toBeCloseTo(2 / 3);
    expect(jaccardSimilarity("electronic signal", "")).toBe(0);
  });
});

describe("semanticSearch", () => {
  const chunks = [
    makeChunk({ chunkIndex: 0, text: "a" }),
    makeChunk({ chunkIndex: 1, text: "b" }),
    makeChunk({ chunkIndex: 2, text: "c" }),
    makeChunk({ chunkIndex: 3, text: "no vector" }),
  ];
  const embeddings = new Map([
    ["doc00001_0", [1, 0, 0]],
    ["doc00001_1", [0, 1, 0]],
    ["doc00001_2", [1, 1, 0]],
  ]);

  it("ranks by cosine similarity, skips chunks without vectors and truncates", () => {
    const results = semanticSearch(chunks, embeddings, [1, 0, 0], 2);
    expect(results.map((c) => c.text)).toEqual(["a", "c"]);
    expect(results[0]?.score).toBeCloseTo(1, 6);
    expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it("returns nothing when no chunk has a vector", () => {
    expect(semanticSearch(chunks, new Map(), [1, 0, 0], 5)).toEqual([]);
  });
});

describe("retrieveWithReranking", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function setup() {
    const embedding = fakeEmbeddingModel();
    const crossEncoder = fakeCrossEncoder();
    const cache = new EmbeddingCache(embedding.model, {
      cacheDir: dir,
      embeddingDimensions: EMBEDDING_DIM,
    });
    return { embedding, crossEncoder, cache, reranker: new Reranker(crossEncoder.model) };
  }

  it("reranks the stage-one candidates down to topK, best first", async () => {
    const { crossEncoder, cache, reranker } = setup();

    const results = await retrieveWithReranking("electronic signal", corpus, cache, reranker, 3, 5);

    expect(crossEncoder.predict).toHaveBeenCalledTimes(1);
    expect(crossEncoder.predict.mock.calls[0]?.[0]).toHaveLength(5);
    expect(results).toHaveLength(3);
    for (let i = 1; i < results.length; i++) {
      expect(results[i - 1]?.score ?? 0).toBeGreaterThanOrEqual(results[i]?.score ?? 0);
    }
    expect(results[0]?.score).toBe(2);
    expect(results.every((c) => c.documentName && c.page === 1)).toBe(true);
  });

  it("never returns more than topK", async () => {
    const { cache, reranker } = setup();
    for (const topK of [1, 2, 5]) {
      const results = await retrieveWithReranking("signal", corpus, cache, reranker, topK, 5);
      expect(results.length).toBeLessThanOrEqual(topK);
    }
  });

  it("returns nothing for no chunks without calling either model", async () => {
    const { embedding, crossEncoder, cache, reranker } = setup();

    expect(await retrieveWithReranking("anything", [], cache, reranker, 3, 5)).toEqual([]);
    expect(embedding.encode).not.toHaveBeenCalled();
    expect(crossEncoder.predict).not.toHaveBeenCalled();
  });

  it("is reachable through the semantic strategy", async () => {
    const { cache, reranker } = setup();
    const strategy = new SemanticRerankRetriever(cache, reranker, 5);

    const results = await strategy.retrieve("electronic signal", corpus, 2);

    expect(strategy.name).toBe("semantic");
    expect(results).toHaveLength(2);
  });
});

describe("simpleSimilaritySearch", () => {
  it("ranks by keyword overlap and keeps at most topK", () => {
    const results = simpleSimilaritySearch("electronic signal", corpus.slice(0, 5), 3);

    expect(results.map((c) => c.text)).toEqual([
      "Electronic signal processing",
      "signal",
      "copper wire carries signal",
    ]);
    expect(results.map((c) => c.score)).toEqual([2 / 3, 0.5, 0.2]);
    for (const result of results) {
      expect(result.score).toBeGreaterThanOrEqual(0);
      expect(result.score).toBeLessThanOrEqual(1);
    }
  });

  it("keeps input order among equal scores", () => {
    const results = simpleSimilaritySearch("zzz", corpus, 2);
    expect(results.map((c) => c.text)).toEqual(["copper wire carries signal", "fiber optic cable"]);
  });

  it("backs the keyword strategy", async () => {
    const strategy = new KeywordRetriever();
    expect(await strategy.retrieve("electronic signal", corpus, 2)).toEqual(
      simpleSimilaritySearch("electronic signal", corpus, 2),
    );
  });
});

describe("filterByDocument", () => {
  it("keeps only exact document id matches", () => {
    expect(filterByDocument(corpus, "doc00002").map((c) => c.chunkIndex)).toEqual([0, 1, 2]);
    expect(filterByDocument(corpus, "doc0000")).toEqual([]);
  });
});
