import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const EMBEDDING_DIM = 384;

const positiveInt = z.number().int().positive();

const ragConfigSchema = z
  .object({
    dataDir: z.string().min(1),
    cacheDir: z.string().min(1),

    embeddingModel: z.string().min(1),
    embeddingDimensions: positiveInt,
    embeddingUrl: z.string().url(),
    embeddingBatchSize: positiveInt,
    embeddingConcurrency: positiveInt,

    rerankerModel: z.string().min(1),
    rerankUrl: z.string().url(),

    chunkSize: positiveInt,
    chunkOverlap: positiveInt,

    // Stage 1 keeps retrievalTopK candidates, the reranker returns finalTopK.
    retrievalTopK: positiveInt,
    finalTopK: positiveInt,

    chatUrl: z.string().url(),
    chatModel: z.string().min(1),
    maxTokens: positiveInt,
    streamEnabled: z.boolean(),
  })
  .refine((c) => c.chunkOverlap < c.chunkSize, {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  })
  .refine((c) => c.finalTopK <= c.retrievalTopK, {
    message: "finalTopK must not exceed retrievalTopK",
    path: ["finalTopK"],
  });

export type RagConfig = Readonly<z.infer<typeof ragConfigSchema>>;

export const DEFAULT_RAG_CONFIG: RagConfig = {
  dataDir: path.resolve("data"),
  cacheDir: path.resolve(".embeddings_cache"),

  embeddingModel: "sentence-transformers/all-MiniLM-L6-v2",
  embeddingDimensions: EMBEDDING_DIM,
  embeddingUrl: "http://127.0.0.1:8080/v1/embeddings",
  embeddingBatchSize: 32,
  embeddingConcurrency: 4,

  rerankerModel: "cross-encoder/ms-marco-MiniLM-L-12-v2",
  rerankUrl: "http://127.0.0.1:8081/rerank",

  chunkSize: 500,
  chunkOverlap: 50,

  retrievalTopK: 5,
  finalTopK: 3,

  chatUrl: "https://openrouter.ai/api/v1/chat/completions",
  chatModel: "openai/gpt-4o-mini",
  maxTokens: 2048,
  streamEnabled: true,
};

/** Overrides as read from outside, before the schema has checked their types. */
type RawRagConfig = { [K in keyof RagConfig]?: unknown };

export function createRagConfig(overrides: Partial<RagConfig> = {}): RagConfig {
  return parseRagConfig(overrides);
}

function parseRagConfig(overrides: RawRagConfig): RagConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_RAG_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = ragConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid RAG config: ${issues}`);
  }
  return result.data;
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

const TRUE_WORDS = ["1", "true", "yes", "on"];
const FALSE_WORDS = ["0", "false", "no", "off"];

/** Unknown words are passed through so the schema rejects them. */
function readBool(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;
  return value;
}

function readPath(value: string | undefined): string | undefined {
  return value ? path.resolve(value) : undefined;
}

/**
 * Maps environment variables onto config overrides. Unset variables keep their
 * defaults; malformed numbers and flags surface as a ConfigError.
 */
export function loadRagConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): RagConfig {
  return parseRagConfig({
    dataDir: readPath(env["RAG_DATA_DIR"]),
    cacheDir: readPath(env["RAG_CACHE_DIR"]),
    embeddingUrl: env["EMBEDDING_URL"],
    embeddingModel: env["EMBEDDING_MODEL"],
    rerankUrl: env["RERANK_URL"],
    rerankerModel: env["RERANKER_MODEL"],
    chatUrl: env["CHAT_API_URL"],
    chatModel: env["CHAT_MODEL"],
    chunkSize: readInt(env["CHUNK_SIZE"]),
    chunkOverlap: readInt(env["CHUNK_OVERLAP"]),
    retrievalTopK: readInt(env["RETRIEVAL_TOP_K"]),
    finalTopK: readInt(env["FINAL_TOP_K"]),
    maxTokens: readInt(env["MAX_TOKENS"]),
    streamEnabled: readBool(env["STREAM_ENABLED"]),
  });
}
