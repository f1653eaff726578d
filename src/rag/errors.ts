export class RagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid settings passed to a component or factory. */
export class ConfigError extends RagError {}

/** The source PDF could not be opened, read, or parsed. */
export class SourceError extends RagError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** An embedding, reranking, or chat backend call failed or returned junk. */
export class ModelError extends RagError {
  constructor(
    readonly backend: "embedding" | "reranker" | "chat",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
