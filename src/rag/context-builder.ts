import type { ScoredChunk } from "./types.js";

const PREVIEW_LENGTH = 200;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Numbered, citation-labelled excerpts for the prompt. Texts are shortened for
 * display only; the chunks themselves are left untouched.
 */
export function formatContextForPrompt(chunks: readonly ScoredChunk[]): string {
  if (chunks.length === 0) return "";

  const contextParts = ["## PDF Context Retrieved:"];
  chunks.forEach((chunk, i) => {
    contextParts.push(`\n[${i + 1}] ${chunk.documentName}, Page ${chunk.page}`);
    contextParts.push(preview(chunk.text));
  });
  return contextParts.join("\n");
}

export function buildRagPrompt(query: string, chunks: readonly ScoredChunk[]): string {
  const context = formatContextForPrompt(chunks);

  const framing = [
    "You are an AI assistant that answers questions based on provided PDF content.",
    "Use the retrieved PDF context below to answer the user's question.",
    "Always cite the source (PDF name, page number) when referencing the documents.",
    "If the answer is not in the provided context, say so clearly.",
  ].join("\n");

  const sections = [framing];
  if (context) sections.push(context);
  sections.push("---", `User Question: ${query}`, "Please provide a detailed answer with specific citations.");
  return sections.join("\n\n");
}

export function formatCitations(chunks: readonly ScoredChunk[]): string[] {
  return chunks.map(
    (chunk, i) =>
      `[${i + 1}] ${chunk.documentName}, Page ${chunk.page} (score: ${chunk.score.toFixed(3)})`,
  );
}

/** `a.pdf p.1, p.3 | b.pdf p.2`, sources in first-seen order, pages ascending. */
export function formatSourcesForUI(chunks: readonly ScoredChunk[]): string {
  const sourceMap = new Map<string, { name: string; pages: Set<number> }>();
  for (const chunk of chunks) {
    const entry = sourceMap.get(chunk.documentId) ?? {
      name: chunk.documentName,
      pages: new Set<number>(),
    };
    entry.pages.add(chunk.page);
    sourceMap.set(chunk.documentId, entry);
  }

  return [...sourceMap.values()]
    .map(({ name, pages }) => {
      const pageRefs = [...pages]
        .sort((a, b) => a - b)
        .map((p) => `p.${p}`)
        .join(", ");
      return `${name} ${pageRefs}`;
    })
    .join(" | ");
}
