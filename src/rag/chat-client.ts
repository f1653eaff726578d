import { z } from "zod";
import { ModelError, errorMessage } from "./errors.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  stream: boolean;
}

export const SYSTEM_PROMPT =
  "You are a helpful AI assistant that answers questions about PDF documents with accurate citations.";

const streamChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({ content: z.string().nullish() }).optional(),
    }),
  ),
});

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }) }))
    .min(1),
});

export function buildChatMessages(prompt: string): ChatMessage[] {
  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: prompt },
  ];
}

/** OpenAI-compatible chat completions client (OpenRouter and friends). */
export class ChatClient {
  constructor(
    private readonly apiUrl: string,
    private readonly apiKey: string,
  ) {}

  /**
   * Yields text fragments as they arrive when `stream` is set, otherwise the
   * whole reply once.
   */
  async *complete(request: ChatRequest): AsyncGenerator<string> {
    const res = await this.post(request);

    if (!request.stream) {
      const parsed = completionSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new ModelError("chat", "Malformed chat completion response", {
          cause: parsed.error,
        });
      }
      const content = parsed.data.choices[0]?.message.content;
      if (content) yield content;
      return;
    }

    const body = res.body;
    if (!body) throw new ModelError("chat", "No response body");

    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const content = parseStreamLine(line);
        if (content) yield content;
      }
    }

    const tail = parseStreamLine(buffer + decoder.decode());
    if (tail) yield tail;
  }

  private async post(request: ChatRequest): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(this.apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          max_tokens: request.maxTokens,
          stream: request.stream,
        }),
      });
    } catch (err) {
      throw new ModelError("chat", `Chat request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text();
      throw new ModelError("chat", `API error (${res.status}): ${text}`);
    }
    return res;
  }
}

function parseStreamLine(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("data: ")) return null;
  const payload = trimmed.slice(6);
  if (payload === "[DONE]") return null;

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    // keep-alive or partial frame
    return null;
  }
  const parsed = streamChunkSchema.safeParse(json);
  if (!parsed.success) return null;
  return parsed.data.choices[0]?.delta?.content ?? null;
}
