import { afterEach, describe, expect, it, vi } from "vitest";
import { ChatClient, SYSTEM_PROMPT, buildChatMessages } from "../../src/rag/chat-client.js";
import { ModelError } from "../../src/rag/errors.js";

function sseResponse(frames: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) controller.enqueue(encoder.encode(frame));
      controller.close();
    },
  });
  return new Response(body, { headers: { "Content-Type": "text/event-stream" } });
}

function delta(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n`;
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const fragment of stream) out.push(fragment);
  return out;
}

const request = {
  model: "test-model",
  messages: buildChatMessages("prompt text"),
  maxTokens: 256,
};

describe("ChatClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("wraps the prompt with the system message", () => {
    expect(buildChatMessages("hi")).toEqual([
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: "hi" },
    ]);
  });

  it("yields streamed fragments, including ones split across reads", async () => {
    const split = delta("world");
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      sseResponse([
        ": keep-alive\n",
        delta("Hello "),
        split.slice(0, 12),
        split.slice(12),
        "data: [DONE]\n",
      ]),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new ChatClient("https://chat.test/v1/chat/completions", "test-key");
    const fragments = await collect(client.complete({ ...request, stream: true }));

    expect(fragments).toEqual(["Hello ", "world"]);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: buildChatMessages("prompt text"),
      max_tokens: 256,
      stream: true,
    });
  });

  it("yields the whole reply once without streaming", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => Response.json({ choices: [{ message: { content: "Full answer." } }] })),
    );

    const client = new ChatClient("https://chat.test/v1/chat/completions", "test-key");
    expect(await collect(client.complete({ ...request, stream: false }))).toEqual(["Full answer."]);
  });

  it("surfaces API errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("bad key", { status: 401 })));

    const client = new ChatClient("https://chat.test/v1/chat/completions", "test-key");
    const error = await collect(client.complete({ ...request, stream: true })).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelError);
    expect(error).toHaveProperty("message", "API error (401): bad key");
  });
});
