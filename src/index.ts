#!/usr/bin/env node
import "dotenv/config";
import blessed from "blessed";
import { ChatClient, buildChatMessages } from "./rag/chat-client.js";
import { loadRagConfigFromEnv, type RagConfig } from "./rag/config.js";
import { formatCitations } from "./rag/context-builder.js";
import { HttpEmbeddingModel } from "./rag/embedding-service.js";
import { errorMessage } from "./rag/errors.js";
import { scanPdfFiles } from "./rag/file-scanner.js";
import { describeDocument } from "./rag/fingerprint.js";
import { createRagPipeline, type StrategyName } from "./rag/pipeline.js";
import { HttpCrossEncoder } from "./rag/reranker.js";

// ── Config ──────────────────────────────────────────────────────────────────
function loadConfig(): RagConfig {
  try {
    return loadRagConfigFromEnv();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}

const config = loadConfig();

const apiKey = process.env["OPENROUTER_API_KEY"];
const chatClient = apiKey ? new ChatClient(config.chatUrl, apiKey) : null;

// ── State ───────────────────────────────────────────────────────────────────
let busy = false;
let documentFilter: string | null = null;
let strategy: StrategyName = "semantic";
let ready = false;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "pdf-rag-chat",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: ` pdf-rag-chat — ${config.chatModel} `,
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " ask > ",
  inputOnFocus: false,
  mouse: true,
});

screen.key(["C-c"], () => process.exit(0));
inputBox.key(["C-c"], () => process.exit(0));

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!busy) setTimeout(() => promptInput(), 0);
});

function log(msg: string): void {
  chatBox.log(msg);
  screen.render();
}

function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));
}

function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

log("Ask a question about your PDFs. Commands: /docs, /doc <id>, /doc, /keyword. Ctrl+C to quit.");
if (!chatClient) {
  log("{yellow-fg}OPENROUTER_API_KEY is not set: retrieval works, answers are disabled.{/}");
}
log("");

// ── Pipeline ────────────────────────────────────────────────────────────────
const pipeline = createRagPipeline({
  config,
  embeddingModel: new HttpEmbeddingModel({
    ...config,
    apiKey: process.env["EMBEDDING_API_KEY"],
  }),
  crossEncoder: new HttpCrossEncoder({
    ...config,
    apiKey: process.env["RERANK_API_KEY"],
  }),
  log: (msg) => log(`{grey-fg}${escapeTags(msg)}{/}`),
});

// ── Chat Logic ──────────────────────────────────────────────────────────────
async function answer(question: string): Promise<void> {
  log(`{grey-fg}  retrieving (${strategy})...{/}`);
  const result = await pipeline.query(question, {
    documentId: documentFilter ?? undefined,
    strategy,
  });

  if (result.retrieved.length === 0) {
    log("{yellow-fg}  no relevant passages found, answering from general knowledge{/}");
  } else {
    log(`{grey-fg}  \u{2713} \u{1F4C4} ${escapeTags(result.sourcesLine ?? "")}{/}`);
  }

  if (!chatClient) {
    log("{yellow-fg}  no chat API key, showing the prompt instead:{/}");
    for (const line of result.prompt.split("\n")) log(`  ${escapeTags(line)}`);
  } else {
    let reply = "";
    let lineCount = 0;
    const messages = buildChatMessages(result.prompt);
    for await (const fragment of chatClient.complete({
      model: config.chatModel,
      messages,
      maxTokens: config.maxTokens,
      stream: config.streamEnabled,
    })) {
      reply += fragment;
      for (let i = 0; i < lineCount; i++) {
        chatBox.deleteLine(chatBox.getLines().length - 1);
      }
      const lines = reply.split("\n");
      for (const line of lines) chatBox.log(`  ${escapeTags(line)}`);
      lineCount = lines.length;
      screen.render();
    }
  }

  if (result.retrieved.length > 0) {
    log("{grey-fg}  sources:{/}");
    for (const citation of formatCitations(result.retrieved)) {
      log(`{grey-fg}    ${escapeTags(citation)}{/}`);
    }
  }
}

function runCommand(text: string): void {
  const [command, arg] = text.split(/\s+/, 2);
  switch (command) {
    case "/docs":
      if (pipeline.documents.length === 0) log("  no documents loaded");
      for (const document of pipeline.documents) log(`  ${escapeTags(describeDocument(document))}`);
      break;
    case "/doc":
      if (!arg) {
        documentFilter = null;
        log("  searching all documents");
      } else if (pipeline.documents.some((d) => d.id === arg)) {
        documentFilter = arg;
        log(`  searching only ${arg}`);
      } else {
        log(`{red-fg}  unknown document id: ${escapeTags(arg)}{/}`);
      }
      break;
    case "/keyword":
      strategy = strategy === "keyword" ? "semantic" : "keyword";
      log(`  retrieval strategy: ${strategy}`);
      break;
    default:
      log(`{red-fg}  unknown command: ${escapeTags(command ?? text)}{/}`);
  }
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (!text || busy) {
    promptInput();
    return;
  }

  chatBox.log(`{green-fg}ask >{/} ${escapeTags(text)}`);
  if (text.startsWith("/")) {
    runCommand(text);
    promptInput();
    return;
  }
  if (!ready) {
    log("{yellow-fg}  documents are still loading{/}");
    promptInput();
    return;
  }

  busy = true;
  inputBox.style.border.fg = "grey";
  (inputBox as blessed.Widgets.BoxElement).setLabel(" ... ");
  screen.render();

  answer(text)
    .catch((err: unknown) => {
      chatBox.log(`{red-fg}error:{/} ${escapeTags(errorMessage(err))}`);
    })
    .finally(() => {
      busy = false;
      chatBox.log("");
      inputBox.style.border.fg = "green";
      (inputBox as blessed.Widgets.BoxElement).setLabel(" ask > ");
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// ── Document Loading (non-blocking) ─────────────────────────────────────────
const argPaths = process.argv.slice(2);
(argPaths.length > 0 ? Promise.resolve(argPaths) : scanPdfFiles(config.dataDir))
  .then((paths) => {
    if (paths.length === 0) {
      log(`{yellow-fg}No PDFs found in ${escapeTags(config.dataDir)}; answers will use general knowledge.{/}`);
      return;
    }
    return pipeline.loadDocuments(paths).then(() => undefined);
  })
  .catch((err: unknown) => {
    log(`{yellow-fg}Loading PDFs failed (chat still works): ${escapeTags(errorMessage(err))}{/}`);
  })
  .finally(() => {
    ready = true;
    log("");
  });

screen.render();
promptInput();
