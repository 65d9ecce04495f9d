import crypto from "node:crypto";

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { ChatSession } from "./chat-session.js";
import { GeminiWebuiClient } from "./gemini-webui-client.js";
import type { ModelOutput } from "./types.js";

const lineageInputSchema = {
  conversation_id: z.string().optional().describe("Conversation id (cid) of the chat to continue."),
  reply_id: z.string().optional().describe("Reply id (rid) of the turn to continue from."),
  reply_candidate_id: z.string().optional().describe("Reply candidate id (rcid) of the chosen answer."),
};

const generationInputSchema = {
  model: z
    .string()
    .optional()
    .describe(`Model name. One of: ${GeminiWebuiClient.listModels().join(", ")}. Default: unspecified.`),
  gem: z.string().optional().describe("Gem id to use as the system prompt."),
  files: z.array(z.string()).optional().describe("Local file paths to attach to the prompt."),
  retry: z.number().int().min(0).max(5).optional().describe("Retries on classified failures. Default 2."),
};

const askInputSchema = {
  prompt: z.string().describe("Prompt to send."),
  ...generationInputSchema,
  ...lineageInputSchema,
};

type LineageToolInput = {
  conversation_id?: string;
  reply_id?: string;
  reply_candidate_id?: string;
};

type AskToolInput = LineageToolInput & {
  prompt: string;
  model?: string;
  gem?: string;
  files?: string[];
  retry?: number;
};

type ChatEntry = {
  id: string;
  session: ChatSession;
  createdAt: number;
  lastUsedAt: number;
};

export type ChatRegistryOptions = {
  ttlMs: number;
  max: number;
  now?: () => number;
};

/** Server-held chat sessions, evicted by idle time and by count. */
export class ChatRegistry {
  readonly #chats = new Map<string, ChatEntry>();
  readonly #ttlMs: number;
  readonly #max: number;
  readonly #now: () => number;

  constructor(options: ChatRegistryOptions) {
    this.#ttlMs = options.ttlMs;
    this.#max = options.max;
    this.#now = options.now ?? Date.now;
  }

  get size(): number {
    return this.#chats.size;
  }

  create(session: ChatSession): ChatEntry {
    this.cleanup();

    const now = this.#now();
    const entry: ChatEntry = { id: crypto.randomUUID(), session, createdAt: now, lastUsedAt: now };
    this.#chats.set(entry.id, entry);
    this.cleanup();
    return entry;
  }

  get(chatId: string): ChatEntry {
    this.cleanup();

    const entry = this.#chats.get(chatId);
    if (!entry) {
      throw new Error(`chat_not_found: ${chatId}`);
    }

    entry.lastUsedAt = this.#now();
    return entry;
  }

  cleanup(): void {
    const now = this.#now();
    for (const [chatId, entry] of this.#chats.entries()) {
      if (now - entry.lastUsedAt > this.#ttlMs) {
        this.#chats.delete(chatId);
      }
    }

    if (this.#chats.size <= this.#max) {
      return;
    }

    const evictable = Array.from(this.#chats.values()).sort((a, b) => a.lastUsedAt - b.lastUsedAt);
    while (this.#chats.size > this.#max) {
      const next = evictable.shift();
      if (!next) {
        break;
      }

      this.#chats.delete(next.id);
    }
  }
}

export function toLineage(input: LineageToolInput): Array<string | null> | null {
  const lineage = [input.conversation_id ?? null, input.reply_id ?? null, input.reply_candidate_id ?? null];
  return lineage.some((slot) => slot !== null) ? lineage : null;
}

export function formatOutput(output: ModelOutput) {
  return {
    text: output.text,
    thoughts: output.thoughts,
    conversation_id: output.lineage[0] ?? null,
    reply_id: output.lineage[1] ?? null,
    reply_candidate_id: output.rcid,
    chosen_index: output.chosenIndex,
    candidates: output.candidates.map((candidate, index) => ({
      index,
      reply_candidate_id: candidate.rcid,
      text: candidate.text,
    })),
    images: output.images.map((image) => ({
      url: image.url,
      title: image.title,
      alt: image.alt,
      generated: image.requiresCredentials,
    })),
  };
}

export function registerTools(server: McpServer, getClient: () => GeminiWebuiClient, chats: ChatRegistry): void {
  const makeTextContent = (text: string) => [{ type: "text" as const, text }];

  server.registerTool(
    "gemini_webui_session",
    {
      description: "Validate the Gemini session cookies and report client readiness.",
      inputSchema: {},
    },
    async () => {
      const session = await getClient().describeSession();
      return {
        content: makeTextContent(JSON.stringify(session, null, 2)),
        structuredContent: session,
      };
    },
  );

  server.registerTool(
    "gemini_webui_models",
    {
      description: "List the model names this server can select.",
      inputSchema: {},
    },
    async () => {
      const models = GeminiWebuiClient.listModels();
      return {
        content: makeTextContent(JSON.stringify(models, null, 2)),
        structuredContent: { models },
      };
    },
  );

  server.registerTool(
    "gemini_webui_gems",
    {
      description: "List gems (system prompt presets) available to the account.",
      inputSchema: {
        predefined: z
          .boolean()
          .optional()
          .describe("true for built-in gems only, false for the account's own gems only."),
      },
    },
    async ({ predefined }) => {
      const jar = await getClient().fetchGems();
      const gems = Array.from(jar.filter({ predefined }));
      return {
        content: makeTextContent(JSON.stringify(gems, null, 2)),
        structuredContent: { gems },
      };
    },
  );

  server.registerTool(
    "gemini_webui_ask",
    {
      description:
        "Send a single prompt to Gemini. Pass conversation_id, reply_id and reply_candidate_id from an earlier answer to continue that conversation.",
      inputSchema: askInputSchema,
    },
    async (input: AskToolInput) => {
      const output = await getClient().generateContent(
        {
          prompt: input.prompt,
          files: input.files,
          model: input.model,
          gem: input.gem,
          lineage: toLineage(input),
        },
        { retry: input.retry },
      );
      const formatted = formatOutput(output);
      return {
        content: makeTextContent(formatted.text),
        structuredContent: formatted,
      };
    },
  );

  server.registerTool(
    "gemini_webui_chat_start",
    {
      description: "Start a server-held chat session and return its chat_id.",
      inputSchema: {
        model: generationInputSchema.model,
        gem: generationInputSchema.gem,
        ...lineageInputSchema,
      },
    },
    async (input: LineageToolInput & { model?: string; gem?: string }) => {
      const session = getClient().startChat({
        model: input.model,
        gem: input.gem,
        lineage: toLineage(input) ?? undefined,
      });
      const entry = chats.create(session);
      const payload = { chat_id: entry.id, created_at: entry.createdAt, lineage: session.lineage };
      return {
        content: makeTextContent(JSON.stringify(payload, null, 2)),
        structuredContent: payload,
      };
    },
  );

  server.registerTool(
    "gemini_webui_chat_send",
    {
      description: "Send the next message in a chat started with gemini_webui_chat_start.",
      inputSchema: {
        chat_id: z.string().describe("Chat id returned by gemini_webui_chat_start."),
        prompt: z.string().describe("Message to send."),
        files: generationInputSchema.files,
        retry: generationInputSchema.retry,
      },
    },
    async ({ chat_id, prompt, files, retry }) => {
      const entry = chats.get(chat_id);
      const output = await entry.session.send(prompt, files, { retry });
      const formatted = formatOutput(output);
      return {
        content: makeTextContent(formatted.text),
        structuredContent: { chat_id: entry.id, ...formatted },
      };
    },
  );

  server.registerTool(
    "gemini_webui_chat_choose",
    {
      description: "Continue a chat from another candidate of its last answer.",
      inputSchema: {
        chat_id: z.string().describe("Chat id returned by gemini_webui_chat_start."),
        index: z.number().int().min(0).describe("Zero-based candidate index."),
      },
    },
    async ({ chat_id, index }) => {
      const entry = chats.get(chat_id);
      const output = entry.session.chooseCandidate(index);
      const formatted = formatOutput(output);
      return {
        content: makeTextContent(formatted.text),
        structuredContent: { chat_id: entry.id, ...formatted },
      };
    },
  );
}
