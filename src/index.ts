#!/usr/bin/env node

import http from "node:http";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { parseOptionalBoolean, parsePositiveNumber } from "./config.js";
import { toErrorMessage } from "./errors.js";
import { GeminiWebuiClient } from "./gemini-webui-client.js";
import { logger } from "./logger.js";
import { ChatRegistry, registerTools } from "./mcp-tools.js";

const serverInfo = {
  name: "gemini-webui-mcp",
  version: "0.1.0",
} as const;

const DEFAULT_CHAT_TTL_MS = 6 * 60 * 60 * 1000;
const DEFAULT_CHAT_MAX = 100;

const chats = new ChatRegistry({
  ttlMs: parsePositiveNumber(process.env.GEMINI_CHAT_TTL_MS) ?? DEFAULT_CHAT_TTL_MS,
  max: parsePositiveNumber(process.env.GEMINI_CHAT_MAX) ?? DEFAULT_CHAT_MAX,
});

let sharedClient: GeminiWebuiClient | null = null;

// One client serves every MCP session; idle connections close themselves.
function getClient(): GeminiWebuiClient {
  if (!sharedClient) {
    sharedClient = new GeminiWebuiClient({
      autoClose: parseOptionalBoolean(process.env.GEMINI_AUTO_CLOSE) ?? true,
    });
  }

  return sharedClient;
}

function createMcpServer(): McpServer {
  const server = new McpServer(serverInfo);
  registerTools(server, getClient, chats);
  return server;
}

type SseSessions = Map<string, SSEServerTransport>;

function sendJson(res: http.ServerResponse, status: number, body: Record<string, unknown>): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

async function openSseSession(sessions: SseSessions, res: http.ServerResponse): Promise<void> {
  const transport = new SSEServerTransport("/messages", res);
  const { sessionId } = transport;
  const server = createMcpServer();

  let released = false;
  const release = (): void => {
    if (released) {
      return;
    }

    released = true;
    sessions.delete(sessionId);
    transport.onclose = undefined;
    transport.onerror = undefined;
    server.close().catch((error: unknown) => {
      logger.debug("mcp session close failed", { sessionId, error });
    });
  };

  transport.onclose = release;
  transport.onerror = release;
  sessions.set(sessionId, transport);
  await server.connect(transport);
}

async function routeSseRequest(
  sessions: SseSessions,
  base: string,
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<void> {
  const url = new URL(req.url ?? "/", base);
  const route = `${req.method ?? "GET"} ${url.pathname}`;

  switch (route) {
    case "GET /sse":
      await openSseSession(sessions, res);
      return;
    case "POST /messages": {
      const sessionId = (url.searchParams.get("sessionId") ?? "").trim();
      const transport = sessions.get(sessionId);
      if (!transport) {
        sendJson(res, 400, { error: "sse_session_not_initialized", sessionId });
        return;
      }
      await transport.handlePostMessage(req, res);
      return;
    }
    case "GET /health":
      sendJson(res, 200, {
        ok: true,
        transport: "sse",
        sessions: sessions.size,
        chats: chats.size,
        client_running: sharedClient?.running ?? false,
      });
      return;
    default:
      sendJson(res, 404, { error: "not_found" });
  }
}

async function serveSse(host: string, port: number): Promise<void> {
  const sessions: SseSessions = new Map();
  const base = `http://${host}:${port}`;

  const httpServer = http.createServer((req, res) => {
    routeSseRequest(sessions, base, req, res).catch((error: unknown) => {
      logger.error("sse request failed", { url: req.url, error });
      if (!res.headersSent) {
        sendJson(res, 500, { error: toErrorMessage(error) });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => resolve());
  });

  logger.info("gemini-webui-mcp listening", { transport: "sse", url: `${base}/sse` });
}

async function main(): Promise<void> {
  const transportType = String(process.env.MCP_TRANSPORT ?? "stdio").trim().toLowerCase();

  if (transportType === "sse") {
    const host = String(process.env.MCP_SSE_HOST ?? "127.0.0.1").trim();
    const port = Number(process.env.MCP_SSE_PORT ?? 8792);
    await serveSse(host, port);
    return;
  }

  const server = createMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("gemini-webui-mcp listening", { transport: "stdio" });
}

main().catch((error: unknown) => {
  logger.fatal("gemini-webui-mcp fatal", error);
  process.exit(1);
});
