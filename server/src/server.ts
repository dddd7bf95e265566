import express from "express";

import type { KnowledgeBase } from "./knowledge_base";
import type { Resolver } from "./resolver";
import { registerAncestryResolveTool, type ToolRegistry } from "./tool";
import { registerCulturalResourcesTool } from "./tool_cultural_resources";
import { registerMedicalHeritageTool } from "./tool_medical_heritage";

export const SERVER_INFO = { name: "ancestry-mcp", version: "1.0.0" } as const;
const PROTOCOL_VERSION = "2024-11-05";

/* ------------------------------------------------------------------ */
/* Types */
/* ------------------------------------------------------------------ */

export type JsonRpcRequest = {
  jsonrpc?: unknown;
  id?: string | number | null;
  method?: unknown;
  params?: Record<string, unknown>;
};

export type RpcReply = {
  jsonrpc: "2.0";
  id: string | number | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
};

/* ------------------------------------------------------------------ */
/* Tool registry */
/* ------------------------------------------------------------------ */

export function buildToolRegistry(
  resolver: Resolver,
  kb: KnowledgeBase
): ToolRegistry {
  return {
    ...registerAncestryResolveTool(resolver),
    ...registerMedicalHeritageTool(kb),
    ...registerCulturalResourcesTool(kb),
  };
}

/* ------------------------------------------------------------------ */
/* Helpers */
/* ------------------------------------------------------------------ */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toJsonRpcRequest(body: unknown): JsonRpcRequest {
  if (!isRecord(body)) return {};

  const { id, params } = body;
  return {
    jsonrpc: body.jsonrpc,
    method: body.method,
    id: typeof id === "string" || typeof id === "number" ? id : null,
    params: isRecord(params) ? params : undefined,
  };
}

function isNotification(body: unknown) {
  return !isRecord(body) || body.id === undefined || body.id === null;
}

/* ------------------------------------------------------------------ */
/* Core JSON-RPC handler */
/* ------------------------------------------------------------------ */

export async function handleJsonRpc(
  tools: ToolRegistry,
  body: JsonRpcRequest
): Promise<RpcReply> {
  const { jsonrpc, id = null, method, params } = body;

  const reply = (result: unknown): RpcReply => ({
    jsonrpc: "2.0",
    id,
    result,
  });

  const rpcError = (
    code: number,
    message: string,
    data?: unknown
  ): RpcReply => ({
    jsonrpc: "2.0",
    id,
    error: { code, message, data },
  });

  try {
    if (jsonrpc !== "2.0" || typeof method !== "string") {
      return rpcError(-32600, "Invalid Request");
    }

    if (method === "initialize") {
      const advertisedTools: Record<string, unknown> = {};

      for (const tool of Object.values(tools)) {
        advertisedTools[tool.definition.name] = {
          description: tool.definition.description,
          inputSchema: tool.definition.inputSchema,
          _meta: tool.definition._meta ?? {},
        };
      }

      return reply({
        protocolVersion: PROTOCOL_VERSION,
        serverInfo: SERVER_INFO,
        capabilities: { tools: advertisedTools },
      });
    }

    if (method === "notifications/initialized") {
      return reply({ ok: true });
    }

    if (method === "tools/list") {
      return reply({
        tools: Object.values(tools).map(t => ({
          name: t.definition.name,
          description: t.definition.description,
          inputSchema: t.definition.inputSchema,
          annotations: t.definition.annotations ?? {},
        })),
      });
    }

    if (method === "tools/call") {
      const name = params?.name;
      const args = params?.arguments ?? {};

      if (typeof name !== "string") {
        return rpcError(-32602, "Missing tool name");
      }

      const tool = tools[name];
      if (!tool) {
        return rpcError(-32601, `Tool not found: ${name}`);
      }

      return reply(await tool.run(args));
    }

    return rpcError(-32601, `Method not found: ${method}`);
  } catch (err) {
    console.error("JSON-RPC handler error", err);
    return rpcError(-32000, "Server error", {
      message: err instanceof Error ? err.message : String(err),
    });
  }
}

/* ------------------------------------------------------------------ */
/* HTTP app */
/* ------------------------------------------------------------------ */

export function createServerApp(tools: ToolRegistry, backend: Resolver["backend"]) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.status(200).send(
      "Ancestry MCP server is running. Use JSON-RPC POST / or /mcp (initialize, tools/list, tools/call). SSE: GET /sse + POST /messages."
    );
  });

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true, backend });
  });

  app.get("/.well-known/mcp.json", (_req, res) => {
    res.json({
      protocolVersion: PROTOCOL_VERSION,
      serverInfo: SERVER_INFO,
      transport: { type: "sse", endpoint: "/sse" },
    });
  });

  const rpc = async (req: express.Request, res: express.Response) => {
    const reply = await handleJsonRpc(tools, toJsonRpcRequest(req.body));
    if (isNotification(req.body)) {
      res.status(204).end();
      return;
    }
    res.status(200).json(reply);
  };

  app.post("/", rpc);
  app.post("/mcp", rpc);

  /* SSE transport */

  const sseClients = new Set<express.Response>();

  app.get("/sse", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    res.write("event: ready\ndata: {}\n\n");
    sseClients.add(res);

    req.on("close", () => sseClients.delete(res));
  });

  app.post("/messages", async (req, res) => {
    const reply = await handleJsonRpc(tools, toJsonRpcRequest(req.body));
    const data = JSON.stringify(reply);
    for (const client of sseClients) {
      client.write(`event: message\ndata: ${data}\n\n`);
    }
    if (isNotification(req.body)) {
      res.status(204).end();
      return;
    }
    res.status(202).end();
  });

  return app;
}
