/**
 * Fleet Health MCP Tools (HTTP/SSE)
 *
 * Exposes the health checker to MCP clients. Supports both:
 *   - Streamable HTTP transport on /mcp
 *   - Legacy SSE transport on /sse + /messages
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { randomUUID } from "node:crypto";
import express from "express";
import type { Express } from "express";
import type { ApiDeps } from "./health-api.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./health-api.js";
import { errorMessage } from "./monitoring/errors.js";
import { formatGigabytes, formatProgressBar, formatUptime, statusIcon, externalIcon } from "./monitoring/status.js";
import type { ServerStatus } from "./monitoring/types.js";
import { toCallStats } from "./monitoring/wire.js";

export const NOT_CONFIGURED_TEXT =
  "Infrastructure monitoring is not configured. Add an infrastructure section with at least one cloud to the health config.";

export type ToolResult = { content: { type: "text"; text: string }[]; isError?: boolean };

const text = (t: string, isError = false): ToolResult => ({
  content: [{ type: "text" as const, text: t }],
  ...(isError ? { isError: true } : {}),
});

// ---------------------------------------------------------------------------
// Text rendering
// ---------------------------------------------------------------------------
export function renderServer(s: ServerStatus): string {
  const d = s.descriptor;
  const lines = [`${statusIcon(s.level)} ${d.icon} ${d.name} (${d.address}) ${externalIcon(s.externalAccess)}`];
  if (s.isUp) {
    lines.push(`  CPU    ${formatProgressBar(s.cpu)} ${s.cpu.toFixed(0)}%`);
    lines.push(`  Memory ${formatProgressBar(s.memory)} ${s.memory.toFixed(0)}% (${formatGigabytes(s.memoryUsedBytes, s.memoryTotalBytes)})`);
    lines.push(`  Disk   ${formatProgressBar(s.disk)} ${s.disk.toFixed(0)}% (${formatGigabytes(s.diskUsedBytes, s.diskTotalBytes)})`);
    lines.push(`  Uptime ${formatUptime(s.uptimeMs)}`);
  }
  if (s.externalError) lines.push(`  External: ${s.externalError}`);
  for (const svc of s.services) {
    lines.push(`  ${svc.isUp ? "✅" : "❌"} ${svc.name}${svc.port ? `:${svc.port}` : ""}${svc.error ? ` (${svc.error})` : ""}`);
  }
  return lines.join("\n");
}

/** Servers grouped under their cloud headers, in configuration order. */
export function renderFleet(statuses: readonly ServerStatus[]): string {
  const out: string[] = [];
  let cloud: string | null = null;
  for (const s of statuses) {
    if (s.descriptor.cloudName !== cloud) {
      cloud = s.descriptor.cloudName;
      if (out.length > 0) out.push("");
      out.push(`${s.descriptor.cloudIcon} ${cloud}`);
    }
    out.push(renderServer(s));
  }
  return out.join("\n");
}

// ---------------------------------------------------------------------------
// Tool handlers
// ---------------------------------------------------------------------------
export async function checkAllTool(deps: ApiDeps, force: boolean): Promise<ToolResult> {
  const checker = deps.getChecker();
  if (!checker) return text(NOT_CONFIGURED_TEXT);
  const statuses = force ? await checker.checkAllForce() : await checker.checkAll();
  return text(renderFleet(statuses));
}

export async function checkServerTool(deps: ApiDeps, serverId: string, force: boolean): Promise<ToolResult> {
  const checker = deps.getChecker();
  if (!checker) return text(NOT_CONFIGURED_TEXT);
  try {
    const status = force ? await checker.checkServerForce(serverId) : await checker.checkServer(serverId);
    return text(renderServer(status));
  } catch (err) {
    return text(errorMessage(err), true);
  }
}

export async function pingTool(deps: ApiDeps): Promise<ToolResult> {
  const checker = deps.getChecker();
  if (!checker) return text(NOT_CONFIGURED_TEXT);
  try {
    await checker.ping();
    return text("Metrics backend is reachable");
  } catch (err) {
    return text(errorMessage(err), true);
  }
}

export function callStatsTool(deps: ApiDeps): ToolResult {
  return text(JSON.stringify(deps.getCallStats().map(toCallStats), null, 2));
}

export function invalidateTool(deps: ApiDeps): ToolResult {
  const checker = deps.getChecker();
  if (!checker) return text(NOT_CONFIGURED_TEXT);
  checker.invalidateCache();
  return text("Health cache cleared; the next check refreshes every server");
}

function registerTools(server: McpServer, deps: ApiDeps): void {
  server.tool(
    "health_check_all",
    "Health of every configured server, grouped by cloud. Served from cache unless it is older than the TTL.",
    {
      force: z.boolean().optional().describe("Ignore the cache and refresh every server"),
    },
    async ({ force }) => checkAllTool(deps, force ?? false),
  );

  server.tool(
    "health_check_server",
    "Health of one server by id.",
    {
      server_id: z.string().describe("Server id from the config, e.g. edge-gateway"),
      force: z.boolean().optional().describe("Fetch fresh data for this server"),
    },
    async ({ server_id, force }) => checkServerTool(deps, server_id, force ?? false),
  );

  server.tool(
    "health_ping",
    "Check that the metrics backend answers before running an expensive refresh.",
    {},
    async () => pingTool(deps),
  );

  server.tool(
    "health_call_stats",
    "SSH call counters for the jump host and each tunneled agent.",
    {},
    async () => callStatsTool(deps),
  );

  server.tool(
    "health_invalidate",
    "Drop the cached fleet health.",
    {},
    async () => invalidateTool(deps),
  );
}

export function createMcpServer(deps: ApiDeps): McpServer {
  const server = new McpServer({ name: SERVICE_NAME, version: SERVICE_VERSION });
  registerTools(server, deps);
  return server;
}

// ---------------------------------------------------------------------------
// Transports
// ---------------------------------------------------------------------------
const transports: Record<string, SSEServerTransport | StreamableHTTPServerTransport> = {};

export function mountMcp(app: Express, deps: ApiDeps): void {
  app.all("/mcp", express.json(), async (req, res) => {
    const header = req.headers["mcp-session-id"];
    const sessionId = typeof header === "string" ? header : undefined;
    let transport: StreamableHTTPServerTransport;

    const existing = sessionId ? transports[sessionId] : undefined;
    if (existing) {
      if (!(existing instanceof StreamableHTTPServerTransport)) {
        res.status(400).json({ jsonrpc: "2.0", error: { code: -32000, message: "Session uses different transport" }, id: null });
        return;
      }
      transport = existing;
    } else if (!sessionId && req.method === "POST" && isInitializeRequest(req.body)) {
      const created = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid) => {
          console.log(`[health-mcp] StreamableHTTP session: ${sid}`);
          transports[sid] = created;
        },
      });
      created.onclose = () => {
        const sid = created.sessionId;
        if (sid) delete transports[sid];
      };
      await createMcpServer(deps).connect(created);
      transport = created;
    } else {
      res.status(400).json({ jsonrpc: "2.0", error: { code: -32000, message: "No valid session" }, id: null });
      return;
    }

    await transport.handleRequest(req, res, req.body);
  });

  app.get("/sse", async (req, res) => {
    console.log(`[health-mcp] SSE connection from ${req.ip}`);
    const transport = new SSEServerTransport("/messages", res);
    transports[transport.sessionId] = transport;
    res.on("close", () => {
      delete transports[transport.sessionId];
    });
    await createMcpServer(deps).connect(transport);
  });

  app.post("/messages", express.json(), async (req, res) => {
    const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : "";
    const transport = transports[sessionId];
    if (transport instanceof SSEServerTransport) {
      await transport.handlePostMessage(req, res, req.body);
    } else {
      res.status(400).send("No SSE transport for sessionId");
    }
  });
}

export async function closeMcpTransports(): Promise<void> {
  for (const sid of Object.keys(transports)) {
    try {
      await transports[sid].close();
    } catch (err) {
      console.warn(`[health-mcp] Closing session ${sid}: ${errorMessage(err)}`);
    }
    delete transports[sid];
  }
}
