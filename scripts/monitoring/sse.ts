/**
 * SSE Broadcaster
 *
 * Pushes fleet refreshes (`health`) and forwarded webhook notices
 * (`notification`) to connected clients via Server-Sent Events.
 */

import type { Request, Response } from "express";
import { randomUUID } from "node:crypto";

export type SseEvent = "connected" | "health" | "notification";

interface SSEClient {
  id: string;
  res: Response;
  heartbeat: ReturnType<typeof setInterval>;
}

const HEARTBEAT_MS = 30_000;
const clients = new Map<string, SSEClient>();

function sendEvent(res: Response, event: SseEvent, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

function drop(id: string): void {
  const client = clients.get(id);
  if (!client) return;
  clearInterval(client.heartbeat);
  clients.delete(id);
}

export function sseHandler(req: Request, res: Response): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // nginx
  res.flushHeaders();

  const id = randomUUID();
  const heartbeat = setInterval(() => {
    try {
      res.write(":heartbeat\n\n");
    } catch {
      drop(id);
    }
  }, HEARTBEAT_MS);
  clients.set(id, { id, res, heartbeat });

  sendEvent(res, "connected", { client_id: id, server_time: new Date().toISOString(), clients: clients.size });

  req.on("close", () => drop(id));
}

/** Dead connections are dropped on the first failed write. */
export function broadcast(event: SseEvent, data: unknown): void {
  for (const [id, client] of clients) {
    try {
      sendEvent(client.res, event, data);
    } catch {
      drop(id);
    }
  }
}

export function getClientCount(): number {
  return clients.size;
}

/** Ends every open stream; used on shutdown. */
export function closeAll(): void {
  for (const [id, client] of clients) {
    client.res.end();
    drop(id);
  }
}
