/**
 * Agent Webhook Receiver
 *
 * Accepts `POST /webhook/switch-gate` from remote agents, checks the shared
 * secret, and forwards a short notice through a Notifier.
 * Forwarding is single-shot; a failed send is logged and dropped.
 */

import type { Request, Response, RequestHandler } from "express";
import { Value } from "@sinclair/typebox/value";
import "../../src/formats.js";
import { WebhookEvent } from "../../src/webhook/index.js";
import { capitalize } from "./config.js";
import { errorMessage } from "./errors.js";

export const WEBHOOK_PATH = "/webhook/switch-gate";
export const SECRET_HEADER = "X-Webhook-Secret";

export interface Notifier {
  send(text: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------
function payloadString(payload: Record<string, unknown>, key: string): string {
  const v = payload[key];
  return typeof v === "string" ? v : "";
}

function payloadNumber(payload: Record<string, unknown>, key: string): number {
  const v = payload[key];
  return typeof v === "number" ? v : 0;
}

/** Notification text for a known event, or null for anything else. */
export function formatNotification(event: WebhookEvent): string | null {
  const source = capitalize(event.source);
  const p = event.payload;

  switch (event.event) {
    case "mode.changed": {
      const icon = payloadString(p, "trigger") === "limit_reached" ? "⚠️" : "🔄";
      return `${icon} <b>${source} VPS</b>\n\nMode: ${payloadString(p, "from")} → ${payloadString(p, "to")}`;
    }
    case "limit.reached":
      return (
        `⚠️ <b>${source} VPS</b>\n\n` +
        `Home limit reached: ${payloadNumber(p, "used_mb").toFixed(0)}/${payloadNumber(p, "limit_mb").toFixed(0)} MB\n` +
        `Auto-switched to: ${payloadString(p, "switched_to")}`
      );
    default:
      console.warn(`[webhook] Unknown event type: ${event.event}`);
      return null;
  }
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------
export interface WebhookOptions {
  secret: string;
  notifier: Notifier;
  /** Extra sink for forwarded text, e.g. the SSE broadcaster. */
  onNotification?: (text: string, event: WebhookEvent) => void;
}

/**
 * Mount behind `express.text()` so the secret is checked before the body
 * is parsed.
 */
export function webhookHandler(opts: WebhookOptions): RequestHandler {
  return async (req: Request, res: Response) => {
    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      res.status(405).send("Method not allowed");
      return;
    }

    if (req.get(SECRET_HEADER) !== opts.secret) {
      console.warn(`[webhook] Unauthorized from ${req.ip}`);
      res.status(401).send("Unauthorized");
      return;
    }

    const raw: unknown = req.body;
    let body: unknown;
    try {
      body = typeof raw === "string" ? JSON.parse(raw) : raw;
    } catch (err) {
      console.warn(`[webhook] Bad request: ${errorMessage(err)}`);
      res.status(400).send("Bad Request");
      return;
    }
    if (!Value.Check(WebhookEvent, body)) {
      console.warn("[webhook] Bad request: body is not a webhook event");
      res.status(400).send("Bad Request");
      return;
    }

    console.log(`[webhook] Received ${body.event} from ${body.source}`);

    const text = formatNotification(body);
    if (text) {
      opts.onNotification?.(text, body);
      try {
        await opts.notifier.send(text);
      } catch (err) {
        console.error(`[webhook] Failed to send notification: ${errorMessage(err)}`);
      }
    }

    res.sendStatus(200);
  };
}

/** Notifier that writes to stdout. */
export const consoleNotifier: Notifier = {
  async send(text: string): Promise<void> {
    console.log(`[notify] ${text.replace(/<\/?b>/g, "")}`);
  },
};
