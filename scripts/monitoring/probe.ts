/**
 * External Reachability Probe
 *
 * Checks a server from this process's network position: `tcp://host:port`
 * is a bare connect, anything else is an HTTP(S) GET. Self-signed
 * certificates are accepted.
 */

import { Socket } from "node:net";
import { Agent } from "node:https";
import { Readable } from "node:stream";
import axios from "axios";
import type { ProbeResult } from "./types.js";
import { errorMessage } from "./errors.js";

export const PROBE_TIMEOUT_MS = 10_000;

export type Prober = (target: string) => Promise<ProbeResult>;

const insecureAgent = new Agent({ rejectUnauthorized: false });

export function probe(target: string, timeoutMs = PROBE_TIMEOUT_MS): Promise<ProbeResult> {
  if (target.startsWith("tcp://")) {
    return probeTcp(target.slice("tcp://".length), timeoutMs);
  }
  return probeHttp(target, timeoutMs);
}

// ---------------------------------------------------------------------------
// HTTP(S): 2xx and 3xx count as reachable. The body is never read.
// ---------------------------------------------------------------------------
async function probeHttp(url: string, timeoutMs: number): Promise<ProbeResult> {
  try {
    new URL(url);
  } catch (err) {
    return { reachable: false, latencyMs: 0, error: `invalid URL: ${errorMessage(err)}` };
  }

  const start = Date.now();
  try {
    const res = await axios.get(url, {
      timeout: timeoutMs,
      httpsAgent: insecureAgent,
      validateStatus: () => true,
      responseType: "stream",
    });
    const latencyMs = Date.now() - start;
    discard(res.data);
    if (res.status >= 200 && res.status < 400) {
      return { reachable: true, latencyMs };
    }
    return { reachable: false, latencyMs, error: `HTTP ${res.status}` };
  } catch (err) {
    return { reachable: false, latencyMs: Date.now() - start, error: `connection failed: ${errorMessage(err)}` };
  }
}

function discard(body: unknown): void {
  if (body instanceof Readable) body.destroy();
}

// ---------------------------------------------------------------------------
// TCP
// ---------------------------------------------------------------------------
const MAX_PORT = 65535;

function splitHostPort(addr: string): { host: string; port: number } | string {
  const m = addr.match(/^\[?([^\]]*)\]?:(\d+)$/);
  if (!m) return "missing port";
  const port = parseInt(m[2], 10);
  if (port < 1 || port > MAX_PORT) return `invalid port ${m[2]}`;
  return { host: m[1], port };
}

function probeTcp(addr: string, timeoutMs: number): Promise<ProbeResult> {
  const start = Date.now();
  const target = splitHostPort(addr);
  if (typeof target === "string") {
    return Promise.resolve({
      reachable: false,
      latencyMs: 0,
      error: `connection failed: address ${addr}: ${target}`,
    });
  }

  return new Promise((resolve) => {
    const socket = new Socket();
    let done = false;
    const finish = (error?: string) => {
      if (done) return;
      done = true;
      socket.destroy();
      const latencyMs = Date.now() - start;
      resolve(error ? { reachable: false, latencyMs, error: `connection failed: ${error}` } : { reachable: true, latencyMs });
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish());
    socket.once("timeout", () => finish(`timed out after ${timeoutMs}ms`));
    socket.once("error", (err) => finish(err.message));
    try {
      socket.connect(target.port, target.host);
    } catch (err) {
      finish(errorMessage(err));
    }
  });
}
