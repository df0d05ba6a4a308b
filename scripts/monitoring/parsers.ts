/**
 * Text parsers for command output read over SSH.
 */

import type { GatewayStatus } from "../../src/gateway/index.js";
import type { RemoteNodeMetrics } from "./types.js";

// ---------------------------------------------------------------------------
// Exporter text format
// ---------------------------------------------------------------------------
const SAMPLE_LINE = /^([a-zA-Z_:][a-zA-Z0-9_:]*)(?:\{([^}]*)\})?\s+(\S+)/;
const LABEL_PAIR = /([a-zA-Z_][a-zA-Z0-9_]*)="((?:[^"\\]|\\.)*)"/g;

export interface ExporterSample {
  name: string;
  labels: Record<string, string>;
  value: number;
}

export function parseExporterText(text: string): ExporterSample[] {
  const samples: ExporterSample[] = [];
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const m = line.match(SAMPLE_LINE);
    if (!m) continue;
    const value = parseFloat(m[3]);
    if (Number.isNaN(value)) continue;

    const labels: Record<string, string> = {};
    for (const pair of (m[2] ?? "").matchAll(LABEL_PAIR)) {
      labels[pair[1]] = pair[2];
    }
    samples.push({ name: m[1], labels, value });
  }
  return samples;
}

function pick(samples: ExporterSample[], name: string, labels: Record<string, string> = {}): number | undefined {
  const hit = samples.find(
    (s) => s.name === name && Object.entries(labels).every(([k, v]) => s.labels[k] === v),
  );
  return hit?.value;
}

/**
 * Memory and load come from the unlabelled gauges; disk from the root
 * mount. Missing memory gauges are an error, missing disk figures are zero.
 */
export function parseNodeMetrics(text: string): RemoteNodeMetrics {
  const samples = parseExporterText(text);

  const memTotal = pick(samples, "node_memory_MemTotal_bytes");
  const memAvail = pick(samples, "node_memory_MemAvailable_bytes");
  if (memTotal === undefined || memAvail === undefined) {
    throw new Error("node metrics missing node_memory_MemTotal_bytes or node_memory_MemAvailable_bytes");
  }

  const root = { mountpoint: "/" };
  const diskTotal = pick(samples, "node_filesystem_size_bytes", root) ?? 0;
  const diskAvail = pick(samples, "node_filesystem_avail_bytes", root) ?? 0;

  const memUsed = memTotal - memAvail;
  const diskUsed = diskTotal - diskAvail;

  return {
    memoryUsedBytes: memUsed,
    memoryTotalBytes: memTotal,
    memoryUsedPercent: memTotal > 0 ? (memUsed / memTotal) * 100 : 0,
    diskUsedBytes: diskUsed,
    diskTotalBytes: diskTotal,
    diskUsedPercent: diskTotal > 0 ? (diskUsed / diskTotal) * 100 : 0,
    load1: pick(samples, "node_load1") ?? 0,
  };
}

// ---------------------------------------------------------------------------
// Duration strings ("72h3m5.2s", "1m30s", "250ms")
// ---------------------------------------------------------------------------
const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** Milliseconds, or null when the string is not a duration. */
export function parseDuration(text: string): number | null {
  const s = text.trim();
  if (s === "0") return 0;
  if (!/^-?(\d+(\.\d*)?(ns|us|µs|ms|s|m|h))+$/.test(s)) return null;

  let total = 0;
  for (const part of s.matchAll(/(\d+(?:\.\d*)?)(ns|us|µs|ms|s|m|h)/g)) {
    total += parseFloat(part[1]) * UNIT_MS[part[2]];
  }
  return s.startsWith("-") ? -total : total;
}

// ---------------------------------------------------------------------------
// KEY=VALUE status output
// ---------------------------------------------------------------------------
export function parseKeyValueStatus(output: string): GatewayStatus {
  const status: GatewayStatus = { server: "", mode: "", table: "" };
  for (const raw of output.split("\n")) {
    const line = raw.trim();
    const eq = line.indexOf("=");
    if (eq === -1) continue;
    const value = line.slice(eq + 1).trim();
    if (line.startsWith("SERVER")) status.server = value;
    else if (line.startsWith("MODE")) status.mode = value;
    else if (line.startsWith("TABLE")) status.table = value;
  }
  return status;
}
