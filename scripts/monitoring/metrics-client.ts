/**
 * Prometheus HTTP API Client
 *
 * Instant queries against `/api/v1/query` through a fixed set of node
 * exporter expressions, keyed by the `instance` label.
 */

import { Value } from "@sinclair/typebox/value";
import { PromQueryResponse } from "../../src/metrics/index.js";
import { MetricNotFoundError, MetricsQueryError, errorMessage } from "./errors.js";

export const METRICS_TIMEOUT_MS = 10_000;

export interface QueryResult {
  instance: string;
  value: number;
}

export interface ByteUsage {
  used: number;
  total: number;
}

export class MetricsClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly timeoutMs = METRICS_TIMEOUT_MS) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------
  private async get(path: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await fetch(this.baseUrl + path, { signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }

  async query(expr: string): Promise<QueryResult[]> {
    let res: Response;
    try {
      res = await this.get(`/api/v1/query?${new URLSearchParams({ query: expr })}`);
    } catch (err) {
      throw new MetricsQueryError(`prometheus query failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.status !== 200) {
      throw new MetricsQueryError(`prometheus returned status ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new MetricsQueryError(`failed to decode prometheus response: ${errorMessage(err)}`, { cause: err });
    }
    if (!Value.Check(PromQueryResponse, body)) {
      throw new MetricsQueryError("failed to decode prometheus response: unexpected shape");
    }
    if (body.status !== "success") {
      throw new MetricsQueryError(`prometheus error: ${body.errorType ?? ""} - ${body.error ?? ""}`);
    }

    const results: QueryResult[] = [];
    for (const sample of body.data?.result ?? []) {
      const value = parseFloat(sample.value[1]);
      if (Number.isNaN(value)) continue;
      results.push({ instance: sample.metric.instance ?? "", value });
    }
    return results;
  }

  async querySingle(expr: string): Promise<number> {
    const results = await this.query(expr);
    if (results.length === 0) throw new MetricNotFoundError(expr);
    return results[0].value;
  }

  // -------------------------------------------------------------------------
  // Node exporter expressions
  // -------------------------------------------------------------------------

  /**
   * Exact label first (hostname-style labels), then a prefix match for
   * `ip:port` labels.
   */
  async isUp(instance: string): Promise<boolean> {
    let value: number;
    try {
      value = await this.querySingle(`up{instance="${instance}",job="node"}`);
    } catch {
      value = await this.querySingle(`up{instance=~"${instance}.*",job="node"}`);
    }
    return value === 1;
  }

  getCpu(instance: string): Promise<number> {
    return this.querySingle(
      `100 - avg(rate(node_cpu_seconds_total{mode="idle",instance="${instance}"}[5m]))*100`,
    );
  }

  getMemory(instance: string): Promise<number> {
    return this.querySingle(
      `(1 - node_memory_MemAvailable_bytes{instance="${instance}"}/node_memory_MemTotal_bytes{instance="${instance}"})*100`,
    );
  }

  async getMemoryBytes(instance: string): Promise<ByteUsage> {
    const total = await this.querySingle(`node_memory_MemTotal_bytes{instance="${instance}"}`);
    const avail = await this.querySingle(`node_memory_MemAvailable_bytes{instance="${instance}"}`);
    return { used: total - avail, total };
  }

  getDisk(instance: string): Promise<number> {
    return this.querySingle(
      `(1 - node_filesystem_avail_bytes{instance="${instance}",mountpoint="/"}/node_filesystem_size_bytes{instance="${instance}",mountpoint="/"})*100`,
    );
  }

  async getDiskBytes(instance: string): Promise<ByteUsage> {
    const total = await this.querySingle(`node_filesystem_size_bytes{instance="${instance}",mountpoint="/"}`);
    const avail = await this.querySingle(`node_filesystem_avail_bytes{instance="${instance}",mountpoint="/"}`);
    return { used: total - avail, total };
  }

  /** Whole seconds since boot, as milliseconds. */
  async getUptime(instance: string): Promise<number> {
    const seconds = await this.querySingle(
      `node_time_seconds{instance="${instance}"} - node_boot_time_seconds{instance="${instance}"}`,
    );
    return Math.trunc(seconds) * 1000;
  }

  async isServiceUp(job: string, instance?: string): Promise<boolean> {
    const expr = instance ? `up{job="${job}",instance=~"${instance}.*"}` : `up{job="${job}"}`;
    return (await this.querySingle(expr)) === 1;
  }

  async ping(): Promise<void> {
    let res: Response;
    try {
      res = await this.get("/-/healthy");
    } catch (err) {
      throw new MetricsQueryError(`prometheus not reachable: ${errorMessage(err)}`, { cause: err });
    }
    if (res.status !== 200) {
      throw new MetricsQueryError(`prometheus health check failed: status ${res.status}`);
    }
  }
}
