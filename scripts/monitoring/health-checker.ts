/**
 * Health Checker
 *
 * Orchestrates one refresh pass: for each configured server pick a source,
 * fetch its raw sample, run the reachability probe, classify, and store the
 * frozen snapshot in the fleet cache. Per-server failures never escape a
 * pass; an unknown server id is the only error callers see.
 */

import { HealthCache } from "./cache.js";
import { DEFAULT_CACHE_TTL_SECONDS, DEFAULT_CONCURRENCY } from "./config.js";
import { ServerNotFoundError, errorMessage } from "./errors.js";
import type { Prober } from "./probe.js";
import type { SourceSelector } from "./sources.js";
import { getStatusLevel } from "./status.js";
import type { CacheInfo, ProbeResult, RawSample, ServerDescriptor, ServerStatus } from "./types.js";
import { emptySample } from "./types.js";

export interface HealthCheckerOptions {
  servers: readonly ServerDescriptor[];
  selectSource: SourceSelector;
  probe: Prober;
  /** Reachability of the metrics backend. */
  ping: () => Promise<void>;
  cacheTtlMs?: number;
  concurrency?: number;
  now?: () => number;
}

export type RefreshListener = (statuses: readonly ServerStatus[]) => void;

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  };
  const workers = Math.min(Math.max(1, limit), items.length);
  await Promise.all(Array.from({ length: workers }, worker));
  return results;
}

export function assembleStatus(
  descriptor: ServerDescriptor,
  sample: RawSample,
  external: ProbeResult,
  checkedAt: Date,
): ServerStatus {
  const services = Object.freeze(sample.services.map((svc) => Object.freeze({ ...svc })));
  return Object.freeze({
    ...sample,
    descriptor,
    services,
    externalAccess: external.reachable,
    externalLatencyMs: external.latencyMs,
    externalError: external.error,
    level: getStatusLevel({ ...sample, services }),
    checkedAt: checkedAt.toISOString(),
  });
}

export class HealthChecker {
  private readonly servers: readonly ServerDescriptor[];
  private readonly byId: Map<string, ServerDescriptor>;
  private readonly order: string[];
  private readonly cache: HealthCache;
  private readonly concurrency: number;
  private readonly now: () => number;
  private readonly listeners = new Set<RefreshListener>();

  constructor(private readonly opts: HealthCheckerOptions) {
    this.servers = opts.servers;
    this.byId = new Map(opts.servers.map((s) => [s.id, s]));
    this.order = opts.servers.map((s) => s.id);
    this.now = opts.now ?? Date.now;
    this.cache = new HealthCache(opts.cacheTtlMs ?? DEFAULT_CACHE_TTL_SECONDS * 1000, this.now);
    this.concurrency = opts.concurrency ?? DEFAULT_CONCURRENCY;
  }

  get serverCount(): number {
    return this.servers.length;
  }

  // -------------------------------------------------------------------------
  // Public contract
  // -------------------------------------------------------------------------
  async checkAll(): Promise<ServerStatus[]> {
    if (this.cache.isFresh()) return this.cache.ordered(this.order);
    return this.refreshAll();
  }

  checkAllForce(): Promise<ServerStatus[]> {
    return this.refreshAll();
  }

  async checkServer(serverId: string): Promise<ServerStatus> {
    if (this.cache.isFresh()) {
      const hit = this.cache.get(serverId);
      if (hit) return hit;
    }
    return this.checkServerForce(serverId);
  }

  async checkServerForce(serverId: string): Promise<ServerStatus> {
    const descriptor = this.byId.get(serverId);
    if (!descriptor) throw new ServerNotFoundError(serverId);
    const status = await this.checkOne(descriptor);
    this.cache.replaceOne(status);
    return status;
  }

  invalidateCache(): void {
    this.cache.clear();
  }

  ping(): Promise<void> {
    return this.opts.ping();
  }

  cacheInfo(): CacheInfo {
    return this.cache.info();
  }

  /** Called after every full refresh. Returns an unsubscribe function. */
  onRefresh(listener: RefreshListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // Refresh
  // -------------------------------------------------------------------------
  private async refreshAll(): Promise<ServerStatus[]> {
    const start = Date.now();
    const runId = `refresh-${start}`;

    const statuses = await mapWithConcurrency(this.servers, this.concurrency, (d) => this.checkOne(d));
    this.cache.replaceAll(statuses);

    const counts = { up: 0, degraded: 0, down: 0 };
    for (const s of statuses) counts[s.level]++;
    console.log(
      `[health][${runId}] Refresh complete: ${statuses.length} servers, ` +
      `${counts.up} up, ${counts.degraded} degraded, ${counts.down} down in ${Date.now() - start}ms`,
    );

    for (const listener of this.listeners) {
      try {
        listener(statuses);
      } catch (err) {
        console.error(`[health][${runId}] Refresh listener failed: ${errorMessage(err)}`);
      }
    }
    return statuses;
  }

  private async checkOne(descriptor: ServerDescriptor): Promise<ServerStatus> {
    let sample: RawSample;
    try {
      sample = await this.opts.selectSource(descriptor).fetch(descriptor);
    } catch (err) {
      console.warn(`[health] ${descriptor.id}: source failed: ${errorMessage(err)}`);
      sample = emptySample();
    }

    let external: ProbeResult;
    if (descriptor.externalCheck) {
      try {
        external = await this.opts.probe(descriptor.externalCheck);
      } catch (err) {
        external = { reachable: false, latencyMs: 0, error: errorMessage(err) };
      }
    } else {
      external = { reachable: sample.isUp, latencyMs: 0 };
    }

    return assembleStatus(descriptor, sample, external, new Date(this.now()));
  }
}
