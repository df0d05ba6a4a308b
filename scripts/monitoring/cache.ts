/**
 * Fleet-wide health cache: one map, one "last full refresh" timestamp.
 * Entries are frozen snapshots and are only ever swapped, never edited.
 */

import type { CacheInfo, ServerStatus } from "./types.js";

export class HealthCache {
  private entries = new Map<string, ServerStatus>();
  private refreshedAt: number | null = null;

  constructor(
    readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  isFresh(): boolean {
    return this.entries.size > 0 && this.refreshedAt !== null && this.now() - this.refreshedAt < this.ttlMs;
  }

  get(serverId: string): ServerStatus | undefined {
    return this.entries.get(serverId);
  }

  /** Cached entries in the given id order; ids without an entry are skipped. */
  ordered(serverIds: readonly string[]): ServerStatus[] {
    const out: ServerStatus[] = [];
    for (const id of serverIds) {
      const hit = this.entries.get(id);
      if (hit) out.push(hit);
    }
    return out;
  }

  /** Result of a full refresh. Replaces every entry and resets the timestamp. */
  replaceAll(statuses: readonly ServerStatus[]): void {
    const next = new Map<string, ServerStatus>();
    for (const s of statuses) next.set(s.descriptor.id, s);
    this.entries = next;
    this.refreshedAt = this.now();
  }

  /**
   * Single-server result. Only overwrites an entry the last full refresh
   * wrote; the timestamp is left alone.
   */
  replaceOne(status: ServerStatus): boolean {
    if (!this.entries.has(status.descriptor.id)) return false;
    this.entries.set(status.descriptor.id, status);
    return true;
  }

  clear(): void {
    this.entries = new Map();
    this.refreshedAt = null;
  }

  info(): CacheInfo {
    return {
      entries: this.entries.size,
      refreshedAt: this.refreshedAt === null ? null : new Date(this.refreshedAt).toISOString(),
      ageMs: this.refreshedAt === null ? null : this.now() - this.refreshedAt,
      fresh: this.isFresh(),
    };
  }
}
