/**
 * Fleet Health Runtime Types
 */

import type { StatusLevel } from "../../src/health/index.js";

export type { StatusLevel };

export interface ServiceDescriptor {
  readonly name: string;
  readonly job?: string;   // metrics job name
  readonly port?: number;  // display only
}

export interface ServerDescriptor {
  readonly id: string;
  readonly name: string;
  readonly icon: string;
  readonly cloudName: string;
  readonly cloudIcon: string;
  readonly address: string;
  readonly metricsInstance?: string;
  readonly externalCheck?: string;
  readonly services: readonly ServiceDescriptor[];
}

export interface ServiceStatus {
  name: string;
  job?: string;
  port?: number;
  isUp: boolean;
  error?: string;
}

/**
 * Raw signals a source gathered for one server, before the reachability
 * probe and classification are folded in.
 */
export interface RawSample {
  isUp: boolean;
  cpu: number;      // 0-100
  memory: number;   // 0-100
  memoryUsedBytes: number;
  memoryTotalBytes: number;
  disk: number;     // 0-100
  diskUsedBytes: number;
  diskTotalBytes: number;
  uptimeMs: number;
  services: ServiceStatus[];
}

export interface ServerStatus extends Readonly<Omit<RawSample, "services">> {
  readonly descriptor: ServerDescriptor;
  readonly externalAccess: boolean;
  readonly externalLatencyMs: number;
  readonly externalError?: string;
  readonly services: readonly Readonly<ServiceStatus>[];
  readonly level: StatusLevel;
  readonly checkedAt: string;
}

export interface ProbeResult {
  reachable: boolean;
  latencyMs: number;
  error?: string;
}

export interface CallStatsSnapshot {
  endpoint: string;
  successCount: number;
  errorCount: number;
  lastLatencyMs: number;
  lastError: string | null;
  lastErrorAt: string | null;
}

/** A place health signals come from. */
export interface HealthSource {
  readonly kind: "metrics" | "agent";
  fetch(server: ServerDescriptor): Promise<RawSample>;
}

export interface CacheInfo {
  entries: number;
  refreshedAt: string | null;
  ageMs: number | null;
  fresh: boolean;
}

export interface RemoteNodeMetrics {
  memoryUsedBytes: number;
  memoryTotalBytes: number;
  memoryUsedPercent: number;
  diskUsedBytes: number;
  diskTotalBytes: number;
  diskUsedPercent: number;
  load1: number;
}

export function emptySample(): RawSample {
  return {
    isUp: false,
    cpu: 0,
    memory: 0,
    memoryUsedBytes: 0,
    memoryTotalBytes: 0,
    disk: 0,
    diskUsedBytes: 0,
    diskTotalBytes: 0,
    uptimeMs: 0,
    services: [],
  };
}
