/**
 * Runtime snapshots → snake_case wire contracts.
 */

import type { CallStats, FleetHealth, ServerHealth } from "../../src/health/index.js";
import type { CallStatsSnapshot, ServerStatus } from "./types.js";

export function toServerHealth(s: ServerStatus): ServerHealth {
  const d = s.descriptor;
  return {
    id: d.id,
    name: d.name,
    icon: d.icon,
    cloud_name: d.cloudName,
    cloud_icon: d.cloudIcon,
    address: d.address,
    level: s.level,
    is_up: s.isUp,
    cpu_percent: s.cpu,
    memory_percent: s.memory,
    memory_used_bytes: s.memoryUsedBytes,
    memory_total_bytes: s.memoryTotalBytes,
    disk_percent: s.disk,
    disk_used_bytes: s.diskUsedBytes,
    disk_total_bytes: s.diskTotalBytes,
    uptime_seconds: s.uptimeMs / 1000,
    external: {
      reachable: s.externalAccess,
      latency_ms: s.externalLatencyMs,
      ...(s.externalError ? { error: s.externalError } : {}),
    },
    services: s.services.map((svc) => ({
      name: svc.name,
      ...(svc.job ? { job: svc.job } : {}),
      ...(svc.port !== undefined ? { port: svc.port } : {}),
      is_up: svc.isUp,
      ...(svc.error ? { error: svc.error } : {}),
    })),
    checked_at: s.checkedAt,
  };
}

export function toFleetHealth(statuses: readonly ServerStatus[], refreshedAt: string | null): FleetHealth {
  const summary = { total: statuses.length, up: 0, degraded: 0, down: 0 };
  for (const s of statuses) summary[s.level]++;
  return { servers: statuses.map(toServerHealth), summary, refreshed_at: refreshedAt };
}

export function toCallStats(s: CallStatsSnapshot): CallStats {
  return {
    endpoint: s.endpoint,
    success_count: s.successCount,
    error_count: s.errorCount,
    last_latency_ms: s.lastLatencyMs,
    last_error: s.lastError,
    last_error_at: s.lastErrorAt,
  };
}
