/**
 * Status classification and display helpers.
 */

import type { ServiceStatus, StatusLevel } from "./types.js";

export const CPU_DEGRADED_PERCENT = 80;
export const MEMORY_DEGRADED_PERCENT = 85;
export const DISK_DEGRADED_PERCENT = 85;

export interface LevelInputs {
  isUp: boolean;
  cpu: number;
  memory: number;
  disk: number;
  services: readonly Pick<ServiceStatus, "isUp">[];
}

/** Down wins over degraded, degraded over up. */
export function getStatusLevel(s: LevelInputs): StatusLevel {
  if (!s.isUp) return "down";
  if (s.cpu > CPU_DEGRADED_PERCENT || s.memory > MEMORY_DEGRADED_PERCENT || s.disk > DISK_DEGRADED_PERCENT) {
    return "degraded";
  }
  if (s.services.some((svc) => !svc.isUp)) return "degraded";
  return "up";
}

export function statusIcon(level: StatusLevel): string {
  switch (level) {
    case "up":
      return "🟢";
    case "degraded":
      return "🟡";
    case "down":
      return "🛑";
    default:
      return "⚪";
  }
}

export function externalIcon(reachable: boolean): string {
  return reachable ? "📶" : "❌";
}

export function modeIcon(mode: string): string {
  switch (mode.toLowerCase()) {
    case "direct":
      return "🖥";
    case "warp":
      return "☁️";
    case "home":
      return "🏠";
    default:
      return "❓";
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------
export function formatUptime(uptimeMs: number): string {
  if (uptimeMs === 0) return "unknown";

  const totalMinutes = Math.floor(uptimeMs / 60_000);
  const totalHours = Math.floor(uptimeMs / 3_600_000);
  const days = Math.floor(totalHours / 24);
  const hours = totalHours % 24;
  const minutes = totalMinutes % 60;

  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

export function formatProgressBar(percent: number, width = 10): string {
  const p = Math.min(100, Math.max(0, percent));
  const filled = Math.floor((p / 100) * width);
  return "▓".repeat(filled) + "░".repeat(width - filled);
}

const GIB = 1024 ** 3;

/** "1.5/4.0 GB" */
export function formatGigabytes(usedBytes: number, totalBytes: number): string {
  return `${(usedBytes / GIB).toFixed(1)}/${(totalBytes / GIB).toFixed(1)} GB`;
}
