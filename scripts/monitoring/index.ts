/**
 * Fleet Health Orchestrator
 *
 * Builds the clients and the checker from a resolved config, runs the
 * optional background refresh loop, and exposes the pieces the HTTP API
 * and MCP tools need.
 */

import type { ResolvedConfig } from "./config.js";
import { buildDescriptors, isInfrastructureEnabled } from "./config.js";
import { MetricsClient } from "./metrics-client.js";
import { RemoteAgentClient, createAgentClients } from "./agent-client.js";
import { JumpHostClient, createJumpHostClient } from "./jump-host-client.js";
import { MetricsSource, RemoteAgentSource, selectSource } from "./sources.js";
import { HealthChecker } from "./health-checker.js";
import { probe as defaultProbe } from "./probe.js";
import type { Prober } from "./probe.js";
import { broadcast, closeAll } from "./sse.js";
import { toFleetHealth } from "./wire.js";
import type { CallStatsSnapshot } from "./types.js";
import { errorMessage } from "./errors.js";

export interface InitOptions {
  /** Background refresh period; 0 disables. Defaults to HEALTH_POLL_INTERVAL. */
  pollIntervalMs?: number;
  /** Replace the SSH-backed clients, e.g. in tests. */
  agents?: Map<string, RemoteAgentClient>;
  jumpHost?: JumpHostClient | null;
  probe?: Prober;
}

interface MonitoringContext {
  config: ResolvedConfig;
  checker: HealthChecker;
  agents: Map<string, RemoteAgentClient>;
  jumpHost: JumpHostClient | null;
}

let ctx: MonitoringContext | null = null;
let pollTimer: ReturnType<typeof setInterval> | null = null;

// ---------------------------------------------------------------------------
// Background refresh
// ---------------------------------------------------------------------------
/** Skips a tick while the previous refresh of the same checker is in flight. */
function createPoller(checker: HealthChecker): () => Promise<void> {
  let isPolling = false;
  return async () => {
    if (isPolling) return;
    isPolling = true;
    try {
      await checker.checkAllForce();
    } catch (err) {
      console.error(`[health] Poll error: ${errorMessage(err)}`);
    } finally {
      isPolling = false;
    }
  };
}

// ---------------------------------------------------------------------------
// Start / Stop
// ---------------------------------------------------------------------------

/** Returns null when infrastructure monitoring is disabled or has no clouds. */
export function initMonitoring(config: ResolvedConfig, opts: InitOptions = {}): HealthChecker | null {
  stopMonitoring();

  if (!isInfrastructureEnabled(config)) {
    console.log("[health] Infrastructure monitoring not configured");
    return null;
  }

  let jumpHost: JumpHostClient | null = null;
  if (opts.jumpHost !== undefined) {
    jumpHost = opts.jumpHost;
  } else if (config.jumpHost) {
    try {
      jumpHost = createJumpHostClient(config.jumpHost);
    } catch (err) {
      console.warn(`[health] Jump host client unavailable: ${errorMessage(err)}`);
    }
  }

  const agents = opts.agents
    ?? (config.jumpHost ? createAgentClients(config.upstreams.values(), config.jumpHost) : new Map<string, RemoteAgentClient>());

  const metrics = new MetricsClient(config.infrastructure.prometheusUrl);
  const servers = buildDescriptors(config);
  const checker = new HealthChecker({
    servers,
    selectSource: selectSource(config, new MetricsSource(metrics), new RemoteAgentSource(config, agents)),
    probe: opts.probe ?? defaultProbe,
    ping: () => metrics.ping(),
    cacheTtlMs: config.infrastructure.cacheTtlMs,
    concurrency: config.infrastructure.concurrency,
  });

  checker.onRefresh((statuses) => {
    broadcast("health", toFleetHealth(statuses, checker.cacheInfo().refreshedAt));
  });

  ctx = { config, checker, agents, jumpHost };
  console.log(
    `[health] Initialized: ${servers.length} servers, ${agents.size} agent clients, ` +
    `jump host ${jumpHost ? "ready" : "off"}`,
  );

  const intervalMs = opts.pollIntervalMs ?? parseInt(process.env.HEALTH_POLL_INTERVAL || "0", 10);
  if (intervalMs > 0) {
    console.log(`[health] Background refresh every ${intervalMs / 1000}s`);
    const poll = createPoller(checker);
    poll().catch((e) => console.error("[health] Initial poll failed:", errorMessage(e)));
    pollTimer = setInterval(() => {
      poll().catch((e) => console.error("[health] Scheduled poll failed:", errorMessage(e)));
    }, intervalMs);
  }

  return checker;
}

export function stopMonitoring(): void {
  if (pollTimer) {
    clearInterval(pollTimer);
    pollTimer = null;
  }
  closeAll();
  ctx = null;
}

// ---------------------------------------------------------------------------
// Accessors (for API routes and MCP tools)
// ---------------------------------------------------------------------------
export function getChecker(): HealthChecker | null {
  return ctx?.checker ?? null;
}

export function getConfig(): ResolvedConfig | null {
  return ctx?.config ?? null;
}

export function getAgentClient(upstreamKey: string): RemoteAgentClient | null {
  return ctx?.agents.get(upstreamKey) ?? null;
}

export function getJumpHostClient(): JumpHostClient | null {
  return ctx?.jumpHost ?? null;
}

/** Jump host first, then agents in upstream declaration order. */
export function getCallStats(): CallStatsSnapshot[] {
  if (!ctx) return [];
  const out: CallStatsSnapshot[] = [];
  if (ctx.jumpHost) out.push(ctx.jumpHost.stats.snapshot());
  for (const client of ctx.agents.values()) out.push(client.stats.snapshot());
  return out;
}
