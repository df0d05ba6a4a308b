/**
 * Fleet Health HTTP API
 *
 * REST routes over the checker, the agent and jump host clients, plus the
 * SSE stream and the agent webhook. Every /api response uses the
 * ApiResponse envelope from src/http.
 */

import express from "express";
import type { Request, Response, Router } from "express";
import cors from "cors";
import type { ApiErrorCode, ApiResponse, ResponseMetadata } from "../src/http/index.js";
import type { ResolvedConfig } from "./monitoring/config.js";
import { buildDescriptors, isAgentServer } from "./monitoring/config.js";
import type { HealthChecker } from "./monitoring/health-checker.js";
import type { RemoteAgentClient } from "./monitoring/agent-client.js";
import type { JumpHostClient } from "./monitoring/jump-host-client.js";
import type { CallStatsSnapshot } from "./monitoring/types.js";
import { HealthError, errorMessage } from "./monitoring/errors.js";
import { toCallStats, toFleetHealth, toServerHealth } from "./monitoring/wire.js";
import { sseHandler } from "./monitoring/sse.js";
import { WEBHOOK_PATH, webhookHandler } from "./monitoring/webhook.js";
import type { WebhookOptions } from "./monitoring/webhook.js";
import { modeIcon } from "./monitoring/status.js";
import * as monitoring from "./monitoring/index.js";

export const SERVICE_NAME = "fleet-health";
export const SERVICE_VERSION = "1.0.0";

/** Where routes find the live monitoring objects. */
export interface ApiDeps {
  getChecker(): HealthChecker | null;
  getConfig(): ResolvedConfig | null;
  getAgentClient(upstreamKey: string): RemoteAgentClient | null;
  getJumpHostClient(): JumpHostClient | null;
  getCallStats(): CallStatsSnapshot[];
  webhook?: WebhookOptions | null;
}

export const monitoringDeps: ApiDeps = {
  getChecker: monitoring.getChecker,
  getConfig: monitoring.getConfig,
  getAgentClient: monitoring.getAgentClient,
  getJumpHostClient: monitoring.getJumpHostClient,
  getCallStats: monitoring.getCallStats,
};

// ---------------------------------------------------------------------------
// Envelope helpers
// ---------------------------------------------------------------------------
const STATUS_BY_CODE: Record<ApiErrorCode, number> = {
  VALIDATION_ERROR: 400,
  AUTH_ERROR: 401,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
  TIMEOUT: 504,
  SERVICE_UNAVAILABLE: 503,
};

function ok<T>(res: Response, data: T, metadata: ResponseMetadata = {}): void {
  const body: ApiResponse<T> = {
    success: true,
    data,
    metadata: { timestamp: new Date().toISOString(), ...metadata },
  };
  res.json(body);
}

function fail(res: Response, code: ApiErrorCode, message: string): void {
  const status = STATUS_BY_CODE[code];
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, status_code: status },
    metadata: { timestamp: new Date().toISOString() },
  };
  res.status(status).json(body);
}

function failWith(res: Response, err: unknown): void {
  if (err instanceof HealthError) {
    fail(res, err.code, err.message);
    return;
  }
  fail(res, "INTERNAL_ERROR", errorMessage(err));
}

function isForce(req: Request, param = "force"): boolean {
  return req.query[param] === "true";
}

/** Resolves the checker or answers 503; callers return on null. */
function requireChecker(deps: ApiDeps, res: Response): HealthChecker | null {
  const checker = deps.getChecker();
  if (!checker) fail(res, "SERVICE_UNAVAILABLE", "Infrastructure monitoring is not configured");
  return checker;
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------
export function createApiRouter(deps: ApiDeps): Router {
  const router = express.Router();

  router.get("/api/health", async (req, res) => {
    const checker = requireChecker(deps, res);
    if (!checker) return;
    const started = Date.now();
    const force = isForce(req);
    try {
      const cached = !force && checker.cacheInfo().fresh;
      const statuses = force ? await checker.checkAllForce() : await checker.checkAll();
      ok(res, toFleetHealth(statuses, checker.cacheInfo().refreshedAt), {
        cached,
        duration_ms: Date.now() - started,
      });
    } catch (err) {
      failWith(res, err);
    }
  });

  router.get("/api/health/ping", async (_req, res) => {
    const checker = requireChecker(deps, res);
    if (!checker) return;
    try {
      await checker.ping();
      ok(res, { reachable: true });
    } catch (err) {
      failWith(res, err);
    }
  });

  router.get("/api/health/cache", (_req, res) => {
    const checker = requireChecker(deps, res);
    if (!checker) return;
    const info = checker.cacheInfo();
    ok(res, { entries: info.entries, refreshed_at: info.refreshedAt, age_ms: info.ageMs, fresh: info.fresh });
  });

  router.post("/api/health/invalidate", (_req, res) => {
    const checker = requireChecker(deps, res);
    if (!checker) return;
    checker.invalidateCache();
    ok(res, { invalidated: true });
  });

  router.get("/api/health/servers/:id", async (req, res) => {
    const checker = requireChecker(deps, res);
    if (!checker) return;
    const started = Date.now();
    try {
      const status = isForce(req)
        ? await checker.checkServerForce(req.params.id)
        : await checker.checkServer(req.params.id);
      ok(res, toServerHealth(status), { duration_ms: Date.now() - started });
    } catch (err) {
      failWith(res, err);
    }
  });

  router.get("/api/health/stats", (_req, res) => {
    ok(res, deps.getCallStats().map(toCallStats));
  });

  router.get("/api/health/sse", sseHandler);

  router.get("/api/infrastructure", (_req, res) => {
    const cfg = deps.getConfig();
    if (!cfg) {
      fail(res, "SERVICE_UNAVAILABLE", "Infrastructure monitoring is not configured");
      return;
    }
    const servers = buildDescriptors(cfg);
    ok(res, {
      clouds: cfg.infrastructure.clouds.map((cloud) => ({
        name: cloud.name,
        icon: cloud.icon,
        servers: servers
          .filter((s) => s.cloudName === cloud.name)
          .map((s) => ({
            id: s.id,
            name: s.name,
            icon: s.icon,
            address: s.address,
            source: isAgentServer(cfg, s.address) ? "agent" : "metrics",
            external_check: s.externalCheck ?? null,
            services: s.services.map((svc) => svc.name),
          })),
      })),
      upstreams: [...cfg.upstreams.values()].map((u) => ({
        key: u.key,
        name: u.name,
        ip: u.ip,
        agent: u.agent,
      })),
      jump_host: cfg.jumpHost ? { name: cfg.jumpHost.name } : null,
    });
  });

  // --- Remote agents ---
  router.get("/api/agents/:upstream/status", async (req, res) => {
    const client = deps.getAgentClient(req.params.upstream);
    if (!client) {
      fail(res, "NOT_FOUND", `no agent client for upstream: ${req.params.upstream}`);
      return;
    }
    try {
      const status = isForce(req, "check") ? await client.getStatusWithCheck() : await client.getStatus();
      ok(res, { upstream: client.name, mode_icon: modeIcon(status.mode), ...status });
    } catch (err) {
      failWith(res, err);
    }
  });

  router.get("/api/agents/:upstream/ip", async (req, res) => {
    const client = deps.getAgentClient(req.params.upstream);
    if (!client) {
      fail(res, "NOT_FOUND", `no agent client for upstream: ${req.params.upstream}`);
      return;
    }
    try {
      ok(res, { upstream: client.name, external_ip: await client.getExternalIp() });
    } catch (err) {
      failWith(res, err);
    }
  });

  router.post("/api/agents/:upstream/restart", async (req, res) => {
    const client = deps.getAgentClient(req.params.upstream);
    if (!client) {
      fail(res, "NOT_FOUND", `no agent client for upstream: ${req.params.upstream}`);
      return;
    }
    try {
      await client.restart();
      console.log(`[health] Agent restarted on ${req.params.upstream}`);
      ok(res, { restarted: true });
    } catch (err) {
      failWith(res, err);
    }
  });

  // --- Jump host ---
  const withJumpHost = (
    fn: (client: JumpHostClient) => Promise<unknown>,
  ) => async (_req: Request, res: Response): Promise<void> => {
    const client = deps.getJumpHostClient();
    if (!client) {
      fail(res, "SERVICE_UNAVAILABLE", "Jump host is not configured");
      return;
    }
    try {
      ok(res, await fn(client));
    } catch (err) {
      failWith(res, err);
    }
  };

  router.get("/api/gateway/status", withJumpHost(async (c) => {
    const status = await c.getGatewayStatus();
    return { ...status, mode_icon: modeIcon(status.mode) };
  }));
  router.get("/api/gateway/traffic", withJumpHost((c) => c.getTraffic()));
  router.get("/api/gateway/ip", withJumpHost(async (c) => ({ external_ip: await c.getExternalIp() })));

  // --- Agent webhook ---
  if (deps.webhook) {
    router.all(WEBHOOK_PATH, express.text({ type: () => true, limit: "64kb" }), webhookHandler(deps.webhook));
  }

  return router;
}

export function createApp(deps: ApiDeps = monitoringDeps): express.Express {
  const app = express();
  app.use(cors());

  app.get("/health", (_req, res) => {
    const checker = deps.getChecker();
    res.json({
      status: "ok",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      monitoring: checker ? { servers: checker.serverCount, cache: checker.cacheInfo() } : null,
    });
  });

  app.use(createApiRouter(deps));
  return app;
}
