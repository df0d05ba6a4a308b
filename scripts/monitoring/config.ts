/**
 * Configuration Loader
 *
 * Reads the JSON config document, expands ${VAR} references from the
 * environment, validates it against the TypeBox contracts and fills in
 * defaults. Lookups used by the checker live here too.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Value } from "@sinclair/typebox/value";
import { HealthConfig } from "../../src/config/index.js";
import type { ServerConfig, UpstreamConfig, CloudConfig } from "../../src/config/index.js";
import type { ServerDescriptor } from "./types.js";
import { ConfigError, errorMessage } from "./errors.js";

export const DEFAULT_CONFIG_PATH = "config/health.json";
export const DEFAULT_PROMETHEUS_URL = "http://localhost:9090";
export const DEFAULT_CACHE_TTL_SECONDS = 60;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_AGENT_PORT = 9090;
export const DEFAULT_CLOUD_ICON = "☁️";
export const DEFAULT_SERVER_ICON = "🖥️";
export const DEFAULT_STATUS_SCRIPT = "/usr/local/bin/vpn-mode.sh";
export const DEFAULT_TRAFFIC_SCRIPT = "/usr/local/bin/yc-traffic.sh";

/** Validated document with every default applied. */
export interface ResolvedConfig {
  infrastructure: {
    enabled: boolean;
    prometheusUrl: string;
    cacheTtlMs: number;
    concurrency: number;
    clouds: ResolvedCloud[];
  };
  jumpHost: {
    name: string;
    host: string;
    keyPath?: string;
    statusScript: string;
    trafficScript: string;
  } | null;
  upstreams: Map<string, ResolvedUpstream>;
  webhooks: { enabled: boolean; secret: string };
  port: number;
}

export interface ResolvedCloud {
  name: string;
  icon: string;
  servers: ServerConfig[];
}

export interface ResolvedUpstream {
  key: string;
  name: string;
  ip: string;
  user: string;
  agent: boolean;
  agentPort: number;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------
export function expandEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_m, name: string) => env[name] ?? "");
}

export function loadConfig(path: string = process.env.HEALTH_CONFIG || DEFAULT_CONFIG_PATH): ResolvedConfig {
  const fullPath = resolve(path);
  let raw: string;
  try {
    raw = readFileSync(fullPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`read config file ${fullPath}: ${errorMessage(err)}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = JSON.parse(expandEnv(raw));
  } catch (err) {
    throw new ConfigError(`parse config: ${errorMessage(err)}`, { cause: err });
  }

  return parseConfig(doc);
}

export function parseConfig(doc: unknown): ResolvedConfig {
  if (!Value.Check(HealthConfig, doc)) {
    const problems = [...Value.Errors(HealthConfig, doc)]
      .slice(0, 5)
      .map((e) => `${e.path || "/"} ${e.message}`);
    throw new ConfigError(`validate config: ${problems.join("; ")}`);
  }

  const seen = new Set<string>();
  for (const cloud of doc.infrastructure.clouds) {
    for (const server of cloud.servers) {
      if (seen.has(server.id)) {
        throw new ConfigError(`validate config: duplicate server id "${server.id}"`);
      }
      seen.add(server.id);
    }
  }

  return applyDefaults(doc);
}

function applyDefaults(doc: HealthConfig): ResolvedConfig {
  const infra = doc.infrastructure;
  const clouds = infra.clouds.map((cloud: CloudConfig) => ({
    name: cloud.name,
    icon: cloud.icon || DEFAULT_CLOUD_ICON,
    servers: cloud.servers.map((s) => ({
      ...s,
      name: s.name || s.id,
      icon: s.icon || DEFAULT_SERVER_ICON,
      services: s.services ?? [],
    })),
  }));

  const upstreams = new Map<string, ResolvedUpstream>();
  for (const [key, u] of Object.entries(doc.upstreams ?? {})) {
    upstreams.set(key, resolveUpstream(key, u));
  }

  const jump = doc.jump_host;
  const envPort = parseInt(process.env.PORT || "", 10);

  return {
    infrastructure: {
      enabled: infra.enabled ?? true,
      prometheusUrl: (infra.prometheus_url || DEFAULT_PROMETHEUS_URL).replace(/\/$/, ""),
      cacheTtlMs: (infra.cache_ttl_seconds ?? DEFAULT_CACHE_TTL_SECONDS) * 1000,
      concurrency: infra.concurrency ?? DEFAULT_CONCURRENCY,
      clouds,
    },
    jumpHost: jump
      ? {
          name: jump.name || "Edge Gateway",
          host: jump.host,
          keyPath: jump.key_path || undefined,
          statusScript: jump.status_script || DEFAULT_STATUS_SCRIPT,
          trafficScript: jump.traffic_script || DEFAULT_TRAFFIC_SCRIPT,
        }
      : null,
    upstreams,
    webhooks: {
      enabled: doc.webhooks?.enabled ?? false,
      secret: doc.webhooks?.secret ?? "",
    },
    port: doc.server?.port ?? (Number.isNaN(envPort) ? 3100 : envPort),
  };
}

function resolveUpstream(key: string, u: UpstreamConfig): ResolvedUpstream {
  return {
    key,
    name: u.name || capitalize(key),
    ip: u.ip,
    user: u.user || "root",
    agent: u.switch_gate ?? false,
    agentPort: u.switch_gate_port ?? DEFAULT_AGENT_PORT,
  };
}

export function capitalize(s: string): string {
  if (s.length === 0) return s;
  const first = s[0];
  return first >= "a" && first <= "z" ? first.toUpperCase() + s.slice(1) : s;
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------
export function isInfrastructureEnabled(cfg: ResolvedConfig): boolean {
  return cfg.infrastructure.enabled && cfg.infrastructure.clouds.length > 0;
}

export function getServer(cfg: ResolvedConfig, serverId: string): ServerConfig | undefined {
  for (const cloud of cfg.infrastructure.clouds) {
    const found = cloud.servers.find((s) => s.id === serverId);
    if (found) return found;
  }
  return undefined;
}

export function getServerCloud(cfg: ResolvedConfig, serverId: string): ResolvedCloud | undefined {
  return cfg.infrastructure.clouds.find((c) => c.servers.some((s) => s.id === serverId));
}

/** Upstream whose address equals `ip`, if any. */
export function getUpstreamByAddress(cfg: ResolvedConfig, ip: string): ResolvedUpstream | undefined {
  for (const u of cfg.upstreams.values()) {
    if (u.ip === ip) return u;
  }
  return undefined;
}

/** True when some upstream at `ip` is flagged for remote-agent use. */
export function isAgentServer(cfg: ResolvedConfig, ip: string): boolean {
  for (const u of cfg.upstreams.values()) {
    if (u.ip === ip && u.agent) return true;
  }
  return false;
}

/**
 * Frozen descriptors in cloud-then-declaration order. Rebuilt wholesale
 * on reconfiguration, never patched.
 */
export function buildDescriptors(cfg: ResolvedConfig): readonly ServerDescriptor[] {
  const out: ServerDescriptor[] = [];
  for (const cloud of cfg.infrastructure.clouds) {
    for (const s of cloud.servers) {
      out.push(Object.freeze({
        id: s.id,
        name: s.name || s.id,
        icon: s.icon || DEFAULT_SERVER_ICON,
        cloudName: cloud.name,
        cloudIcon: cloud.icon,
        address: s.ip,
        metricsInstance: s.prometheus_instance || undefined,
        externalCheck: s.external_check || undefined,
        services: Object.freeze((s.services ?? []).map((svc) => Object.freeze({ ...svc }))),
      }));
    }
  }
  return Object.freeze(out);
}
