/**
 * Health Sources
 *
 * Where a server's raw signals come from: the metrics backend for hosts it
 * scrapes, or the remote agent over the SSH tunnel for upstream hosts.
 * Neither source rejects; failures land in the sample.
 */

import type { ResolvedConfig } from "./config.js";
import { getUpstreamByAddress, isAgentServer } from "./config.js";
import type { MetricsClient } from "./metrics-client.js";
import type { RemoteAgentClient } from "./agent-client.js";
import type { HealthSource, RawSample, ServerDescriptor, ServiceStatus } from "./types.js";
import { emptySample } from "./types.js";
import { errorMessage } from "./errors.js";
import { parseDuration } from "./parsers.js";

export const AGENT_SERVICE = "switch-gate";
const NODE_EXPORTER_SERVICE = "node_exporter";

function settled<T>(r: PromiseSettledResult<T>): T | undefined {
  return r.status === "fulfilled" ? r.value : undefined;
}

// ---------------------------------------------------------------------------
// Metrics backend
// ---------------------------------------------------------------------------
export class MetricsSource implements HealthSource {
  readonly kind = "metrics" as const;

  constructor(private readonly client: MetricsClient) {}

  async fetch(server: ServerDescriptor): Promise<RawSample> {
    const instance = server.metricsInstance || server.name;
    const sample = emptySample();

    try {
      sample.isUp = await this.client.isUp(instance);
    } catch {
      sample.isUp = false;
    }

    if (sample.isUp) {
      const [cpu, memory, memBytes, disk, diskBytes, uptime] = await Promise.allSettled([
        this.client.getCpu(instance),
        this.client.getMemory(instance),
        this.client.getMemoryBytes(instance),
        this.client.getDisk(instance),
        this.client.getDiskBytes(instance),
        this.client.getUptime(instance),
      ]);
      sample.cpu = settled(cpu) ?? 0;
      sample.memory = settled(memory) ?? 0;
      sample.memoryUsedBytes = settled(memBytes)?.used ?? 0;
      sample.memoryTotalBytes = settled(memBytes)?.total ?? 0;
      sample.disk = settled(disk) ?? 0;
      sample.diskUsedBytes = settled(diskBytes)?.used ?? 0;
      sample.diskTotalBytes = settled(diskBytes)?.total ?? 0;
      sample.uptimeMs = settled(uptime) ?? 0;
    }

    sample.services = await Promise.all(
      server.services.map(async (svc): Promise<ServiceStatus> => {
        const status: ServiceStatus = { name: svc.name, job: svc.job, port: svc.port, isUp: sample.isUp };
        if (!svc.job) return status;
        try {
          status.isUp = await this.client.isServiceUp(svc.job, instance);
        } catch (err) {
          status.isUp = false;
          status.error = errorMessage(err);
        }
        return status;
      }),
    );

    return sample;
  }
}

// ---------------------------------------------------------------------------
// Remote agent over the tunnel
// ---------------------------------------------------------------------------
export class RemoteAgentSource implements HealthSource {
  readonly kind = "agent" as const;

  constructor(
    private readonly cfg: ResolvedConfig,
    private readonly clients: ReadonlyMap<string, RemoteAgentClient>,
  ) {}

  async fetch(server: ServerDescriptor): Promise<RawSample> {
    const sample = emptySample();
    const upstream = getUpstreamByAddress(this.cfg, server.address);
    const client = upstream ? this.clients.get(upstream.key) : undefined;
    if (!client) return sample;

    let uptime: string | undefined;
    try {
      uptime = (await client.getStatus()).uptime;
    } catch (err) {
      const error = errorMessage(err);
      console.warn(`[health] ${server.id}: agent status failed: ${error}`);
      sample.services = [{ name: AGENT_SERVICE, port: client.agentPort, isUp: false, error }];
      return sample;
    }

    sample.isUp = true;
    if (uptime) sample.uptimeMs = parseDuration(uptime) ?? 0;

    let haveNodeMetrics = false;
    try {
      const node = await client.getNodeMetrics();
      haveNodeMetrics = true;
      sample.memory = node.memoryUsedPercent;
      sample.memoryUsedBytes = node.memoryUsedBytes;
      sample.memoryTotalBytes = node.memoryTotalBytes;
      sample.disk = node.diskUsedPercent;
      sample.diskUsedBytes = node.diskUsedBytes;
      sample.diskTotalBytes = node.diskTotalBytes;
      // load1 of 1.0 on a single core is a saturated CPU
      sample.cpu = Math.min(node.load1 * 100, 100);
    } catch (err) {
      console.warn(`[health] ${server.id}: node metrics unavailable: ${errorMessage(err)}`);
    }

    // Everything but node_exporter counts as up while the agent answers
    sample.services = server.services.map((svc) => ({
      name: svc.name,
      port: svc.port,
      isUp: svc.name === NODE_EXPORTER_SERVICE ? haveNodeMetrics : true,
    }));
    return sample;
  }
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------
export type SourceSelector = (server: ServerDescriptor) => HealthSource;

/** Agent source for addresses of agent-flagged upstreams, metrics otherwise. */
export function selectSource(cfg: ResolvedConfig, metrics: HealthSource, agent: HealthSource): SourceSelector {
  return (server) => (isAgentServer(cfg, server.address) ? agent : metrics);
}
