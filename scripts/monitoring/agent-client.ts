/**
 * Remote Agent Client
 *
 * Talks to the agent's local-only HTTP API on an upstream host by running
 * curl over a two-hop SSH tunnel. Each call is timed into CallStats.
 */

import { Value } from "@sinclair/typebox/value";
import { AgentStatus } from "../../src/agent/index.js";
import type { ResolvedUpstream } from "./config.js";
import { CallStats } from "./call-stats.js";
import { TunnelError, errorMessage } from "./errors.js";
import { parseNodeMetrics } from "./parsers.js";
import { JumpSshRunner, loadAuth, parseEndpoint } from "./ssh-exec.js";
import type { CommandRunner } from "./ssh-exec.js";
import type { RemoteNodeMetrics } from "./types.js";

export const DEFAULT_JUMP_USER = "master";
export const NODE_EXPORTER_PORT = 9100;
/** Local SOCKS listener the agent routes egress through. */
export const EGRESS_PROXY = "socks5h://127.0.0.1:18388";

export class RemoteAgentClient {
  readonly stats: CallStats;

  constructor(
    readonly name: string,
    readonly agentPort: number,
    private readonly runner: CommandRunner,
  ) {
    this.stats = new CallStats(runner.endpoint);
  }

  private exec(command: string): Promise<string> {
    return this.stats.track(() => this.runner.run(command));
  }

  private async fetchStatus(command: string): Promise<AgentStatus> {
    const output = await this.exec(command);
    let body: unknown;
    try {
      body = JSON.parse(output);
    } catch (err) {
      throw new TunnelError("parse output", `parse status: ${errorMessage(err)}`, { cause: err });
    }
    if (!Value.Check(AgentStatus, body)) {
      throw new TunnelError("parse output", "parse status: unexpected shape");
    }
    return body;
  }

  /** Fast path, no mode connectivity test. */
  getStatus(): Promise<AgentStatus> {
    return this.fetchStatus(`curl -s http://127.0.0.1:${this.agentPort}/status`);
  }

  /** Adds `mode_healthy` / `mode_error`; the agent spends a few seconds testing the mode. */
  getStatusWithCheck(): Promise<AgentStatus> {
    return this.fetchStatus(`curl -s 'http://127.0.0.1:${this.agentPort}/status?check=true'`);
  }

  async getNodeMetrics(): Promise<RemoteNodeMetrics> {
    const output = await this.exec(`curl -s http://127.0.0.1:${NODE_EXPORTER_PORT}/metrics`);
    try {
      return parseNodeMetrics(output);
    } catch (err) {
      throw new TunnelError("parse output", errorMessage(err), { cause: err });
    }
  }

  /** Address the outside world sees for traffic leaving through the agent. */
  async getExternalIp(): Promise<string> {
    return (await this.exec(`curl -s -x ${EGRESS_PROXY} --max-time 10 ifconfig.me`)).trim();
  }

  async restart(): Promise<void> {
    await this.exec("systemctl restart switch-gate");
  }
}

/**
 * One client per upstream flagged for agent use. Upstreams whose auth
 * cannot be set up are skipped with a warning; the checker then reports
 * them down.
 */
export function createAgentClients(
  upstreams: Iterable<ResolvedUpstream>,
  jump: { host: string; keyPath?: string },
): Map<string, RemoteAgentClient> {
  const clients = new Map<string, RemoteAgentClient>();
  for (const u of upstreams) {
    if (!u.agent) continue;
    try {
      const auth = loadAuth(jump.keyPath);
      const runner = new JumpSshRunner(
        parseEndpoint(jump.host, DEFAULT_JUMP_USER),
        { host: u.ip, port: 22, user: u.user },
        auth,
      );
      clients.set(u.key, new RemoteAgentClient(u.name, u.agentPort, runner));
    } catch (err) {
      console.warn(`[health] Agent client for ${u.key} unavailable: ${errorMessage(err)}`);
    }
  }
  return clients;
}
