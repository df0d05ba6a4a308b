/**
 * Jump Host Client
 *
 * Read-only view of the edge gateway over a single SSH hop: routing state,
 * egress traffic and the current external address.
 */

import { Value } from "@sinclair/typebox/value";
import { GatewayTraffic } from "../../src/gateway/index.js";
import type { GatewayStatus } from "../../src/gateway/index.js";
import type { ResolvedConfig } from "./config.js";
import { CallStats } from "./call-stats.js";
import { TunnelError, errorMessage } from "./errors.js";
import { parseKeyValueStatus } from "./parsers.js";
import { DirectSshRunner, loadAuth, parseEndpoint } from "./ssh-exec.js";
import type { CommandRunner } from "./ssh-exec.js";

export class JumpHostClient {
  readonly stats: CallStats;

  constructor(
    readonly name: string,
    private readonly runner: CommandRunner,
    private readonly statusScript: string,
    private readonly trafficScript: string,
  ) {
    this.stats = new CallStats(runner.endpoint);
  }

  private exec(command: string): Promise<string> {
    return this.stats.track(() => this.runner.run(command));
  }

  async getGatewayStatus(): Promise<GatewayStatus> {
    return parseKeyValueStatus(await this.exec(`${this.statusScript} status`));
  }

  async getTraffic(): Promise<GatewayTraffic> {
    const output = await this.exec(this.trafficScript);
    let body: unknown;
    try {
      body = JSON.parse(output);
    } catch (err) {
      throw new TunnelError("parse output", `parse traffic: ${errorMessage(err)}`, { cause: err });
    }
    if (!Value.Check(GatewayTraffic, body)) {
      throw new TunnelError("parse output", "parse traffic: unexpected shape");
    }
    return body;
  }

  async getExternalIp(): Promise<string> {
    return (await this.exec("curl -s --max-time 5 api.ipify.org")).trim();
  }
}

export function createJumpHostClient(jump: NonNullable<ResolvedConfig["jumpHost"]>): JumpHostClient {
  const runner = new DirectSshRunner(parseEndpoint(jump.host, "root"), loadAuth(jump.keyPath));
  return new JumpHostClient(jump.name, runner, jump.statusScript, jump.trafficScript);
}
