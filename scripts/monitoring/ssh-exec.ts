/**
 * SSH command execution. Either a single hop to the jump host, or two hops
 * (caller → jump host → target) with the second connection carried over a
 * forwarded channel of the first. Every call opens fresh connections.
 */

import { readFileSync } from "node:fs";
import { Client } from "ssh2";
import type { ClientChannel, ConnectConfig } from "ssh2";
import { TunnelError, errorMessage } from "./errors.js";
import type { TunnelStage } from "./errors.js";

export const SSH_READY_TIMEOUT_MS = 10_000;
export const SSH_COMMAND_TIMEOUT_MS = 30_000;

/** Anything that runs a shell command somewhere and returns its stdout. */
export interface CommandRunner {
  readonly endpoint: string;
  run(command: string): Promise<string>;
}

export interface SshAuth {
  privateKey?: Buffer;
  agent?: string;
}

export interface SshEndpoint {
  host: string;
  port: number;
  user: string;
}

/**
 * Key file first, then the agent socket. At least one must be present.
 */
export function loadAuth(keyPath?: string, agentSocket: string | undefined = process.env.SSH_AUTH_SOCK): SshAuth {
  const auth: SshAuth = {};
  if (keyPath) {
    try {
      auth.privateKey = readFileSync(keyPath);
    } catch (err) {
      throw new TunnelError("load key file", errorMessage(err), { cause: err });
    }
  }
  if (agentSocket) auth.agent = agentSocket;
  if (!auth.privateKey && !auth.agent) {
    throw new Error("no authentication methods available");
  }
  return auth;
}

/** "user@host[:port]" → endpoint, falling back to `defaultUser` and port 22. */
export function parseEndpoint(target: string, defaultUser: string): SshEndpoint {
  let user = defaultUser;
  let rest = target;
  const at = target.indexOf("@");
  if (at !== -1) {
    user = target.slice(0, at);
    rest = target.slice(at + 1);
  }
  const m = rest.match(/^(.*):(\d+)$/);
  if (m) return { host: m[1], port: parseInt(m[2], 10), user };
  return { host: rest, port: 22, user };
}

interface Attempt {
  stage: TunnelStage;
  fail(err: unknown): void;
  done(output: string): void;
}

function startAttempt(
  timeoutMs: number,
  clients: Client[],
  resolve: (output: string) => void,
  reject: (err: TunnelError) => void,
): Attempt {
  let settled = false;
  const settle = (fn: () => void) => {
    if (settled) return;
    settled = true;
    clearTimeout(timer);
    for (const c of clients) c.end();
    fn();
  };
  const attempt: Attempt = {
    stage: "dial jump host",
    fail: (err) =>
      settle(() =>
        reject(err instanceof TunnelError ? err : new TunnelError(attempt.stage, errorMessage(err), { cause: err })),
      ),
    done: (output) => settle(() => resolve(output)),
  };
  const timer = setTimeout(() => {
    attempt.fail(new TunnelError("timeout", `${attempt.stage} did not finish within ${timeoutMs}ms`));
  }, timeoutMs);
  return attempt;
}

function execOn(client: Client, command: string, attempt: Attempt): void {
  attempt.stage = "new session";
  client.exec(command, (err: Error | undefined, channel: ClientChannel) => {
    if (err) {
      attempt.fail(err);
      return;
    }
    attempt.stage = "run command";
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let exitCode: number | null = null;

    channel.on("data", (chunk: Buffer) => stdout.push(chunk));
    channel.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    channel.on("exit", (code: number | null) => {
      exitCode = code;
    });
    channel.on("close", () => {
      if (exitCode === 0) {
        attempt.done(Buffer.concat(stdout).toString("utf-8"));
        return;
      }
      const errText = Buffer.concat(stderr).toString("utf-8").trim();
      attempt.fail(new TunnelError("run command", `exit status ${exitCode ?? "unknown"} (stderr: ${errText})`));
    });
  });
}

function connectConfig(ep: SshEndpoint, auth: SshAuth, extra: Partial<ConnectConfig> = {}): ConnectConfig {
  return {
    host: ep.host,
    port: ep.port,
    username: ep.user,
    privateKey: auth.privateKey,
    agent: auth.agent,
    readyTimeout: SSH_READY_TIMEOUT_MS,
    ...extra,
  };
}

/** Runs commands on the jump host itself. */
export class DirectSshRunner implements CommandRunner {
  readonly endpoint: string;

  constructor(
    private readonly host: SshEndpoint,
    private readonly auth: SshAuth,
    private readonly timeoutMs = SSH_COMMAND_TIMEOUT_MS,
  ) {
    this.endpoint = `${host.user}@${host.host}`;
  }

  run(command: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const client = new Client();
      const attempt = startAttempt(this.timeoutMs, [client], resolve, reject);
      client.on("error", (err: Error) => attempt.fail(err));
      client.on("ready", () => execOn(client, command, attempt));
      client.connect(connectConfig(this.host, this.auth));
    });
  }
}

/** Runs commands on a target reachable only through the jump host. */
export class JumpSshRunner implements CommandRunner {
  readonly endpoint: string;

  constructor(
    private readonly jump: SshEndpoint,
    private readonly target: SshEndpoint,
    private readonly auth: SshAuth,
    private readonly timeoutMs = SSH_COMMAND_TIMEOUT_MS,
  ) {
    this.endpoint = `${jump.host} → ${target.user}@${target.host}`;
  }

  run(command: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const jumpClient = new Client();
      const targetClient = new Client();
      const attempt = startAttempt(this.timeoutMs, [targetClient, jumpClient], resolve, reject);

      jumpClient.on("error", (err: Error) => attempt.fail(err));
      jumpClient.on("ready", () => {
        attempt.stage = "dial target via jump";
        jumpClient.forwardOut("127.0.0.1", 0, this.target.host, this.target.port, (err: Error | undefined, channel: ClientChannel) => {
          if (err) {
            attempt.fail(err);
            return;
          }
          attempt.stage = "ssh client conn";
          targetClient.on("error", (e: Error) => attempt.fail(e));
          targetClient.on("ready", () => execOn(targetClient, command, attempt));
          targetClient.connect(connectConfig(this.target, this.auth, { sock: channel }));
        });
      });
      jumpClient.connect(connectConfig(this.jump, this.auth));
    });
  }
}
