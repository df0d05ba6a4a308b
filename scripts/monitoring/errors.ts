/**
 * Error taxonomy. Only ServerNotFoundError and ConfigError ever leave the
 * health checker; the rest are absorbed into status fields.
 */

import type { ApiErrorCode } from "../../src/http/index.js";

export class HealthError extends Error {
  readonly code: ApiErrorCode;

  constructor(message: string, code: ApiErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ServerNotFoundError extends HealthError {
  constructor(readonly serverId: string) {
    super(`server not found: ${serverId}`, "NOT_FOUND");
  }
}

export class ConfigError extends HealthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "VALIDATION_ERROR", options);
  }
}

export class MetricsQueryError extends HealthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SERVICE_UNAVAILABLE", options);
  }
}

export class MetricNotFoundError extends HealthError {
  constructor(readonly query: string) {
    super(`no results for query: ${query}`, "NOT_FOUND");
  }
}

export type TunnelStage =
  | "load key file"
  | "dial jump host"
  | "dial target via jump"
  | "ssh client conn"
  | "new session"
  | "run command"
  | "timeout"
  | "parse output";

export class TunnelError extends HealthError {
  constructor(readonly stage: TunnelStage, detail: string, options?: { cause?: unknown }) {
    super(`${stage}: ${detail}`, stage === "timeout" ? "TIMEOUT" : "SERVICE_UNAVAILABLE", options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
