/**
 * Per-endpoint call statistics (in-memory, reset only by a restart).
 */

import type { CallStatsSnapshot } from "./types.js";
import { errorMessage } from "./errors.js";

export class CallStats {
  private successCount = 0;
  private errorCount = 0;
  private lastLatencyMs = 0;
  private lastError: string | null = null;
  private lastErrorAt: Date | null = null;

  constructor(readonly endpoint: string) {}

  /** Latency is recorded on every call; the error pair only on failure. */
  record(err: unknown, latencyMs: number): void {
    this.lastLatencyMs = latencyMs;
    if (err) {
      this.errorCount++;
      this.lastError = errorMessage(err);
      this.lastErrorAt = new Date();
    } else {
      this.successCount++;
    }
  }

  /** Times `fn` and records its outcome; the outcome is passed through. */
  async track<T>(fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.record(null, Date.now() - start);
      return result;
    } catch (err) {
      this.record(err ?? new Error("unknown failure"), Date.now() - start);
      throw err;
    }
  }

  snapshot(): CallStatsSnapshot {
    return {
      endpoint: this.endpoint,
      successCount: this.successCount,
      errorCount: this.errorCount,
      lastLatencyMs: this.lastLatencyMs,
      lastError: this.lastError,
      lastErrorAt: this.lastErrorAt ? this.lastErrorAt.toISOString() : null,
    };
  }
}
