/**
 * Timing metrics written to stderr in verbose mode
 */

import { metrics } from "@stoneward/sdk";
import type { CliOutput } from "./render.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format one metric line
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ") + "\n";
}

export interface Telemetry {
  emit(key: string, fields: Record<string, unknown>): void;
  /** One line per indexed scope: lookups, evictions and rebuild timing */
  emitIndexMetrics(): void;
  withTiming<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Telemetry that writes only when verbose
 */
export function createTelemetry(output: CliOutput, verbose: boolean): Telemetry {
  const emit = (key: string, fields: Record<string, unknown>): void => {
    if (verbose) {
      output.stderr(formatMetric(key, fields));
    }
  };

  const emitIndexMetrics = (): void => {
    for (const [scope, scopeMetrics] of metrics.getAllMetrics()) {
      emit(`index.${scope}`, {
        hits: scopeMetrics.hitCount,
        misses: scopeMetrics.missCount,
        hit_rate: metrics.getHitRate(scope).toFixed(2),
        evicted: scopeMetrics.evictedCount,
        keys: scopeMetrics.keys,
        rebuild_p95_ms: metrics.getP95(scopeMetrics.rebuildTimeMs).toFixed(2),
      });
    }
  };

  return {
    emit,
    emitIndexMetrics,
    async withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
      const start = Date.now();
      let success = false;

      try {
        const result = await fn();
        success = true;
        return result;
      } finally {
        emit(label, { duration_ms: Date.now() - start, success });
        emitIndexMetrics();
      }
    },
  };
}
