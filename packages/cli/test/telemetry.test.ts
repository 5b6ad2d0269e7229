/**
 * Unit tests for verbose telemetry
 */

import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "@stoneward/sdk";
import { createTelemetry, formatMetric } from "../src/lib/telemetry.js";
import type { CliOutput } from "../src/lib/render.js";

function buffer(): { output: CliOutput; stderr: () => string } {
  let stderr = "";
  return {
    output: {
      stdout: () => {},
      stderr: (text) => {
        stderr += text;
      },
    },
    stderr: () => stderr,
  };
}

describe("telemetry", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should format fields on one sanitized line", () => {
    expect(formatMetric("cli.resolve", { scope: "over\nworld", success: true })).toBe(
      "metric cli.resolve scope=over world success=true\n"
    );
  });

  it("should stay silent unless verbose", async () => {
    const sink = buffer();
    const telemetry = createTelemetry(sink.output, false);

    telemetry.emit("cli.start", { scopes: 1 });
    await telemetry.withTiming("cli.resolve", async () => 1);

    expect(sink.stderr()).toBe("");
  });

  it("should report index metrics per scope", () => {
    metrics.recordRebuild("overworld", 2, 3);
    metrics.recordRebuild("overworld", 4, 3);
    metrics.recordHit("overworld");
    metrics.recordHit("overworld");
    metrics.recordHit("overworld");
    metrics.recordMiss("overworld");
    metrics.recordEvictions("overworld", 2);
    const sink = buffer();

    createTelemetry(sink.output, true).emitIndexMetrics();

    expect(sink.stderr()).toBe(
      "metric index.overworld hits=3 misses=1 hit_rate=0.75 evicted=2 keys=3 rebuild_p95_ms=4.00\n"
    );
  });

  it("should time failed work and rethrow", async () => {
    const sink = buffer();
    const telemetry = createTelemetry(sink.output, true);

    await expect(
      telemetry.withTiming("cli.migrate", async () => {
        throw new Error("disk full");
      })
    ).rejects.toThrow("disk full");
    expect(sink.stderr()).toMatch(/^metric cli\.migrate duration_ms=\d+ success=false\n$/);
  });
});
