/**
 * Output rendering helpers
 */

import { formatPrincipalRef } from "@stoneward/sdk";
import type { ProtectedAreaRecord, RebuildStats } from "@stoneward/sdk";

/**
 * Where the CLI writes; the real streams by default, a buffer in tests
 */
export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processOutput: CliOutput = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

type Color = "red" | "green" | "yellow";

export function printJson(output: CliOutput, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  output.stdout(json + "\n");
}

export function printLines(output: CliOutput, lines: string[]): void {
  for (const line of lines) {
    output.stdout(line + "\n");
  }
}

/**
 * Apply ANSI color only if the stream is a TTY
 */
export function colorize(text: string, color: Color, stream: NodeJS.WriteStream): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  return `${codes[color]}${text}\x1b[0m`;
}

/**
 * JSON view of a protected area, ownership in raw string form
 */
export function recordView(record: ProtectedAreaRecord): Record<string, unknown> {
  return {
    id: record.id,
    scope: record.worldScope,
    alias: record.alias ?? null,
    blockType: record.blockTypeKey,
    owners: record.owners.map(formatPrincipalRef),
    members: record.members.map(formatPrincipalRef),
  };
}

export function rebuildView(stats: RebuildStats): Record<string, unknown> {
  return { scope: stats.scope, records: stats.records, keys: stats.keys };
}
