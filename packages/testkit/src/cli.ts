/**
 * CLI testing utilities
 *
 * Commands run in the test process; output goes through an injected writer pair
 * instead of the real streams.
 */

/**
 * Output sink a CLI entry point writes to
 */
export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

/**
 * In-process CLI entry point: parses argv, writes output, resolves to an exit code
 */
export type CliMain = (argv: string[], output: CliOutput) => Promise<number>;

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CliExecOptions {
  /** Environment variables set for the duration of the run; undefined unsets */
  env?: Record<string, string | undefined>;
}

/**
 * Run a CLI entry point with captured output
 * @param main - Entry point under test
 * @param args - Command arguments (without node and script path)
 */
export async function runCli(
  main: CliMain,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  let stdout = "";
  let stderr = "";
  const output: CliOutput = {
    stdout(text) {
      stdout += text;
    },
    stderr(text) {
      stderr += text;
    },
  };

  const saved = new Map<string, string | undefined>();
  for (const [key, value] of Object.entries(options.env ?? {})) {
    saved.set(key, process.env[key]);
    setEnv(key, value);
  }

  try {
    const exitCode = await main(["node", "stoneward", ...args], output);
    return { stdout, stderr, exitCode };
  } finally {
    for (const [key, value] of saved) {
      setEnv(key, value);
    }
  }
}

function setEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
