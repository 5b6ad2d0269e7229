/**
 * Stoneward operator CLI
 *
 * Commands work on a JSON world directory (see @stoneward/sdk json-store) and print JSON.
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { logger } from "@stoneward/sdk";
import { resolveRoot, isVerbose } from "./lib/env.js";
import { collect, parseAlias, parseName } from "./lib/arg.js";
import {
  colorize,
  printJson,
  printLines,
  processOutput,
  rebuildView,
  recordView,
} from "./lib/render.js";
import type { CliOutput } from "./lib/render.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { createTelemetry } from "./lib/telemetry.js";
import type { Telemetry } from "./lib/telemetry.js";
import { openCliWorld } from "./lib/world.js";

type GlobalOptions = {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface InvocationContext {
  root: string;
  quiet: boolean;
  telemetry: Telemetry;
}

function readVersion(): string {
  const parsed: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree. Output goes to `output`; errors surface as thrown values.
 */
export function createProgram(output: CliOutput = processOutput): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => output.stdout(str),
      writeErr: (str) => output.stderr(str),
    })
    .exitOverride();

  program
    .name("stoneward")
    .description("Inspect and maintain a stoneward world directory")
    .version(readVersion())
    .option("--root <path>", "World directory root")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program.hook("preAction", () => {
    logger.setEnabled(isVerbose(program.opts<GlobalOptions>().verbose));
  });

  const context = (): InvocationContext => {
    const opts = program.opts<GlobalOptions>();
    return {
      root: resolveRoot(opts.root),
      quiet: opts.quiet === true,
      telemetry: createTelemetry(output, isVerbose(opts.verbose)),
    };
  };

  program
    .command("resolve")
    .description("Resolve a record id or alias in a world scope")
    .argument("<scope>", "World scope", (value: string) => parseName(value, "scope"))
    .argument("<token>", "Record id or alias")
    .option("--raw", "Output compact JSON")
    .action(async (scope: string, token: string, options: { raw?: boolean }) => {
      const ctx = context();
      await ctx.telemetry.withTiming("cli.resolve", async () => {
        const { stoneward } = await openCliWorld(ctx.root, ctx.telemetry);
        const records = await stoneward.resolve(scope, token);
        if (records.length === 0) {
          throw new CliError(`No protected area matches "${token}" in ${scope}`, {
            exitCode: 2,
          });
        }
        printJson(output, records.map(recordView), { raw: options.raw });
      });
    });

  program
    .command("alias-taken")
    .description("Check whether any protected area in any scope carries an alias")
    .argument("<alias>", "Alias to check", parseAlias)
    .action(async (alias: string) => {
      const ctx = context();
      await ctx.telemetry.withTiming("cli.alias-taken", async () => {
        const { stoneward } = await openCliWorld(ctx.root, ctx.telemetry);
        printJson(output, { alias, taken: await stoneward.aliasExistsAnywhere(alias) });
      });
    });

  program
    .command("limits")
    .description("Resolve quota limits from permission grants")
    .argument("<principal>", "Principal id")
    .option("--grant <grant>", "Effective grant (repeatable)", collect, [])
    .option("--place <blockType>", "Also check placing one more area of this block")
    .action(async (principal: string, options: { grant: string[]; place?: string }) => {
      const ctx = context();
      await ctx.telemetry.withTiming("cli.limits", async () => {
        const { stoneward } = await openCliWorld(ctx.root, ctx.telemetry, {
          [principal]: options.grant,
        });

        const perCategory: Record<string, number> = {};
        for (const [entry, limit] of stoneward.perCategoryLimits(principal)) {
          perCategory[entry.alias] = limit;
        }
        const view: Record<string, unknown> = {
          principal,
          global: stoneward.globalLimit(principal),
          perCategory,
        };
        if (options.place !== undefined) {
          view.placement = await stoneward.checkPlacement(principal, options.place);
        }
        printJson(output, view);
      });
    });

  program
    .command("regions")
    .description("List the protected areas a principal owns in a scope")
    .argument("<scope>", "World scope", (value: string) => parseName(value, "scope"))
    .argument("<principal>", "Principal id")
    .option("--members", "Include areas the principal is a member of")
    .action(async (scope: string, principal: string, options: { members?: boolean }) => {
      const ctx = context();
      await ctx.telemetry.withTiming("cli.regions", async () => {
        const { stoneward } = await openCliWorld(ctx.root, ctx.telemetry);
        const records = await stoneward.recordsOf(scope, principal, {
          includeMembers: options.members === true,
        });
        printJson(output, records.map(recordView));
      });
    });

  program
    .command("migrate")
    .description("Convert legacy name-keyed ownership to identifiers")
    .option("--force", "Run the pass even if the migration is already complete")
    .action(async (options: { force?: boolean }) => {
      const ctx = context();
      await ctx.telemetry.withTiming("cli.migrate", async () => {
        const { stoneward, summary } = await openCliWorld(ctx.root, ctx.telemetry);
        const report =
          options.force === true ? await stoneward.runMigration({ force: true }) : summary.migration;
        printJson(output, report);
      });
    });

  program
    .command("rebuild")
    .description("Rebuild alias indexes and reload identities")
    .argument("[scope]", "Only rebuild this scope's index", (value: string) =>
      parseName(value, "scope")
    )
    .action(async (scope: string | undefined) => {
      const ctx = context();
      await ctx.telemetry.withTiming("cli.rebuild", async () => {
        const { stoneward } = await openCliWorld(ctx.root, ctx.telemetry);
        const result = await stoneward.rebuildCaches(scope);
        printJson(output, {
          scopes: result.scopes.map(rebuildView),
          identity: result.identity
            ? {
                status: result.identity.status,
                loaded: result.identity.loaded,
                nameless: result.identity.nameless,
              }
            : null,
        });
      });
    });

  program
    .command("rename")
    .description("Set a protected area's alias, or clear it when none is given")
    .argument("<scope>", "World scope", (value: string) => parseName(value, "scope"))
    .argument("<id>", "Record id", (value: string) => parseName(value, "id"))
    .argument("[alias]", "New alias", parseAlias)
    .action(async (scope: string, id: string, alias: string | undefined) => {
      const ctx = context();
      await ctx.telemetry.withTiming("cli.rename", async () => {
        const { stoneward } = await openCliWorld(ctx.root, ctx.telemetry);
        await stoneward.renameRecord(scope, id, alias);
        if (!ctx.quiet) {
          printLines(output, [
            alias === undefined
              ? `Cleared alias of ${scope}/${id}`
              : `Renamed ${scope}/${id} to ${alias}`,
          ]);
        }
      });
    });

  return program;
}

/**
 * Parse argv and run one command
 * @param argv - Full argv, including the node and script entries
 * @returns Process exit code
 */
export async function run(argv: string[], output: CliOutput = processOutput): Promise<number> {
  const program = createProgram(output);
  const loggingWasEnabled = logger.isEnabled();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander already printed its own usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = isVerbose(program.opts<GlobalOptions>().verbose);
    const text = `Error: ${formatCliError(err, verbose)}\n`;
    output.stderr(output === processOutput ? colorize(text, "red", process.stderr) : text);
    return mapSdkErrorToExitCode(err);
  } finally {
    logger.setEnabled(loggingWasEnabled);
  }
}
