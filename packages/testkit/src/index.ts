/**
 * Stoneward test helpers
 */

export { createTempRoot, removeDir, withTempDir } from "./fs.js";
export { seedWorld, withTempWorld } from "./world.js";
export type { RegionFixture, WorldFixture } from "./world.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliMain, CliOutput, CliResult, CliExecOptions } from "./cli.js";
