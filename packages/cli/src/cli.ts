#!/usr/bin/env node

/**
 * Stoneward CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
