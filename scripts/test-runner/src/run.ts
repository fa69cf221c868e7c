#!/usr/bin/env tsx
// ============================================================================
// Browser Test Runner - Entry Point
// Prepares the output directories, runs one test category through pytest,
// optionally runs a coverage pass, and maps the outcome to an exit code
// ============================================================================

import * as dotenv from "dotenv";
import * as path from "node:path";

import { parseArgs, USAGE } from "./cli";
import { CATEGORY_RUNNERS, selectCategory } from "./categories";
import { runCoverageReport } from "./coverage";
import { setupEnvironment } from "./environment";
import { SpawnExecutor } from "./executor";
import type { RunnerContext } from "./types";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const DEFAULT_PYTHON = "python3";

export function createDefaultContext(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RunnerContext {
  return {
    cwd,
    python: env.PYTHON || DEFAULT_PYTHON,
    executor: new SpawnExecutor(cwd),
    log: (message) => console.log(message),
    error: (message) => console.error(message),
  };
}

export function main(argv: readonly string[], ctx: RunnerContext): number {
  const parsed = parseArgs(argv);

  if (parsed.kind === "help") {
    ctx.log(USAGE);
    return EXIT_SUCCESS;
  }

  if (parsed.kind === "error") {
    ctx.error(`error: ${parsed.message}`);
    ctx.log(USAGE);
    return EXIT_USAGE;
  }

  const { config } = parsed;

  setupEnvironment(ctx);

  if (config.slow || config.verbose) {
    ctx.log("Note: --slow and --verbose do not change the test command line");
  }

  const category = selectCategory(config.categories);
  let success = CATEGORY_RUNNERS[category](config, ctx);

  if (config.coverage && category === "all") {
    const coverageSuccess = runCoverageReport(ctx);
    success = success && coverageSuccess;
  }

  ctx.log(`\n${"=".repeat(60)}`);
  if (success) {
    ctx.log("✅ All tests passed successfully!");
  } else {
    ctx.log("❌ Some tests failed!");
  }
  ctx.log("=".repeat(60));

  return success ? EXIT_SUCCESS : EXIT_FAILURE;
}

// Run if executed directly
if (require.main === module) {
  dotenv.config({ path: path.resolve(process.cwd(), ".env") });
  process.exit(main(process.argv.slice(2), createDefaultContext()));
}
