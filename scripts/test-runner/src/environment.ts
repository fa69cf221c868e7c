import * as fs from "node:fs";
import * as path from "node:path";
import type { RunnerContext } from "./types";

export const OUTPUT_DIRECTORIES = ["screenshots", "reports", "coverage"] as const;
export const DEPENDENCY_MANIFEST = "requirements.txt";

/**
 * Creates the output directories and installs the suite's dependencies when
 * a manifest is present. Safe to call repeatedly.
 */
export function setupEnvironment(ctx: RunnerContext): void {
  ctx.log("Setting up testing environment...");

  for (const directory of OUTPUT_DIRECTORIES) {
    fs.mkdirSync(path.join(ctx.cwd, directory), { recursive: true });
  }

  if (fs.existsSync(path.join(ctx.cwd, DEPENDENCY_MANIFEST))) {
    ctx.log("Installing dependencies...");
    const result = ctx.executor.run(
      [ctx.python, "-m", "pip", "install", "-r", DEPENDENCY_MANIFEST],
      { inheritOutput: true }
    );
    // Best effort: the test run itself reports anything still missing.
    if (result.exitCode !== 0) {
      ctx.log(
        `⚠ Dependency installation failed (exit code ${result.exitCode ?? "none"}), continuing`
      );
    }
  }

  ctx.log("Environment setup complete!");
}
