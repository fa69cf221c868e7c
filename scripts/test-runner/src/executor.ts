import { spawnSync } from "node:child_process";
import type {
  CommandExecutor,
  ExecuteOptions,
  ExecutionResult,
  RunnerContext,
} from "./types";

const MAX_CAPTURE_BYTES = 64 * 1024 * 1024;

export class SpawnExecutor implements CommandExecutor {
  constructor(private readonly cwd: string) {}

  run(command: readonly string[], options: ExecuteOptions = {}): ExecutionResult {
    const [file, ...args] = command;
    if (!file) {
      throw new Error("Cannot run an empty command");
    }

    const startTime = Date.now();
    const result = spawnSync(file, args, {
      cwd: this.cwd,
      encoding: "utf-8",
      stdio: options.inheritOutput ? "inherit" : "pipe",
      maxBuffer: MAX_CAPTURE_BYTES,
    });

    return {
      exitCode: result.status,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      durationMs: Date.now() - startTime,
      error: result.error,
    };
  }
}

/**
 * Runs one command, prints its report block and returns whether it exited 0.
 */
export function runCommand(
  command: readonly string[],
  description: string,
  ctx: RunnerContext
): boolean {
  ctx.log(`\n${"=".repeat(60)}`);
  ctx.log(`Running: ${description}`);
  ctx.log(`Command: ${command.join(" ")}`);
  ctx.log("=".repeat(60));

  const result = ctx.executor.run(command);

  ctx.log(`\nExit Code: ${result.exitCode ?? "none"}`);
  ctx.log(`Duration: ${(result.durationMs / 1000).toFixed(2)} seconds`);

  if (result.error) {
    ctx.log("\nERROR:");
    ctx.log(result.error.message);
  }

  if (result.stdout) {
    ctx.log("\nSTDOUT:");
    ctx.log(result.stdout);
  }

  if (result.stderr) {
    ctx.log("\nSTDERR:");
    ctx.log(result.stderr);
  }

  return result.exitCode === 0;
}
