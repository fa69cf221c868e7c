// ============================================================================
// Browser Test Runner - Shared Types
// ============================================================================

export const BROWSERS = ["chrome", "firefox"] as const;
export type Browser = (typeof BROWSERS)[number];

export type TestCategory = "smoke" | "integration" | "e2e" | "regression" | "all";

/** Category flags exactly as given on the command line; several may be set. */
export interface CategoryFlags {
  smoke: boolean;
  integration: boolean;
  e2e: boolean;
  regression: boolean;
  all: boolean;
}

export interface CommandOptions {
  browser: Browser;
  headless: boolean;
  parallel: boolean;
  html: boolean;
  coverage: boolean;
}

export interface RunConfiguration extends CommandOptions {
  categories: CategoryFlags;
  // Accepted for compatibility; neither changes a command line.
  slow: boolean;
  verbose: boolean;
}

export interface TestSuite {
  target: string;
  reportName: string;
  description: string;
}

// ============================================================================
// Process Execution
// ============================================================================

export interface ExecuteOptions {
  /** Stream output to this terminal instead of capturing it. */
  inheritOutput?: boolean;
}

export interface ExecutionResult {
  /** null when the process was killed by a signal or never started. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  error?: Error;
}

export interface CommandExecutor {
  run(command: readonly string[], options?: ExecuteOptions): ExecutionResult;
}

export interface RunnerContext {
  cwd: string;
  python: string;
  executor: CommandExecutor;
  log: (message: string) => void;
  error: (message: string) => void;
}
