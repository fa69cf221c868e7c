import { COVERAGE_HTML_DIR, COVERAGE_SOURCES, TEST_SUITES } from "./categories";
import { runCommand } from "./executor";
import type { RunnerContext } from "./types";

export function buildCoverageRunCommand(python: string): string[] {
  return [
    python,
    "-m",
    "coverage",
    "run",
    `--source=${COVERAGE_SOURCES.join(",")}`,
    "-m",
    "pytest",
    TEST_SUITES.all.target,
  ];
}

export function buildCoverageHtmlCommand(python: string): string[] {
  return [python, "-m", "coverage", "html", "-d", COVERAGE_HTML_DIR];
}

/** Full suite under coverage, then the HTML report if that passed. */
export function runCoverageReport(ctx: RunnerContext): boolean {
  const success = runCommand(
    buildCoverageRunCommand(ctx.python),
    "Coverage Analysis",
    ctx
  );
  if (!success) {
    return false;
  }

  const htmlSuccess = runCommand(
    buildCoverageHtmlCommand(ctx.python),
    "Coverage HTML Report",
    ctx
  );
  if (htmlSuccess) {
    ctx.log(`\nCoverage report generated in ${COVERAGE_HTML_DIR}/`);
  }
  return htmlSuccess;
}
