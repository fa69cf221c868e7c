import type {
  CategoryFlags,
  CommandOptions,
  RunnerContext,
  TestCategory,
  TestSuite,
} from "./types";
import { runCommand } from "./executor";

/** Specific categories in the order they win when several are requested. */
export const CATEGORY_PRECEDENCE = [
  "smoke",
  "integration",
  "e2e",
  "regression",
] as const;

export const TEST_SUITES: Record<TestCategory, TestSuite> = {
  smoke: {
    target: "tests/test_smoke.py",
    reportName: "smoke",
    description: "Smoke Tests",
  },
  integration: {
    target: "tests/test_integration.py",
    reportName: "integration",
    description: "Integration Tests",
  },
  e2e: {
    target: "tests/test_e2e.py",
    reportName: "e2e",
    description: "End-to-End Tests",
  },
  regression: {
    target: "tests/test_regression.py",
    reportName: "regression",
    description: "Regression Tests",
  },
  all: {
    target: "tests/",
    reportName: "all_tests",
    description: "All Tests",
  },
};

export const COVERAGE_SOURCES = ["shop", "accounts"] as const;
export const COVERAGE_HTML_DIR = "coverage/html";

export function selectCategory(flags: CategoryFlags): TestCategory {
  return CATEGORY_PRECEDENCE.find((category) => flags[category]) ?? "all";
}

export function buildTestCommand(
  category: TestCategory,
  options: CommandOptions,
  python: string
): string[] {
  const suite = TEST_SUITES[category];
  const command = [
    python,
    "-m",
    "pytest",
    suite.target,
    "-v",
    `--browser=${options.browser}`,
  ];

  if (options.headless) {
    command.push("--headless");
  }

  if (options.parallel) {
    command.push("-n", "auto");
  }

  if (options.html) {
    command.push(
      `--html=reports/${suite.reportName}_report.html`,
      "--self-contained-html"
    );
  }

  // Inline coverage is only collected for the full suite
  if (options.coverage && category === "all") {
    command.push(
      ...COVERAGE_SOURCES.map((source) => `--cov=${source}`),
      `--cov-report=html:${COVERAGE_HTML_DIR}`,
      "--cov-report=term-missing"
    );
  }

  return command;
}

export type CategoryRunner = (
  options: CommandOptions,
  ctx: RunnerContext
) => boolean;

function categoryRunner(category: TestCategory): CategoryRunner {
  return (options, ctx) =>
    runCommand(
      buildTestCommand(category, options, ctx.python),
      TEST_SUITES[category].description,
      ctx
    );
}

export const runSmokeTests = categoryRunner("smoke");
export const runIntegrationTests = categoryRunner("integration");
export const runE2eTests = categoryRunner("e2e");
export const runRegressionTests = categoryRunner("regression");
export const runAllTests = categoryRunner("all");

export const CATEGORY_RUNNERS: Record<TestCategory, CategoryRunner> = {
  smoke: runSmokeTests,
  integration: runIntegrationTests,
  e2e: runE2eTests,
  regression: runRegressionTests,
  all: runAllTests,
};
