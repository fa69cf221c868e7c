import {
  buildTestCommand,
  CATEGORY_RUNNERS,
  selectCategory,
} from "./categories";
import type { CategoryFlags, CommandOptions } from "./types";
import { RecordingExecutor, testContext } from "../test/recording-executor";

const noFlags: CategoryFlags = {
  smoke: false,
  integration: false,
  e2e: false,
  regression: false,
  all: false,
};

const baseOptions: CommandOptions = {
  browser: "chrome",
  headless: false,
  parallel: false,
  html: false,
  coverage: false,
};

describe("selectCategory", () => {
  it("defaults to all tests", () => {
    expect(selectCategory(noFlags)).toBe("all");
    expect(selectCategory({ ...noFlags, all: true })).toBe("all");
  });

  it("selects a single requested category", () => {
    expect(selectCategory({ ...noFlags, regression: true })).toBe("regression");
  });

  it("applies precedence when several categories are requested", () => {
    expect(
      selectCategory({ ...noFlags, smoke: true, integration: true, e2e: true })
    ).toBe("smoke");
    expect(selectCategory({ ...noFlags, integration: true, e2e: true })).toBe(
      "integration"
    );
    expect(
      selectCategory({ ...noFlags, e2e: true, regression: true, all: true })
    ).toBe("e2e");
  });
});

describe("buildTestCommand", () => {
  it("builds the base invocation", () => {
    expect(buildTestCommand("smoke", baseOptions, "python3")).toEqual([
      "python3",
      "-m",
      "pytest",
      "tests/test_smoke.py",
      "-v",
      "--browser=chrome",
    ]);
  });

  it("targets each category", () => {
    expect(buildTestCommand("integration", baseOptions, "py")[3]).toBe(
      "tests/test_integration.py"
    );
    expect(buildTestCommand("e2e", baseOptions, "py")[3]).toBe(
      "tests/test_e2e.py"
    );
    expect(buildTestCommand("regression", baseOptions, "py")[3]).toBe(
      "tests/test_regression.py"
    );
    expect(buildTestCommand("all", baseOptions, "py")[3]).toBe("tests/");
  });

  it("appends headless, parallel and html tokens", () => {
    expect(
      buildTestCommand(
        "regression",
        {
          ...baseOptions,
          browser: "firefox",
          headless: true,
          parallel: true,
          html: true,
        },
        "python3"
      )
    ).toEqual([
      "python3",
      "-m",
      "pytest",
      "tests/test_regression.py",
      "-v",
      "--browser=firefox",
      "--headless",
      "-n",
      "auto",
      "--html=reports/regression_report.html",
      "--self-contained-html",
    ]);
  });

  it("collects coverage inline for the full suite only", () => {
    const options = { ...baseOptions, coverage: true };
    expect(buildTestCommand("all", options, "python3").slice(6)).toEqual([
      "--cov=shop",
      "--cov=accounts",
      "--cov-report=html:coverage/html",
      "--cov-report=term-missing",
    ]);
    expect(buildTestCommand("smoke", options, "python3")).toHaveLength(6);
  });

  it("names the html report after the full suite", () => {
    expect(
      buildTestCommand("all", { ...baseOptions, html: true }, "python3")
    ).toContain("--html=reports/all_tests_report.html");
  });
});

describe("category runners", () => {
  it("run the built command under the suite description", () => {
    const executor = new RecordingExecutor();
    const ctx = testContext(executor, "/unused");

    expect(CATEGORY_RUNNERS.integration(baseOptions, ctx)).toBe(true);

    expect(executor.commands()).toEqual([
      ["python3", "-m", "pytest", "tests/test_integration.py", "-v", "--browser=chrome"],
    ]);
    expect(ctx.output).toContain("Running: Integration Tests");
  });
});
