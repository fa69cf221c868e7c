import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, main } from "./run";
import { RecordingExecutor, testContext } from "../test/recording-executor";

describe("main", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "browser-runner-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("runs the end-to-end suite with the requested browser", () => {
    const executor = new RecordingExecutor();
    const ctx = testContext(executor, workDir);

    const code = main(["--e2e", "--browser", "firefox", "--headless"], ctx);

    expect(code).toBe(EXIT_SUCCESS);
    expect(executor.commands()).toEqual([
      [
        "python3",
        "-m",
        "pytest",
        "tests/test_e2e.py",
        "-v",
        "--browser=firefox",
        "--headless",
      ],
    ]);
    expect(ctx.output.slice(-3)).toEqual([
      `\n${"=".repeat(60)}`,
      "✅ All tests passed successfully!",
      "=".repeat(60),
    ]);
  });

  it("maps a failing run to exit code 1", () => {
    const ctx = testContext(
      new RecordingExecutor(() => ({ exitCode: 1 })),
      workDir
    );

    expect(main(["--e2e"], ctx)).toBe(EXIT_FAILURE);
    expect(ctx.output).toContain("❌ Some tests failed!");
  });

  it("prepares the environment before running", () => {
    main(["--smoke"], testContext(new RecordingExecutor(), workDir));
    expect(fs.existsSync(path.join(workDir, "screenshots"))).toBe(true);
    expect(fs.existsSync(path.join(workDir, "reports"))).toBe(true);
    expect(fs.existsSync(path.join(workDir, "coverage"))).toBe(true);
  });

  it("runs everything when no category is given", () => {
    const executor = new RecordingExecutor();
    main([], testContext(executor, workDir));
    expect(executor.commands()).toEqual([
      ["python3", "-m", "pytest", "tests/", "-v", "--browser=chrome"],
    ]);
  });

  it("lets the higher-precedence category win", () => {
    const executor = new RecordingExecutor();
    main(["--regression", "--integration"], testContext(executor, workDir));
    expect(executor.commands()[0][3]).toBe("tests/test_integration.py");
  });

  it("adds the coverage pass to the full suite", () => {
    const executor = new RecordingExecutor();

    expect(main(["--coverage"], testContext(executor, workDir))).toBe(
      EXIT_SUCCESS
    );
    expect(executor.commands().map((command) => command.slice(1, 4))).toEqual([
      ["-m", "pytest", "tests/"],
      ["-m", "coverage", "run"],
      ["-m", "coverage", "html"],
    ]);
  });

  it("fails the run when only the coverage pass fails", () => {
    const executor = new RecordingExecutor((command) => ({
      exitCode: command.includes("coverage") ? 1 : 0,
    }));

    expect(main(["--all", "--coverage"], testContext(executor, workDir))).toBe(
      EXIT_FAILURE
    );
    expect(executor.calls).toHaveLength(2);
  });

  it("does not run the coverage pass for a specific category", () => {
    const executor = new RecordingExecutor();

    main(["--coverage", "--smoke"], testContext(executor, workDir));

    expect(executor.commands()).toEqual([
      ["python3", "-m", "pytest", "tests/test_smoke.py", "-v", "--browser=chrome"],
    ]);
  });

  it("notes that --slow and --verbose leave the command unchanged", () => {
    const executor = new RecordingExecutor();
    const ctx = testContext(executor, workDir);

    main(["--smoke", "--slow", "--verbose"], ctx);

    expect(ctx.output).toContain(
      "Note: --slow and --verbose do not change the test command line"
    );
    expect(executor.commands()).toEqual([
      ["python3", "-m", "pytest", "tests/test_smoke.py", "-v", "--browser=chrome"],
    ]);
  });

  it("prints usage for --help without running anything", () => {
    const executor = new RecordingExecutor();
    const ctx = testContext(executor, workDir);

    expect(main(["--help"], ctx)).toBe(EXIT_SUCCESS);
    expect(executor.calls).toEqual([]);
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it("exits with a usage error for bad arguments", () => {
    const executor = new RecordingExecutor();
    const ctx = testContext(executor, workDir);

    expect(main(["--browser", "opera"], ctx)).toBe(EXIT_USAGE);
    expect(ctx.errors).toEqual([
      'error: invalid --browser value "opera" (choose from chrome, firefox)',
    ]);
    expect(executor.calls).toEqual([]);
  });
});
