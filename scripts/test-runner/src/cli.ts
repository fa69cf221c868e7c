import { BROWSERS, type Browser, type RunConfiguration } from "./types";

export type ParseResult =
  | { kind: "run"; config: RunConfiguration }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const USAGE = `
Storefront Browser Test Runner

Runs the Selenium browser suites through pytest with the selected options.

Usage: npm run test:browser -- [options]

Test categories (first match wins: smoke, integration, e2e, regression):
  --smoke               Run smoke tests only
  --integration         Run integration tests only
  --e2e                 Run end-to-end tests only
  --regression          Run regression tests only
  --all                 Run all tests (default)

Options:
  --browser <name>      Browser to use: chrome, firefox (default: chrome)
  --headless            Run in headless mode
  --parallel            Run tests in parallel
  --coverage            Generate coverage report (all tests only)
  --html                Generate HTML report under reports/
  --slow                Include slow tests (no effect on the command line)
  --verbose             Verbose output (no effect on the command line)
  --help, -h            Show this help message

Environment Variables:
  PYTHON                Interpreter used to run pytest (default: python3)

Examples:
  npm run test:browser -- --smoke --browser chrome
  npm run test:browser -- --all --headless --parallel
  npm run test:browser -- --e2e --browser firefox --html
`;

export function defaultConfiguration(): RunConfiguration {
  return {
    categories: {
      smoke: false,
      integration: false,
      e2e: false,
      regression: false,
      all: false,
    },
    browser: "chrome",
    headless: false,
    parallel: false,
    coverage: false,
    html: false,
    slow: false,
    verbose: false,
  };
}

function parseBrowser(value: string): Browser | undefined {
  return BROWSERS.find((browser) => browser === value);
}

function browserError(value: string): ParseResult {
  return {
    kind: "error",
    message: `invalid --browser value "${value}" (choose from ${BROWSERS.join(", ")})`,
  };
}

export function parseArgs(argv: readonly string[]): ParseResult {
  const config = defaultConfiguration();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--smoke":
        config.categories.smoke = true;
        break;
      case "--integration":
        config.categories.integration = true;
        break;
      case "--e2e":
        config.categories.e2e = true;
        break;
      case "--regression":
        config.categories.regression = true;
        break;
      case "--all":
        config.categories.all = true;
        break;
      case "--headless":
        config.headless = true;
        break;
      case "--parallel":
        config.parallel = true;
        break;
      case "--coverage":
        config.coverage = true;
        break;
      case "--html":
        config.html = true;
        break;
      case "--slow":
        config.slow = true;
        break;
      case "--verbose":
        config.verbose = true;
        break;
      case "--browser": {
        const value = argv[++i];
        if (value === undefined) {
          return { kind: "error", message: "--browser requires a value" };
        }
        const browser = parseBrowser(value);
        if (!browser) {
          return browserError(value);
        }
        config.browser = browser;
        break;
      }
      case "--help":
      case "-h":
        return { kind: "help" };
      default: {
        if (arg.startsWith("--browser=")) {
          const value = arg.slice("--browser=".length);
          const browser = parseBrowser(value);
          if (!browser) {
            return browserError(value);
          }
          config.browser = browser;
          break;
        }
        return { kind: "error", message: `unrecognized argument: ${arg}` };
      }
    }
  }

  return { kind: "run", config };
}
