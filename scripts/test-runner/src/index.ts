// ============================================================================
// Storefront Browser Test Runner
// ============================================================================
//
// Wraps the Selenium/pytest browser suites with a small CLI: one test
// category per run, browser and reporting modifiers, optional coverage pass.
//
// USAGE:
//   npm run test:browser                         - Run all tests
//   npm run test:browser -- --smoke              - Smoke tests only
//   npm run test:browser -- --e2e --headless     - Headless end-to-end tests
//   npm run test:browser -- --coverage           - All tests plus coverage
//
// ============================================================================

export * from "./types";
export * from "./cli";
export * from "./categories";
export * from "./coverage";
export * from "./environment";
export * from "./executor";
export { main, createDefaultContext, EXIT_SUCCESS, EXIT_FAILURE, EXIT_USAGE } from "./run";
