/**
 * @premerge/report
 *
 * Markdown rendering of CI failures and platform identification.
 */

// biome-ignore-all lint/performance/noBarrelFile: This is the package's public API

export type {
  ExplanationEntry,
  ExplanationList,
  PlatformInfo,
  PlatformTag,
  ReportInput,
} from "./types.js";

export {
  ALREADY_FAILING_SUFFIX,
  fenceFor,
  formatFailureDetails,
  indexExplanations,
} from "./format.js";
export type { TestStats } from "./generator.js";
export {
  DEFAULT_SIZE_LIMIT,
  FAILED_TESTS_HEADING,
  generateReport,
  NO_TESTS_RAN,
  renderTestReport,
  SEE_BUILD_FILE,
  SUCCESS_MESSAGE,
  summarizeTests,
  UNRELATED_FAILURES,
} from "./generator.js";
export {
  computePlatformTag,
  computePlatformTitle,
  detectPlatform,
  normalizeSystemName,
} from "./platform.js";
