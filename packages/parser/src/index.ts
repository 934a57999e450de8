/**
 * @premerge/parser - CI failure extraction library
 *
 * Architecture:
 * - parsers/    : Log FORMAT parsers (JUnit XML, Ninja)
 * - registry    : Confidence-based parser selection
 * - loader      : Reads candidate paths, skips missing or corrupt files
 * - collector   : Test-over-build fallback producing the FailureSet
 */

// ============================================================================
// Core Types
// ============================================================================

export type { LoadLogsOptions, SkippedFileReporter } from "./loader.js";
export type {
  LogFile,
  LogSourceParser,
  ParsedLogSource,
  ParseResult,
} from "./parser-types.js";
export type {
  BuildLogDocument,
  FailureCollection,
  FailureGroup,
  FailureRecord,
  FailureSet,
  FailureSource,
  LoadedLogs,
  TestCaseResult,
  TestOutcome,
  TestResultDocument,
  TestSuiteResult,
} from "./types.js";

// ============================================================================
// Core Utilities
// ============================================================================

export {
  BUILD_FAILURES_GROUP,
  collectBuildFailures,
  collectFailures,
  getTestFailures,
} from "./collector.js";
export { loadLogs } from "./loader.js";
export { BaseLogParser, extensionOf } from "./parser-types.js";
export {
  BUILD_STOPPED_PREFIX,
  createJUnitParser,
  createNinjaParser,
  FAILED_PREFIX,
  findFailuresInBuildLogs,
  findNinjaFailures,
  JUnitParser,
  maxFailureLines,
  NinjaParser,
} from "./parsers/index.js";
export { createRegistry, ParserRegistry } from "./registry.js";
export {
  createFailureRecord,
  FailureSources,
  isFailingCase,
  testCaseId,
} from "./types.js";
export { isRecord, safeParseInt, splitLogLines, stripAnsi } from "./utils.js";

// ============================================================================
// Default Registry Factory
// ============================================================================

import { collectFailures } from "./collector.js";
import type { LoadLogsOptions } from "./loader.js";
import { loadLogs } from "./loader.js";
import { createJUnitParser, createNinjaParser } from "./parsers/index.js";
import { createRegistry, type ParserRegistry } from "./registry.js";
import type { FailureCollection, LoadedLogs } from "./types.js";

/**
 * Create a parser registry with all default parsers registered.
 *
 * Priority order (highest to lowest):
 * - JUnit XML (90)
 * - Ninja (60)
 */
export const createDefaultRegistry = (): ParserRegistry => {
  const registry = createRegistry();
  registry.register(createJUnitParser());
  registry.register(createNinjaParser());
  return registry;
};

/**
 * Load logs with the default registry.
 *
 * @example
 * ```typescript
 * import { collectFailures, loadLogsFromFiles } from "@premerge/parser";
 *
 * const logs = await loadLogsFromFiles(["test-results.xml", "ninja.log"]);
 * const { failures } = collectFailures(logs);
 * ```
 */
export const loadLogsFromFiles = (
  paths: readonly string[],
  options?: LoadLogsOptions
): Promise<LoadedLogs> => loadLogs(paths, createDefaultRegistry(), options);

/**
 * Load logs with the default registry and collect the failures to report.
 */
export const loadFailureSet = async (
  paths: readonly string[],
  options?: LoadLogsOptions
): Promise<FailureCollection> =>
  collectFailures(await loadLogsFromFiles(paths, options));
