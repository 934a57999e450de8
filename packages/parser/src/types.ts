/**
 * Core types for failure extraction and representation.
 */

// ============================================================================
// Failure Records
// ============================================================================

/**
 * A single reportable failure: either a failing test case or a failing
 * build action.
 *
 * - Test case: `name` is `{classname}/{name}`, `message` is the captured
 *   failure text.
 * - Build action: `name` is the Ninja action after `FAILED: `, `message`
 *   is the captured tool output.
 */
export interface FailureRecord {
  readonly name: string;
  readonly message: string;
}

/**
 * Ordered failures selected for reporting. Discovery order is preserved
 * and never changed downstream.
 */
export type FailureSet = readonly FailureRecord[];

/**
 * Where a FailureSet came from. "none" means neither tests nor the build
 * log produced a failure.
 */
export type FailureSource = "test" | "build" | "none";

export const FailureSources = {
  Test: "test" as const,
  Build: "build" as const,
  None: "none" as const,
} satisfies Record<string, FailureSource>;

/**
 * Failures sharing an origin: one test suite, or the build as a whole.
 */
export interface FailureGroup {
  readonly name: string;
  readonly failures: readonly FailureRecord[];
}

/**
 * Result of the Failure Collector. Flattening `groups` in order gives
 * exactly `failures`.
 */
export interface FailureCollection {
  readonly source: FailureSource;
  readonly groups: readonly FailureGroup[];
  readonly failures: FailureSet;
}

/**
 * Create an immutable failure record.
 */
export const createFailureRecord = (
  name: string,
  message: string
): FailureRecord => Object.freeze({ name, message });

// ============================================================================
// Test Results (JUnit)
// ============================================================================

export type TestOutcome = "passed" | "failed" | "errored" | "skipped";

export interface TestCaseResult {
  readonly classname: string;
  readonly name: string;
  readonly outcome: TestOutcome;
  /** Failure or error text; empty for passed and skipped cases */
  readonly message: string;
}

export interface TestSuiteResult {
  readonly name: string;
  readonly tests: number;
  readonly failures: number;
  readonly errors: number;
  readonly skipped: number;
  readonly cases: readonly TestCaseResult[];
}

/**
 * A parsed JUnit XML document.
 */
export interface TestResultDocument {
  readonly path: string;
  readonly suites: readonly TestSuiteResult[];
}

/**
 * Identifier used for a test case in reports and advisor requests.
 */
export const testCaseId = (testCase: TestCaseResult): string =>
  `${testCase.classname}/${testCase.name}`;

/**
 * Whether a test case produces a FailureRecord.
 */
export const isFailingCase = (testCase: TestCaseResult): boolean =>
  testCase.outcome === "failed" || testCase.outcome === "errored";

// ============================================================================
// Build Logs (Ninja)
// ============================================================================

/**
 * A recognized build-tool log. Lines are trimmed of surrounding whitespace.
 */
export interface BuildLogDocument {
  readonly path: string;
  readonly lines: readonly string[];
}

// ============================================================================
// Loaded Inputs
// ============================================================================

/**
 * Everything the loader managed to read from the candidate log paths.
 */
export interface LoadedLogs {
  readonly testResults: readonly TestResultDocument[];
  readonly buildLogs: readonly BuildLogDocument[];
}
