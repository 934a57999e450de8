/**
 * Report Generator: renders collected failures as a Markdown report.
 *
 * `generateReport` produces the pull request comment body; a successful run
 * is always acknowledged with the fixed success message. `renderTestReport`
 * produces the full report (test counts included) and is also what the
 * CI step summary shows.
 */

import {
  collectBuildFailures,
  collectFailures,
  type FailureCollection,
  type TestResultDocument,
} from "@premerge/parser";
import {
  formatFailureDetails,
  indexExplanations,
  pluralTests,
} from "./format.js";
import type { ExplanationEntry, ReportInput } from "./types.js";

// ============================================================================
// Constants
// ============================================================================

export const SUCCESS_MESSAGE =
  ":white_check_mark: With the latest revision this PR passed the premerge checks.";

export const SEE_BUILD_FILE =
  "Download the build's log file to see the details.";

export const UNRELATED_FAILURES =
  "If these failures are unrelated to your changes (for example tests are " +
  "broken or flaky at HEAD), please open an issue and add the " +
  "`infrastructure` label.";

export const NO_TESTS_RAN =
  "The build succeeded and no tests ran. This is expected in some build configurations.";

export const FAILED_TESTS_HEADING = "## Failed Tests";

/** Default maximum report size: 1 MiB */
export const DEFAULT_SIZE_LIMIT = 1024 * 1024;

// ============================================================================
// Test Statistics
// ============================================================================

export interface TestStats {
  readonly run: number;
  readonly skipped: number;
  readonly failed: number;
}

/**
 * Sum the suite counters of every document. Errored tests count as failed.
 */
export const summarizeTests = (
  testResults: readonly TestResultDocument[]
): TestStats => {
  let run = 0;
  let skipped = 0;
  let failed = 0;
  for (const document of testResults) {
    for (const suite of document.suites) {
      run += suite.tests;
      skipped += suite.skipped;
      failed += suite.failures + suite.errors;
    }
  }
  return { run, skipped, failed };
};

const summarySection = ({ run, skipped, failed }: TestStats): string[] => {
  const lines: string[] = [];
  const passed = run - skipped - failed;
  if (passed > 0) {
    lines.push(`* ${passed} ${pluralTests(passed)} passed`);
  }
  if (skipped > 0) {
    lines.push(`* ${skipped} ${pluralTests(skipped)} skipped`);
  }
  if (failed > 0) {
    lines.push(`* ${failed} ${pluralTests(failed)} failed`);
  }
  return lines;
};

// ============================================================================
// Sections
// ============================================================================

const failedTestsSection = (
  collection: FailureCollection,
  explanations: ReadonlyMap<string, ExplanationEntry>
): string[] => {
  const section = [
    "",
    FAILED_TESTS_HEADING,
    "(click on a test name to see its output)",
  ];
  for (const group of collection.groups) {
    section.push("", `### ${group.name}`);
    for (const failure of group.failures) {
      section.push(...formatFailureDetails(failure, explanations));
    }
  }
  return section;
};

const buildFailuresSection = (
  intro: string,
  collection: FailureCollection,
  explanations: ReadonlyMap<string, ExplanationEntry>
): string[] => {
  const section = [intro, ""];
  for (const failure of collection.failures) {
    section.push(...formatFailureDetails(failure, explanations));
  }
  return section;
};

const tooLarge = (what: string): string =>
  `${what} too large to report. ${SEE_BUILD_FILE}`;

// ============================================================================
// Rendering
// ============================================================================

/**
 * Report body when no test ran.
 */
const renderWithoutTests = (
  input: ReportInput,
  explanations: ReadonlyMap<string, ExplanationEntry>,
  listFailures: boolean
): string[] => {
  if (input.returnCode === 0) {
    return [NO_TESTS_RAN];
  }

  const build = collectBuildFailures(input.buildLogs);
  if (build.failures.length === 0) {
    return [
      "The build failed before running any tests. Detailed information " +
        "about the build failure could not be automatically obtained.",
      "",
      SEE_BUILD_FILE,
      "",
      UNRELATED_FAILURES,
    ];
  }

  if (!listFailures) {
    return [
      `The build failed before running any tests. ${tooLarge("Failed build actions and their output was")}`,
      "",
      UNRELATED_FAILURES,
    ];
  }

  return [
    ...buildFailuresSection(
      "The build failed before running any tests. Click on a failure below to see the details.",
      build,
      explanations
    ),
    "",
    UNRELATED_FAILURES,
  ];
};

/**
 * Report body when tests ran.
 */
const renderWithTests = (
  input: ReportInput,
  stats: TestStats,
  collection: FailureCollection,
  explanations: ReadonlyMap<string, ExplanationEntry>,
  listFailures: boolean
): string[] => {
  const lines = summarySection(stats);
  const testsFailed = collection.source === "test";

  if (!listFailures) {
    lines.push(
      "",
      testsFailed
        ? tooLarge("Failed tests and their output was")
        : `All tests passed but another part of the build **failed**. ${tooLarge("Failed build actions and their output was")}`
    );
  } else if (testsFailed) {
    lines.push(...failedTestsSection(collection, explanations));
  } else if (input.returnCode !== 0) {
    const build = collectBuildFailures(input.buildLogs);
    if (build.failures.length === 0) {
      lines.push(
        "",
        "All tests passed but another part of the build **failed**. " +
          "Information about the build failure could not be automatically obtained.",
        "",
        SEE_BUILD_FILE
      );
    } else {
      lines.push(
        "",
        ...buildFailuresSection(
          "All tests passed but another part of the build **failed**. Click on a failure below to see the details.",
          build,
          explanations
        )
      );
    }
  }

  if (testsFailed || input.returnCode !== 0) {
    lines.push("", UNRELATED_FAILURES);
  }
  return lines;
};

const render = (input: ReportInput, listFailures: boolean): string => {
  const explanations = indexExplanations(input.explanations);
  const stats = summarizeTests(input.testResults);
  const collection = collectFailures(input);
  const testsRan = stats.run > 0 || collection.source === "test";

  const body = testsRan
    ? renderWithTests(input, stats, collection, explanations, listFailures)
    : renderWithoutTests(input, explanations, listFailures);

  return [`# ${input.title}`, "", ...body].join("\n");
};

/**
 * Render the full test report.
 * When the report exceeds the size limit it is rendered again without the
 * failure output.
 */
export const renderTestReport = (input: ReportInput): string => {
  const report = render(input, true);
  const limit = input.sizeLimit ?? DEFAULT_SIZE_LIMIT;
  if (Buffer.byteLength(report, "utf-8") > limit) {
    return render(input, false);
  }
  return report;
};

/**
 * Render the status comment body for a run.
 * A successful run is acknowledged with SUCCESS_MESSAGE whatever the logs
 * contain.
 */
export const generateReport = (input: ReportInput): string => {
  if (input.returnCode === 0) {
    return SUCCESS_MESSAGE;
  }
  return renderTestReport(input);
};
