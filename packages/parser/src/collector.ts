/**
 * Failure Collector: merges parser output into one prioritized FailureSet.
 *
 * Test failures, when any exist, fully replace build failures. A failing
 * test is more specific than the compile error that usually accompanies it,
 * and build failures only matter when no test got to run.
 */

import { findFailuresInBuildLogs } from "./parsers/ninja.js";
import type {
  BuildLogDocument,
  FailureCollection,
  FailureGroup,
  FailureRecord,
  LoadedLogs,
  TestResultDocument,
} from "./types.js";
import {
  createFailureRecord,
  FailureSources,
  isFailingCase,
  testCaseId,
} from "./types.js";

/** Group name used for build failures */
export const BUILD_FAILURES_GROUP = "Build";

/**
 * Failing test cases grouped by suite name.
 * Suites keep file order; a suite name seen again later appends to its
 * first group. Suites without failures produce no group.
 */
export const getTestFailures = (
  testResults: readonly TestResultDocument[]
): FailureGroup[] => {
  const groups = new Map<string, FailureRecord[]>();

  for (const document of testResults) {
    for (const suite of document.suites) {
      for (const testCase of suite.cases) {
        if (!isFailingCase(testCase)) {
          continue;
        }
        let failures = groups.get(suite.name);
        if (!failures) {
          failures = [];
          groups.set(suite.name, failures);
        }
        failures.push(createFailureRecord(testCaseId(testCase), testCase.message));
      }
    }
  }

  return [...groups].map(([name, failures]) => ({ name, failures }));
};

/**
 * Collect the failures to report from parsed logs.
 */
export const collectFailures = (logs: LoadedLogs): FailureCollection => {
  const testGroups = getTestFailures(logs.testResults);
  if (testGroups.length > 0) {
    return {
      source: FailureSources.Test,
      groups: testGroups,
      failures: testGroups.flatMap((g) => g.failures),
    };
  }

  return collectBuildFailures(logs.buildLogs);
};

/**
 * Collect only the build failures. Used when test results are known to be
 * clean, e.g. a run where every test passed but the build still failed.
 */
export const collectBuildFailures = (
  buildLogs: readonly BuildLogDocument[]
): FailureCollection => {
  const failures = findFailuresInBuildLogs(buildLogs);
  if (failures.length === 0) {
    return { source: FailureSources.None, groups: [], failures: [] };
  }
  return {
    source: FailureSources.Build,
    groups: [{ name: BUILD_FAILURES_GROUP, failures }],
    failures,
  };
};
