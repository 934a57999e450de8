/**
 * Report command - prints the test report of a CI run
 *
 * The output is meant for the CI step summary:
 *   premerge report $? build/test-results.*.xml build/ninja*.log >> $GITHUB_STEP_SUMMARY
 */

import { loadLogsFromFiles } from "@premerge/parser";
import {
  computePlatformTitle,
  detectPlatform,
  renderTestReport,
} from "@premerge/report";
import { defineCommand } from "citty";
import { parseReturnCode, remainingPositionals } from "../lib/args.js";
import { loadConfig } from "../lib/config.js";
import { exitWithError } from "../lib/errors.js";

export const reportCommand = defineCommand({
  meta: {
    name: "report",
    description: "Print a Markdown report of the build and test results",
  },
  args: {
    returnCode: {
      type: "positional",
      description: "Exit code of the build",
      required: true,
    },
    logs: {
      type: "positional",
      description: "JUnit XML files and Ninja logs",
      required: false,
    },
  },
  run: async ({ args }) => {
    try {
      const returnCode = parseReturnCode(args.returnCode);
      const config = loadConfig(process.cwd());
      const logs = await loadLogsFromFiles(remainingPositionals(args._, 1));

      console.log(
        renderTestReport({
          title: computePlatformTitle(detectPlatform()),
          returnCode,
          testResults: logs.testResults,
          buildLogs: logs.buildLogs,
          sizeLimit: config.sizeLimit,
        })
      );
    } catch (error) {
      exitWithError(error);
    }
  },
});
