/**
 * Upload command - shares a run's failures with the advisory service
 *
 * Never fails the CI job: unreachable endpoints are logged and skipped.
 */

import { loadFailureSet } from "@premerge/parser";
import { computePlatformTag, detectPlatform } from "@premerge/report";
import { defineCommand } from "citty";
import { parseReturnCode, remainingPositionals } from "../lib/args.js";
import { isCommitSha, loadConfig } from "../lib/config.js";
import { exitWithError, MissingArgumentError } from "../lib/errors.js";
import {
  buildUploadRequest,
  shouldUpload,
  uploadFailures,
} from "../services/advisor-client.js";

export const uploadCommand = defineCommand({
  meta: {
    name: "upload",
    description: "Upload the failures of a run to the advisory service",
  },
  args: {
    commitSha: {
      type: "positional",
      description: "Base commit the change is tested against",
      required: true,
    },
    logs: {
      type: "positional",
      description: "JUnit XML files and Ninja logs",
      required: false,
    },
    "run-id": {
      type: "string",
      description: "CI run number (default: $GITHUB_RUN_NUMBER or $BUILDBOT_BUILDNUMBER)",
    },
    "return-code": {
      type: "string",
      description: "Exit code of the build; nothing is uploaded for 0",
      default: "1",
    },
  },
  run: async ({ args }) => {
    try {
      if (!isCommitSha(args.commitSha)) {
        throw new MissingArgumentError(
          "commitSha",
          `invalid commit sha: "${args.commitSha}"`
        );
      }
      const returnCode = parseReturnCode(args["return-code"]);
      const platform = detectPlatform();

      if (!shouldUpload(returnCode, platform.machine)) {
        console.log(
          returnCode === 0
            ? "[advisor] build succeeded, nothing to upload"
            : `[advisor] skipping upload on ${platform.machine}`
        );
        return;
      }

      const config = loadConfig(process.cwd());
      const runId = args["run-id"] || config.runId;
      if (!runId) {
        throw new MissingArgumentError(
          "runId",
          "missing run id (set GITHUB_RUN_NUMBER or pass --run-id)"
        );
      }
      if (config.uploadUrls.length === 0) {
        console.error("warning: no upload endpoints configured");
        return;
      }

      const { failures } = await loadFailureSet(remainingPositionals(args._, 1));
      await uploadFailures(
        config.uploadUrls,
        buildUploadRequest({
          commitSha: args.commitSha,
          runId,
          platform: computePlatformTag(platform),
          failures,
          isGitHubActions: config.isGitHubActions,
        }),
        config.advisorTimeoutMs
      );
    } catch (error) {
      exitWithError(error);
    }
  },
});
