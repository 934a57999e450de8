/**
 * Explain command - prepares the platform's status comment for a PR
 *
 * Collects failures, asks the advisor which of them already fail at the
 * base commit, renders the report and writes the upsert instruction that
 * `premerge publish` carries out.
 */

import { writeFile } from "node:fs/promises";
import { detectPlatform } from "@premerge/report";
import { defineCommand } from "citty";
import { parseReturnCode, remainingPositionals } from "../lib/args.js";
import { loadConfig, requireCommentTarget } from "../lib/config.js";
import { exitWithError } from "../lib/errors.js";
import { runExplainPipeline } from "../pipeline.js";
import { createAdvisor } from "../services/advisor-client.js";
import { serializeInstructions } from "../services/comment-reconciler.js";
import { createGitHubService } from "../services/github.js";

export const DEFAULT_INSTRUCTION_FILE = "comments";

export const explainCommand = defineCommand({
  meta: {
    name: "explain",
    description: "Write the status comment instruction for a pull request",
  },
  args: {
    commitSha: {
      type: "positional",
      description: "Base commit the change is tested against",
      required: true,
    },
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
    output: {
      type: "string",
      description: "Instruction file to write",
      default: DEFAULT_INSTRUCTION_FILE,
    },
    pr: {
      type: "string",
      description: "Pull request number (default: $GITHUB_PR_NUMBER)",
    },
    repo: {
      type: "string",
      description: "owner/repo (default: $GITHUB_REPOSITORY)",
    },
    token: {
      type: "string",
      description: "GitHub token (default: $GITHUB_TOKEN)",
    },
    advisor: {
      type: "string",
      description: "Advisor explain URL (default: $PREMERGE_ADVISOR_URL)",
    },
  },
  run: async ({ args }) => {
    try {
      const returnCode = parseReturnCode(args.returnCode);
      const config = loadConfig(process.cwd(), {
        prNumber: args.pr,
        repository: args.repo,
        githubToken: args.token,
        advisorUrl: args.advisor,
      });
      const target = requireCommentTarget(config, args.commitSha);

      const { instruction } = await runExplainPipeline({
        commitSha: target.commitSha,
        returnCode,
        logPaths: remainingPositionals(args._, 2),
        platform: detectPlatform(),
        issue: target,
        advisor: createAdvisor(config.advisorUrl, config.advisorTimeoutMs),
        store: createGitHubService({ token: target.token }),
        sizeLimit: config.sizeLimit,
        emit: (upsert) =>
          writeFile(args.output, serializeInstructions([upsert]), "utf-8"),
      });

      const action =
        instruction.id === undefined
          ? "create a comment"
          : `update comment ${instruction.id}`;
      console.log(`[premerge] wrote instruction to ${action} to ${args.output}`);
    } catch (error) {
      exitWithError(error);
    }
  },
});
