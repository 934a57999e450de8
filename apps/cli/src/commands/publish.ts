/**
 * Publish command - carries out the instructions written by `explain`
 */

import { readFile } from "node:fs/promises";
import { defineCommand } from "citty";
import { loadConfig, requireIssueTarget } from "../lib/config.js";
import { exitWithError } from "../lib/errors.js";
import {
  parseInstructions,
  publishUpsert,
} from "../services/comment-reconciler.js";
import { createGitHubService } from "../services/github.js";
import { DEFAULT_INSTRUCTION_FILE } from "./explain.js";

export const publishCommand = defineCommand({
  meta: {
    name: "publish",
    description: "Create or update the status comment from an instruction file",
  },
  args: {
    file: {
      type: "positional",
      description: `Instruction file (default: ${DEFAULT_INSTRUCTION_FILE})`,
      required: false,
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
  },
  run: async ({ args }) => {
    try {
      const config = loadConfig(process.cwd(), {
        prNumber: args.pr,
        repository: args.repo,
        githubToken: args.token,
      });
      const target = requireIssueTarget(config);
      const instructions = parseInstructions(
        await readFile(args.file || DEFAULT_INSTRUCTION_FILE, "utf-8")
      );

      const store = createGitHubService({ token: target.token });
      for (const instruction of instructions) {
        await publishUpsert(store, target, instruction);
      }
    } catch (error) {
      exitWithError(error);
    }
  },
});
