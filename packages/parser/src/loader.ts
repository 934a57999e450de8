/**
 * Log loading: reads candidate paths from disk and routes each file through
 * the parser registry.
 *
 * Missing, unreadable, unrecognized and malformed files are skipped. A CI
 * run that failed before writing any logs still produces an (empty) result.
 */

import { readFile } from "node:fs/promises";
import type { LogFile, ParseResult } from "./parser-types.js";
import { describeUnrecognized, type ParserRegistry } from "./registry.js";
import type {
  BuildLogDocument,
  LoadedLogs,
  TestResultDocument,
} from "./types.js";

// ============================================================================
// Skip Reporting
// ============================================================================

/**
 * SkippedFileReporter is called once for every candidate path that did not
 * contribute to the result. The CLI uses it to log a notice.
 */
export type SkippedFileReporter = (path: string, reason: string) => void;

const defaultSkippedFileReporter: SkippedFileReporter = (path, reason) => {
  console.error(`[parser] skipping ${path}: ${reason}`);
};

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
};

const describeReadError = (error: unknown): string => {
  switch (errorCode(error)) {
    case "ENOENT":
      return "file not found";
    case "EISDIR":
      return "path is a directory";
    case "EACCES":
      return "permission denied";
    default:
      return error instanceof Error ? error.message : String(error);
  }
};

// ============================================================================
// Loader
// ============================================================================

export interface LoadLogsOptions {
  /** Called for every skipped path (default: logs to stderr) */
  readonly onSkip?: SkippedFileReporter;
}

const readLogFile = async (
  path: string,
  onSkip: SkippedFileReporter
): Promise<LogFile | undefined> => {
  try {
    return { path, content: await readFile(path, "utf-8") };
  } catch (error) {
    onSkip(path, describeReadError(error));
    return undefined;
  }
};

/**
 * Load and parse every candidate log path, in order.
 * Test result documents and build logs keep the order of `paths`.
 */
export const loadLogs = async (
  paths: readonly string[],
  registry: ParserRegistry,
  options: LoadLogsOptions = {}
): Promise<LoadedLogs> => {
  const onSkip = options.onSkip ?? defaultSkippedFileReporter;
  const testResults: TestResultDocument[] = [];
  const buildLogs: BuildLogDocument[] = [];

  for (const path of paths) {
    const file = await readLogFile(path, onSkip);
    if (!file) {
      continue;
    }

    const parser = registry.findParser(file);
    if (!parser) {
      onSkip(path, describeUnrecognized(file));
      continue;
    }

    let parsed: ParseResult;
    try {
      parsed = parser.parse(file);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      onSkip(path, `${parser.id} parse failed: ${reason}`);
      continue;
    }

    if (!parsed) {
      onSkip(path, `${parser.id} found no content`);
      continue;
    }

    switch (parsed.kind) {
      case "test-results":
        testResults.push(parsed.document);
        break;
      case "build-log":
        buildLogs.push(parsed.document);
        break;
    }
  }

  return { testResults, buildLogs };
};
