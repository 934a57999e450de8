/**
 * Ninja build log parser.
 *
 * Recognizes logs written by `ninja` (progress lines like `[12/345] ...`)
 * and extracts failing actions. The delimiting rules follow Ninja's own
 * output:
 *
 *   [3/5] Building CXX object foo.o
 *   FAILED: foo.o
 *   clang++ ... -c foo.cpp
 *   foo.cpp:1:1: error: ...
 *   [4/5] Linking ...
 *
 * A failure runs from its `FAILED:` line up to the next progress line or
 * `ninja: build stopped:` line.
 */

import { BaseLogParser, type LogFile, type ParseResult } from "../parser-types.js";
import type { BuildLogDocument, FailureRecord } from "../types.js";
import { createFailureRecord } from "../types.js";
import { splitLogLines } from "../utils.js";

// ============================================================================
// Constants
// ============================================================================

export const FAILED_PREFIX = "FAILED:";
export const BUILD_STOPPED_PREFIX = "ninja: build stopped:";
const PROGRESS_PREFIX = "[";

/** Maximum number of lines captured for a single failing action */
export const maxFailureLines = 500;

const progressLinePattern = /^\[\d+\/\d+\]/m;
const failedLinePattern = /^FAILED: /m;

// ============================================================================
// Failure Extraction
// ============================================================================

const endsFailure = (line: string): boolean =>
  line.startsWith(PROGRESS_PREFIX) || line.startsWith(BUILD_STOPPED_PREFIX);

/**
 * Extract failing actions from one Ninja log.
 *
 * `FAILED:` lines directly after `ninja: build stopped:` are the outer
 * ninja echoing a sub-ninja failure that was already reported, so they are
 * skipped.
 */
export const findNinjaFailures = (
  lines: readonly string[]
): FailureRecord[] => {
  const failures: FailureRecord[] = [];
  let index = 0;

  while (index < lines.length) {
    const line = lines[index] ?? "";
    if (!line.startsWith(FAILED_PREFIX)) {
      index++;
      continue;
    }

    const previous = index > 0 ? lines[index - 1] : undefined;
    if (previous?.startsWith(BUILD_STOPPED_PREFIX)) {
      index++;
      continue;
    }

    const action = line.slice(FAILED_PREFIX.length).trim();
    const captured: string[] = [line];
    index++;

    while (index < lines.length && captured.length < maxFailureLines) {
      const next = lines[index] ?? "";
      if (endsFailure(next)) {
        break;
      }
      captured.push(next);
      index++;
    }

    failures.push(createFailureRecord(action, captured.join("\n")));
  }

  return failures;
};

/**
 * Extract failing actions from every log, in log order.
 */
export const findFailuresInBuildLogs = (
  logs: readonly BuildLogDocument[]
): FailureRecord[] => logs.flatMap((log) => findNinjaFailures(log.lines));

// ============================================================================
// Parser
// ============================================================================

export class NinjaParser extends BaseLogParser {
  readonly id = "ninja";
  readonly priority = 60;
  protected readonly extensions = [".log"] as const;

  canParse(file: LogFile): number {
    if (this.hasKnownExtension(file)) {
      return 0.8;
    }
    if (
      progressLinePattern.test(file.content) ||
      failedLinePattern.test(file.content)
    ) {
      return 0.5;
    }
    return 0;
  }

  parse(file: LogFile): ParseResult {
    return {
      kind: "build-log",
      document: { path: file.path, lines: splitLogLines(file.content) },
    };
  }
}

export const createNinjaParser = (): NinjaParser => new NinjaParser();
