import type { BuildLogDocument, TestResultDocument } from "@premerge/parser";

/**
 * Advisory-service verdict for one failure, associated by name.
 * `explained` means the failure is known to fail at the base commit.
 */
export interface ExplanationEntry {
  readonly name: string;
  readonly explained: boolean;
  readonly reason: string | null;
}

/**
 * One entry per failure in request order; null where the advisor had
 * nothing to say.
 */
export type ExplanationList = readonly (ExplanationEntry | null)[];

export interface ReportInput {
  /** Header text, usually the platform title */
  readonly title: string;
  readonly returnCode: number;
  readonly testResults: readonly TestResultDocument[];
  readonly buildLogs: readonly BuildLogDocument[];
  readonly explanations?: ExplanationList;
  /** Maximum UTF-8 size of the report before failure output is dropped */
  readonly sizeLimit?: number;
}

/**
 * Description of the machine a CI run executed on.
 */
export interface PlatformInfo {
  /** System name as reported by the OS, e.g. "Linux", "Darwin", "Windows" */
  readonly system: string;
  /** Machine architecture, e.g. "x86_64", "arm64", "AMD64" */
  readonly machine: string;
}

/**
 * Normalized `{os}-{arch}` identifier, lower case.
 */
export type PlatformTag = string & { readonly __brand: "PlatformTag" };
