/**
 * Explain pipeline: from a finished CI run to the upsert instruction for
 * the platform's status comment.
 *
 *   START -> SUCCESS_BODY                                          (exit 0)
 *   START -> COLLECT_FAILURES -> QUERY_ADVISOR -> RENDER_REPORT    (exit != 0)
 *         -> LOOKUP_EXISTING_COMMENT -> EMIT_UPSERT -> END
 *
 * Strictly sequential. The advisor is never queried for a successful run;
 * lookup failures propagate.
 */

import {
  collectFailures,
  type LoadedLogs,
  type LoadLogsOptions,
  loadLogsFromFiles,
} from "@premerge/parser";
import {
  computePlatformTag,
  computePlatformTitle,
  generateReport,
  type PlatformInfo,
  SUCCESS_MESSAGE,
} from "@premerge/report";
import type { Advisor, ExplanationResult } from "./services/advisor-client.js";
import {
  reconcileStatusComment,
  type UpsertInstruction,
} from "./services/comment-reconciler.js";
import type { CommentStore, IssueRef } from "./services/github.js";

export type PipelineState =
  | "start"
  | "success-body"
  | "collect-failures"
  | "query-advisor"
  | "render-report"
  | "lookup-existing-comment"
  | "emit-upsert"
  | "end";

export type LogLoader = (
  paths: readonly string[],
  options?: LoadLogsOptions
) => Promise<LoadedLogs>;

export interface ExplainPipelineOptions {
  readonly commitSha: string;
  readonly returnCode: number;
  readonly logPaths: readonly string[];
  readonly platform: PlatformInfo;
  readonly issue: IssueRef;
  readonly advisor: Advisor;
  readonly store: CommentStore;
  readonly sizeLimit?: number;
  /** Writes the instruction for the publish step */
  readonly emit: (instruction: UpsertInstruction) => Promise<void>;
  /** Defaults to the parser package's loader with the default registry */
  readonly loadLogs?: LogLoader;
}

export interface ExplainPipelineResult {
  readonly instruction: UpsertInstruction;
  /** States visited, in order */
  readonly states: readonly PipelineState[];
  /** Null for a successful run, where the advisor is not queried */
  readonly advisorResult: ExplanationResult | null;
}

const renderBody = async (
  options: ExplainPipelineOptions,
  enter: (state: PipelineState) => void
): Promise<{ body: string; advisorResult: ExplanationResult | null }> => {
  if (options.returnCode === 0) {
    enter("success-body");
    return { body: SUCCESS_MESSAGE, advisorResult: null };
  }

  enter("collect-failures");
  const load = options.loadLogs ?? loadLogsFromFiles;
  const logs = await load(options.logPaths);
  const { failures } = collectFailures(logs);

  enter("query-advisor");
  const platformTag = computePlatformTag(options.platform);
  const advisorResult = await options.advisor.explain(
    options.commitSha,
    platformTag,
    failures
  );

  enter("render-report");
  const body = generateReport({
    title: computePlatformTitle(options.platform),
    returnCode: options.returnCode,
    testResults: logs.testResults,
    buildLogs: logs.buildLogs,
    explanations: advisorResult.available ? advisorResult.explanations : undefined,
    sizeLimit: options.sizeLimit,
  });
  return { body, advisorResult };
};

/**
 * Run the explain pipeline once.
 */
export const runExplainPipeline = async (
  options: ExplainPipelineOptions
): Promise<ExplainPipelineResult> => {
  const states: PipelineState[] = ["start"];
  const enter = (state: PipelineState): void => {
    states.push(state);
  };

  const { body, advisorResult } = await renderBody(options, enter);

  enter("lookup-existing-comment");
  const instruction = await reconcileStatusComment(
    options.store,
    options.issue,
    computePlatformTag(options.platform),
    body
  );

  enter("emit-upsert");
  await options.emit(instruction);

  enter("end");
  return { instruction, states, advisorResult };
};
