import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  type LoadedLogs,
  loadLogsFromFiles,
  type TestResultDocument,
} from "@premerge/parser";
import { computePlatformTag, SUCCESS_MESSAGE } from "@premerge/report";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type LogLoader, runExplainPipeline } from "./pipeline.js";
import {
  StaticAdvisor,
  UnavailableAdvisor,
} from "./services/advisor-client.js";
import {
  markBody,
  type UpsertInstruction,
} from "./services/comment-reconciler.js";
import type { CommentStore, IssueComment, IssueRef } from "./services/github.js";

// ============================================================================
// Test Fixtures
// ============================================================================

const platform = { system: "Linux", machine: "x86_64" };
const TITLE = "# :penguin: Linux x64 Test Results";
const issue: IssueRef = { owner: "example-org", repo: "example-repo", issueNumber: 7 };

const failingTests: TestResultDocument = {
  path: "results.xml",
  suites: [
    {
      name: "Suite",
      tests: 2,
      failures: 2,
      errors: 0,
      skipped: 0,
      cases: [
        { classname: "Pkg", name: "testA", outcome: "failed", message: "assert x==1" },
        { classname: "Pkg", name: "testB", outcome: "failed", message: "timeout" },
      ],
    },
  ],
};

const logs: LoadedLogs = {
  testResults: [failingTests],
  buildLogs: [{ path: "ninja.log", lines: ["[1/1] cc a.o"] }],
};

const storeWith = (comments: IssueComment[]): CommentStore => ({
  listComments: () => Promise.resolve(comments),
  createComment: () => Promise.reject(new Error("unexpected create")),
  updateComment: () => Promise.reject(new Error("unexpected update")),
});

const run = (overrides: {
  returnCode?: number;
  advisor?: StaticAdvisor | UnavailableAdvisor;
  store?: CommentStore;
  loadLogs?: LogLoader;
  logPaths?: string[];
}) => {
  const emitted: UpsertInstruction[] = [];
  const result = runExplainPipeline({
    commitSha: "abc1234",
    returnCode: overrides.returnCode ?? 1,
    logPaths: overrides.logPaths ?? ["results.xml", "ninja.log"],
    platform,
    issue,
    advisor: overrides.advisor ?? new UnavailableAdvisor(),
    store: overrides.store ?? storeWith([]),
    loadLogs: overrides.loadLogs ?? (() => Promise.resolve(logs)),
    emit: (instruction) => {
      emitted.push(instruction);
      return Promise.resolve();
    },
  });
  return { result, emitted };
};

// ============================================================================
// Tests
// ============================================================================

describe("runExplainPipeline", () => {
  it("posts the success message without loading logs or asking the advisor", async () => {
    const advisor = new StaticAdvisor([]);
    const loadLogs = vi.fn<LogLoader>(() => Promise.resolve(logs));

    const { result, emitted } = run({ returnCode: 0, advisor, loadLogs });
    const { instruction, states, advisorResult } = await result;

    expect(instruction).toEqual({
      body: markBody(computePlatformTag(platform), SUCCESS_MESSAGE),
    });
    expect(emitted).toEqual([instruction]);
    expect(states).toEqual([
      "start",
      "success-body",
      "lookup-existing-comment",
      "emit-upsert",
      "end",
    ]);
    expect(advisorResult).toBeNull();
    expect(advisor.calls).toHaveLength(0);
    expect(loadLogs).not.toHaveBeenCalled();
  });

  it("visits every state of a failed run in order", async () => {
    const { states } = await run({}).result;
    expect(states).toEqual([
      "start",
      "collect-failures",
      "query-advisor",
      "render-report",
      "lookup-existing-comment",
      "emit-upsert",
      "end",
    ]);
  });

  it("queries the advisor with the collected failures", async () => {
    const advisor = new StaticAdvisor([]);
    await run({ advisor }).result;
    expect(advisor.calls).toEqual([
      {
        commitSha: "abc1234",
        platform: "linux-x86_64",
        failures: [
          { name: "Pkg/testA", message: "assert x==1" },
          { name: "Pkg/testB", message: "timeout" },
        ],
      },
    ]);
  });

  it("renders the same report when the advisor is unavailable or silent", async () => {
    const unavailable = await run({ advisor: new UnavailableAdvisor() }).result;
    const silent = await run({
      advisor: new StaticAdvisor([
        { name: "Pkg/testA", explained: false, reason: null },
        null,
      ]),
    }).result;
    expect(silent.instruction).toEqual(unavailable.instruction);
  });

  it("marks explained failures", async () => {
    const { instruction } = await run({
      advisor: new StaticAdvisor([
        { name: "Pkg/testB", explained: true, reason: "Known flaky at HEAD" },
      ]),
    }).result;
    const lines = instruction.body.split("\n");
    expect(lines).toContain("<summary>Pkg/testB (Likely Already Failing)</summary>");
    expect(lines).toContain("Known flaky at HEAD");
  });

  it("updates the platform's existing comment", async () => {
    const store = storeWith([
      { id: 1, body: "unrelated" },
      { id: 2, body: "<!--PREMERGE ADVISOR COMMENT: linux-x86_64-->\nold" },
    ]);
    const { instruction } = await run({ store }).result;
    expect(instruction.id).toBe(2);
  });

  it("fails when the comment lookup fails", async () => {
    const store: CommentStore = {
      ...storeWith([]),
      listComments: () => Promise.reject(new Error("failed to list comments: 401")),
    };
    const { result, emitted } = run({ store });
    await expect(result).rejects.toThrow("failed to list comments: 401");
    expect(emitted).toEqual([]);
  });
});

describe("runExplainPipeline with log files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "premerge-pipeline-"));
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("reports failing tests in order under the platform header", async () => {
    const junitPath = join(dir, "results.xml");
    const ninjaPath = join(dir, "ninja.log");
    writeFileSync(
      junitPath,
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        "<testsuites>",
        '<testsuite name="Suite" tests="2" failures="2" errors="0" skipped="0">',
        '<testcase classname="Pkg" name="testA"><failure>assert x==1</failure></testcase>',
        '<testcase classname="Pkg" name="testB"><failure>timeout</failure></testcase>',
        "</testsuite>",
        "</testsuites>",
      ].join("\n")
    );
    writeFileSync(ninjaPath, "[1/2] cc a.o\n[2/2] cc b.o\n");

    const { result } = run({
      logPaths: [junitPath, ninjaPath, join(dir, "missing.xml")],
      loadLogs: loadLogsFromFiles,
    });
    const lines = (await result).instruction.body.split("\n");

    expect(lines[0]).toBe("<!--PREMERGE ADVISOR COMMENT: linux-x86_64-->");
    expect(lines[1]).toBe(TITLE);
    const testA = lines.indexOf("<summary>Pkg/testA</summary>");
    const testB = lines.indexOf("<summary>Pkg/testB</summary>");
    expect(testA).toBeGreaterThan(0);
    expect(testB).toBeGreaterThan(testA);
    expect(lines[testA + 3]).toBe("assert x==1");
    expect(lines[testB + 3]).toBe("timeout");
  });
});
