import { computePlatformTag } from "@premerge/report";
import { describe, expect, it } from "vitest";
import {
  commentMarker,
  findStatusComment,
  markBody,
  parseInstructions,
  publishUpsert,
  reconcileStatusComment,
  serializeInstructions,
} from "./comment-reconciler.js";
import type { CommentStore, IssueComment, IssueRef } from "./github.js";

const linux = computePlatformTag({ system: "Linux", machine: "x86_64" });
const windows = computePlatformTag({ system: "Windows", machine: "AMD64" });
const issue: IssueRef = { owner: "example-org", repo: "example-repo", issueNumber: 7 };

/**
 * In-memory stand-in for the GitHub comment API.
 */
const createMemoryStore = (initial: IssueComment[] = []) => {
  const comments = [...initial];
  let nextId = 1000;
  const store: CommentStore = {
    listComments: () => Promise.resolve(comments.map((c) => ({ ...c }))),
    createComment: (_issue, body) => {
      const id = nextId++;
      comments.push({ id, body });
      return Promise.resolve(id);
    },
    updateComment: (_issue, commentId, body) => {
      const index = comments.findIndex((c) => c.id === commentId);
      if (index < 0) {
        return Promise.reject(new Error(`no comment ${commentId}`));
      }
      comments[index] = { id: commentId, body };
      return Promise.resolve(commentId);
    },
  };
  return { store, comments };
};

describe("commentMarker", () => {
  it("embeds the platform tag in an HTML comment", () => {
    expect(commentMarker(linux)).toBe(
      "<!--PREMERGE ADVISOR COMMENT: linux-x86_64-->"
    );
  });

  it("puts the marker on the first line", () => {
    expect(markBody(linux, "report").split("\n")).toEqual([
      "<!--PREMERGE ADVISOR COMMENT: linux-x86_64-->",
      "report",
    ]);
  });
});

describe("findStatusComment", () => {
  it("matches only the platform's own marker", () => {
    const comments: IssueComment[] = [
      { id: 1, body: "looks good to me" },
      { id: 2, body: markBody(windows, "windows report") },
      { id: 3, body: markBody(linux, "linux report") },
    ];
    expect(findStatusComment(comments, linux)?.id).toBe(3);
    expect(findStatusComment(comments, windows)?.id).toBe(2);
  });

  it("returns the first match", () => {
    const comments: IssueComment[] = [
      { id: 4, body: markBody(linux, "old") },
      { id: 5, body: markBody(linux, "duplicate") },
    ];
    expect(findStatusComment(comments, linux)?.id).toBe(4);
  });

  it("returns undefined without a marked comment", () => {
    expect(findStatusComment([{ id: 1, body: "hello" }], linux)).toBeUndefined();
  });
});

describe("reconcileStatusComment", () => {
  it("creates when no comment carries the marker", async () => {
    const { store } = createMemoryStore([{ id: 1, body: "unrelated" }]);
    expect(await reconcileStatusComment(store, issue, linux, "report")).toEqual({
      body: markBody(linux, "report"),
    });
  });

  it("updates the marked comment", async () => {
    const { store } = createMemoryStore([
      { id: 9, body: markBody(linux, "old report") },
    ]);
    expect(await reconcileStatusComment(store, issue, linux, "new report")).toEqual(
      { body: markBody(linux, "new report"), id: 9 }
    );
  });

  it("never creates a second comment across sequential runs", async () => {
    const { store, comments } = createMemoryStore();

    const first = await reconcileStatusComment(store, issue, linux, "run 1");
    const createdId = await publishUpsert(store, issue, first);
    const second = await reconcileStatusComment(store, issue, linux, "run 2");
    await publishUpsert(store, issue, second);

    expect(first.id).toBeUndefined();
    expect(second.id).toBe(createdId);
    expect(comments).toEqual([{ id: createdId, body: markBody(linux, "run 2") }]);
  });

  it("keeps platforms apart", async () => {
    const { store, comments } = createMemoryStore();
    await publishUpsert(
      store,
      issue,
      await reconcileStatusComment(store, issue, linux, "linux")
    );
    await publishUpsert(
      store,
      issue,
      await reconcileStatusComment(store, issue, windows, "windows")
    );
    expect(comments).toHaveLength(2);
  });

  it("propagates lookup failures", async () => {
    const store: CommentStore = {
      listComments: () => Promise.reject(new Error("failed to list comments: 401")),
      createComment: () => Promise.resolve(1),
      updateComment: () => Promise.resolve(1),
    };
    await expect(
      reconcileStatusComment(store, issue, linux, "report")
    ).rejects.toThrow("failed to list comments: 401");
  });
});

describe("instruction file", () => {
  it("serializes and parses a single instruction", () => {
    const content = serializeInstructions([{ body: "report", id: 3 }]);
    expect(content).toBe('[\n  {\n    "body": "report",\n    "id": 3\n  }\n]\n');
    expect(parseInstructions(content)).toEqual([{ body: "report", id: 3 }]);
  });

  it("omits the id of a create instruction", () => {
    expect(serializeInstructions([{ body: "report" }])).toBe(
      '[\n  {\n    "body": "report"\n  }\n]\n'
    );
  });

  it("rejects malformed content", () => {
    expect(() => parseInstructions("{")).toThrow(
      "instruction file is not valid JSON"
    );
    expect(() => parseInstructions('{"body": "x"}')).toThrow(
      "instruction file must contain a JSON array"
    );
    expect(() => parseInstructions('[{"body": "x", "id": "1"}]')).toThrow(
      "invalid instruction at index 0"
    );
  });
});
