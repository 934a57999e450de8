/**
 * Comment Reconciler: keeps one status comment per platform on a pull
 * request.
 *
 * The comment owned by a platform is found through a marker embedded as an
 * HTML comment on its first line. The marker never changes once posted, so
 * later runs update the same comment instead of adding another one.
 */

import { isRecord } from "@premerge/parser";
import type { PlatformTag } from "@premerge/report";
import type { CommentStore, IssueComment, IssueRef } from "./github.js";

export const COMMENT_MARKER_PREFIX = "<!--PREMERGE ADVISOR COMMENT: ";
const COMMENT_MARKER_SUFFIX = "-->";

/**
 * What the publish step does: update comment `id` when present, otherwise
 * create a comment.
 */
export interface UpsertInstruction {
  readonly body: string;
  readonly id?: number;
}

export const commentMarker = (platform: PlatformTag): string =>
  `${COMMENT_MARKER_PREFIX}${platform}${COMMENT_MARKER_SUFFIX}`;

/**
 * Prefix a report with the platform's marker.
 */
export const markBody = (platform: PlatformTag, body: string): string =>
  `${commentMarker(platform)}\n${body}`;

/**
 * First comment carrying the platform's marker.
 */
export const findStatusComment = (
  comments: readonly IssueComment[],
  platform: PlatformTag
): IssueComment | undefined => {
  const marker = commentMarker(platform);
  return comments.find((comment) => comment.body.includes(marker));
};

/**
 * Decide between updating the platform's existing comment and creating one.
 * Two concurrent runs for one platform can both decide to create.
 */
export const reconcileStatusComment = async (
  store: CommentStore,
  issue: IssueRef,
  platform: PlatformTag,
  body: string
): Promise<UpsertInstruction> => {
  const existing = findStatusComment(await store.listComments(issue), platform);
  const markedBody = markBody(platform, body);
  return existing ? { body: markedBody, id: existing.id } : { body: markedBody };
};

/**
 * Carry out an instruction. Returns the id of the written comment.
 */
export const publishUpsert = (
  store: CommentStore,
  issue: IssueRef,
  instruction: UpsertInstruction
): Promise<number> =>
  instruction.id === undefined
    ? store.createComment(issue, instruction.body)
    : store.updateComment(issue, instruction.id, instruction.body);

// ============================================================================
// Instruction File
// ============================================================================

/**
 * Serialize instructions as the JSON array the publish step reads.
 */
export const serializeInstructions = (
  instructions: readonly UpsertInstruction[]
): string => `${JSON.stringify(instructions, null, 2)}\n`;

const parseInstruction = (value: unknown): UpsertInstruction | undefined => {
  if (!isRecord(value) || typeof value.body !== "string") {
    return undefined;
  }
  if (value.id === undefined) {
    return { body: value.body };
  }
  if (typeof value.id === "number" && Number.isInteger(value.id)) {
    return { body: value.body, id: value.id };
  }
  return undefined;
};

/**
 * Parse an instruction file.
 *
 * @throws Error if the content is not a JSON array of `{ body, id? }`
 */
export const parseInstructions = (content: string): UpsertInstruction[] => {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new Error("instruction file is not valid JSON");
  }
  if (!Array.isArray(data)) {
    throw new Error("instruction file must contain a JSON array");
  }

  return data.map((item, index) => {
    const instruction = parseInstruction(item);
    if (!instruction) {
      throw new Error(`invalid instruction at index ${index}`);
    }
    return instruction;
  });
};
