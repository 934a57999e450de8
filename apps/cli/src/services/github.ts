import { isRecord } from "@premerge/parser";
import { GitHubApiError } from "../lib/errors.js";

// GitHub REST API service
// Handles: listing, creating and updating issue comments

const GITHUB_API = "https://api.github.com";
const PAGE_SIZE = 100;
const USER_AGENT = "premerge-report";

/**
 * The pull request (issue) whose comments are reconciled.
 */
export interface IssueRef {
  readonly owner: string;
  readonly repo: string;
  readonly issueNumber: number;
}

export interface IssueComment {
  readonly id: number;
  readonly body: string;
}

/**
 * Comment operations the reconciler needs.
 * Every call either succeeds or rejects; nothing is retried.
 */
export interface CommentStore {
  listComments(issue: IssueRef): Promise<IssueComment[]>;
  createComment(issue: IssueRef, body: string): Promise<number>;
  updateComment(issue: IssueRef, commentId: number, body: string): Promise<number>;
}

interface GitHubServiceConfig {
  token: string;
  apiUrl?: string;
}

const parseComment = (value: unknown): IssueComment | undefined => {
  if (!isRecord(value) || typeof value.id !== "number") {
    return undefined;
  }
  return {
    id: value.id,
    body: typeof value.body === "string" ? value.body : "",
  };
};

const readCommentId = async (
  response: Response,
  action: string
): Promise<number> => {
  const comment = parseComment(await response.json());
  if (!comment) {
    throw new GitHubApiError(action, response.status, "response has no comment id");
  }
  return comment.id;
};

const failure = async (
  response: Response,
  action: string
): Promise<GitHubApiError> => {
  const detail = await response.text().catch(() => "");
  return new GitHubApiError(action, response.status, detail);
};

export const createGitHubService = (config: GitHubServiceConfig): CommentStore => {
  const apiUrl = config.apiUrl ?? GITHUB_API;
  const headers = {
    Authorization: `Bearer ${config.token}`,
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28",
    "User-Agent": USER_AGENT,
  };

  const commentsUrl = ({ owner, repo, issueNumber }: IssueRef): string =>
    `${apiUrl}/repos/${owner}/${repo}/issues/${issueNumber}/comments`;

  const listComments = async (issue: IssueRef): Promise<IssueComment[]> => {
    const comments: IssueComment[] = [];

    for (let page = 1; ; page++) {
      const response = await fetch(
        `${commentsUrl(issue)}?per_page=${PAGE_SIZE}&page=${page}`,
        { headers }
      );
      if (!response.ok) {
        throw await failure(response, "list comments");
      }

      const data: unknown = await response.json();
      if (!Array.isArray(data)) {
        throw new GitHubApiError(
          "list comments",
          response.status,
          "response is not an array"
        );
      }
      for (const item of data) {
        const comment = parseComment(item);
        if (comment) {
          comments.push(comment);
        }
      }
      if (data.length < PAGE_SIZE) {
        break;
      }
    }

    return comments;
  };

  const createComment = async (
    issue: IssueRef,
    body: string
  ): Promise<number> => {
    const response = await fetch(commentsUrl(issue), {
      method: "POST",
      headers: { ...headers, "Content-Type": "application/json" },
      body: JSON.stringify({ body }),
    });
    if (!response.ok) {
      throw await failure(response, "post comment");
    }

    const id = await readCommentId(response, "post comment");
    console.log(
      `[github] Posted comment ${id} to ${issue.owner}/${issue.repo}#${issue.issueNumber}`
    );
    return id;
  };

  const updateComment = async (
    issue: IssueRef,
    commentId: number,
    body: string
  ): Promise<number> => {
    const response = await fetch(
      `${apiUrl}/repos/${issue.owner}/${issue.repo}/issues/comments/${commentId}`,
      {
        method: "PATCH",
        headers: { ...headers, "Content-Type": "application/json" },
        body: JSON.stringify({ body }),
      }
    );
    if (!response.ok) {
      throw await failure(response, "update comment");
    }

    console.log(
      `[github] Updated comment ${commentId} on ${issue.owner}/${issue.repo}#${issue.issueNumber}`
    );
    return commentId;
  };

  return { listComments, createComment, updateComment };
};
