import type { FailureSet } from "@premerge/parser";
import { isRecord } from "@premerge/parser";
import type {
  ExplanationEntry,
  ExplanationList,
  PlatformTag,
} from "@premerge/report";
import { DEFAULT_ADVISOR_TIMEOUT_MS } from "../lib/config.js";
import { formatErrorNotice } from "../utils/error.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of an explain query. The advisor is best-effort: every failure
 * to reach it or to understand its answer is `available: false`.
 */
export type ExplanationResult =
  | { readonly available: true; readonly explanations: ExplanationList }
  | { readonly available: false; readonly reason: string };

/**
 * Source of explanations for failures that are likely not caused by the
 * change under test.
 */
export interface Advisor {
  explain(
    commitSha: string,
    platform: PlatformTag,
    failures: FailureSet
  ): Promise<ExplanationResult>;
}

interface FailurePayload {
  readonly name: string;
  readonly message: string;
}

/**
 * Request payload for the explain endpoint.
 */
export interface ExplainRequest {
  readonly base_commit_sha: string;
  readonly platform: PlatformTag;
  readonly failures: readonly FailurePayload[];
}

/**
 * Request payload for the upload endpoints.
 */
export interface UploadRequest {
  readonly source_type: "pull_request" | "postcommit";
  readonly base_commit_sha: string;
  readonly source_id: string;
  readonly failures: readonly FailurePayload[];
  readonly platform: PlatformTag;
}

export interface UploadOutcome {
  readonly url: string;
  readonly ok: boolean;
  readonly error?: string;
}

const TRAILING_SLASH = /\/$/;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Validates and normalizes an advisor URL.
 *
 * @throws Error if the URL is invalid or does not use HTTP(S)
 */
export const validateAdvisorUrl = (url: string): string => {
  if (url.includes("\0") || url.includes("\n") || url.includes("\r")) {
    throw new Error(
      "Advisor URL contains invalid characters (null bytes or newlines)"
    );
  }

  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    throw new Error(`Advisor URL is invalid: ${url}. Must be a valid HTTP(S) URL.`);
  }

  if (parsedUrl.protocol !== "http:" && parsedUrl.protocol !== "https:") {
    throw new Error(
      `Advisor URL must use HTTP or HTTPS protocol, got: ${parsedUrl.protocol}`
    );
  }

  return (
    parsedUrl.origin +
    parsedUrl.pathname.replace(TRAILING_SLASH, "") +
    parsedUrl.search
  );
};

const toPayload = (failures: FailureSet): FailurePayload[] =>
  failures.map(({ name, message }) => ({ name, message }));

const parseEntry = (value: unknown): ExplanationEntry | null | undefined => {
  if (value === null) {
    return null;
  }
  if (!isRecord(value)) {
    return undefined;
  }
  const { name, explained, reason } = value;
  if (typeof name !== "string" || typeof explained !== "boolean") {
    return undefined;
  }
  if (typeof reason === "string") {
    return { name, explained, reason };
  }
  if (reason !== undefined && reason !== null) {
    return undefined;
  }
  return { name, explained, reason: null };
};

/**
 * Validate an explain response body.
 * Returns null unless it is an array of `null | { name, explained, reason? }`.
 */
export const parseExplanations = (data: unknown): ExplanationList | null => {
  if (!Array.isArray(data)) {
    return null;
  }
  const entries: (ExplanationEntry | null)[] = [];
  for (const item of data) {
    const entry = parseEntry(item);
    if (entry === undefined) {
      return null;
    }
    entries.push(entry);
  }
  return entries;
};

const describeFetchError = (error: unknown, timeoutMs: number): string => {
  if (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  ) {
    return `request timed out after ${timeoutMs}ms`;
  }
  return formatErrorNotice(error);
};

const postJson = (
  url: string,
  body: unknown,
  timeoutMs: number
): Promise<Response> =>
  fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Accept: "application/json",
    },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  });

// ============================================================================
// Advisors
// ============================================================================

/**
 * HTTP client for the advisory service's explain endpoint.
 * One attempt per query; nothing here throws.
 */
export class HttpAdvisor implements Advisor {
  private readonly url: string;
  private readonly timeoutMs: number;

  /**
   * @param config.url - Explain endpoint
   * @param config.timeoutMs - Request timeout (defaults to 5000ms)
   * @throws Error if the URL is invalid
   */
  constructor(config: { url: string; timeoutMs?: number }) {
    this.url = validateAdvisorUrl(config.url);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_ADVISOR_TIMEOUT_MS;
  }

  async explain(
    commitSha: string,
    platform: PlatformTag,
    failures: FailureSet
  ): Promise<ExplanationResult> {
    if (failures.length === 0) {
      return { available: true, explanations: [] };
    }

    const request: ExplainRequest = {
      base_commit_sha: commitSha,
      platform,
      failures: toPayload(failures),
    };

    let response: Response;
    try {
      response = await postJson(this.url, request, this.timeoutMs);
    } catch (error) {
      return this.unavailable(describeFetchError(error, this.timeoutMs));
    }

    if (!response.ok) {
      return this.unavailable(`advisor returned ${response.status}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      return this.unavailable(
        `failed to parse advisor response: ${formatErrorNotice(error)}`
      );
    }

    const explanations = parseExplanations(data);
    if (!explanations) {
      return this.unavailable("advisor response is not a list of explanations");
    }

    console.log(
      `[advisor] received ${explanations.length} explanation(s) for ${failures.length} failure(s)`
    );
    return { available: true, explanations };
  }

  private unavailable(reason: string): ExplanationResult {
    console.error(`[advisor] explanations unavailable: ${reason}`);
    return { available: false, reason };
  }
}

/**
 * Advisor that always answers with the same explanations.
 */
export class StaticAdvisor implements Advisor {
  readonly calls: {
    commitSha: string;
    platform: PlatformTag;
    failures: FailureSet;
  }[] = [];

  constructor(private readonly explanations: ExplanationList) {}

  explain(
    commitSha: string,
    platform: PlatformTag,
    failures: FailureSet
  ): Promise<ExplanationResult> {
    this.calls.push({ commitSha, platform, failures });
    return Promise.resolve({
      available: true,
      explanations: this.explanations,
    });
  }
}

/**
 * Advisor used when no service is configured or reachable.
 */
export class UnavailableAdvisor implements Advisor {
  constructor(private readonly reason = "no advisor configured") {}

  explain(): Promise<ExplanationResult> {
    return Promise.resolve({ available: false, reason: this.reason });
  }
}

/**
 * Build the advisor for a configured endpoint.
 * An absent or invalid URL yields an UnavailableAdvisor.
 */
export const createAdvisor = (
  url: string | null,
  timeoutMs = DEFAULT_ADVISOR_TIMEOUT_MS
): Advisor => {
  if (!url) {
    return new UnavailableAdvisor();
  }
  try {
    return new HttpAdvisor({ url, timeoutMs });
  } catch (error) {
    const reason = formatErrorNotice(error);
    console.error(`warning: advisor disabled: ${reason}`);
    return new UnavailableAdvisor(reason);
  }
};

// ============================================================================
// Upload
// ============================================================================

/**
 * Whether a run's failures should be uploaded.
 * Successful runs have nothing to upload; arm64 runners are excluded.
 */
export const shouldUpload = (returnCode: number, machine: string): boolean =>
  returnCode !== 0 && machine !== "arm64";

export const buildUploadRequest = (options: {
  commitSha: string;
  runId: string;
  platform: PlatformTag;
  failures: FailureSet;
  isGitHubActions: boolean;
}): UploadRequest => ({
  source_type: options.isGitHubActions ? "pull_request" : "postcommit",
  base_commit_sha: options.commitSha,
  source_id: options.runId,
  failures: toPayload(options.failures),
  platform: options.platform,
});

/**
 * Post the failures to every upload endpoint, one attempt each, in order.
 * Failures are logged and reported in the outcome, never thrown.
 */
export const uploadFailures = async (
  urls: readonly string[],
  request: UploadRequest,
  timeoutMs = DEFAULT_ADVISOR_TIMEOUT_MS
): Promise<UploadOutcome[]> => {
  const outcomes: UploadOutcome[] = [];
  for (const url of urls) {
    let error: string | undefined;
    try {
      const response = await postJson(validateAdvisorUrl(url), request, timeoutMs);
      if (!response.ok) {
        error = `upload endpoint returned ${response.status}`;
      }
    } catch (caught) {
      error = describeFetchError(caught, timeoutMs);
    }

    if (error === undefined) {
      console.log(`[advisor] uploaded ${request.failures.length} failure(s) to ${url}`);
      outcomes.push({ url, ok: true });
    } else {
      console.error(`[advisor] failed to upload to ${url}: ${error}`);
      outcomes.push({ url, ok: false, error });
    }
  }
  return outcomes;
};
