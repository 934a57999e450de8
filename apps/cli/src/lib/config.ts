/**
 * Config management for the premerge CLI
 *
 * Sources, lowest to highest precedence:
 * - built-in defaults
 * - per-repo .premerge/config.json
 * - environment variables (CI provider, tokens, advisor endpoints)
 * - command line arguments
 *
 * This is the only module that reads the environment; everything else
 * receives a resolved PremergeConfig.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { isRecord, safeParseInt } from "@premerge/parser";
import { MissingArgumentError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * RepoConfig is the raw structure persisted in .premerge/config.json
 */
export interface RepoConfig {
  $schema?: string;
  advisorUrl?: string;
  uploadUrls?: string[];
  advisorTimeoutMs?: number;
  sizeLimit?: number;
  repository?: string;
}

/**
 * PremergeConfig is the merged, resolved config used by the application
 */
export interface PremergeConfig {
  /** Explain endpoint of the advisory service; null disables the advisor */
  advisorUrl: string | null;
  uploadUrls: string[];
  advisorTimeoutMs: number;
  sizeLimit: number;
  /** `owner/repo` of the pull request */
  repository: string | null;
  githubToken: string | null;
  prNumber: number | null;
  /** True when running under GitHub Actions */
  isGitHubActions: boolean;
  /** CI run identifier used as the upload source id */
  runId: string | null;
}

/**
 * Values given on the command line. They win over everything else.
 */
export interface ConfigOverrides {
  advisorUrl?: string;
  repository?: string;
  githubToken?: string;
  prNumber?: string;
}

export interface ConfigLoadResult {
  config: RepoConfig;
  error?: string;
}

/**
 * The pull request whose comments a run writes, with the token to do so.
 */
export interface IssueTarget {
  readonly owner: string;
  readonly repo: string;
  readonly issueNumber: number;
  readonly token: string;
}

/**
 * Everything needed to reconcile the status comment of a pull request.
 */
export interface CommentTarget extends IssueTarget {
  readonly commitSha: string;
}

// ============================================================================
// Constants
// ============================================================================

const PREMERGE_DIR_NAME = ".premerge";
const REPO_CONFIG_FILE = "config.json";

export const DEFAULT_ADVISOR_TIMEOUT_MS = 5000;
export const DEFAULT_SIZE_LIMIT = 1024 * 1024;

const MIN_ADVISOR_TIMEOUT_MS = 100;
const MAX_ADVISOR_TIMEOUT_MS = 60_000;
const MIN_SIZE_LIMIT = 1024;
const MAX_SIZE_LIMIT = 1024 * 1024;

// Owner/repo names: alphanumeric, hyphen, underscore, period (not starting with period)
const GITHUB_NAME_PATTERN = /^[a-zA-Z0-9][-a-zA-Z0-9._]*$/;
const COMMIT_SHA_PATTERN = /^[0-9a-fA-F]{7,64}$/;
const DIGITS_PATTERN = /^\d+$/;
const URL_LIST_SEPARATOR = /[,\s]+/;

// ============================================================================
// Path Helpers
// ============================================================================

/**
 * Gets the path to the per-repo config file (<repo>/.premerge/config.json)
 */
export const getRepoConfigPath = (repoRoot: string): string =>
  join(repoRoot, PREMERGE_DIR_NAME, REPO_CONFIG_FILE);

// ============================================================================
// Config Loading
// ============================================================================

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
};

const optionalString = (
  value: unknown,
  field: string,
  warnings: string[]
): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  warnings.push(`ignoring "${field}": expected a string`);
  return undefined;
};

const optionalNumber = (
  value: unknown,
  field: string,
  warnings: string[]
): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  warnings.push(`ignoring "${field}": expected a number`);
  return undefined;
};

/**
 * Narrow parsed JSON to a RepoConfig, dropping fields of the wrong type.
 */
export const parseRepoConfig = (
  data: unknown
): { config: RepoConfig; warnings: string[] } => {
  const warnings: string[] = [];
  if (!isRecord(data)) {
    return { config: {}, warnings: ["config must be a JSON object"] };
  }

  const config: RepoConfig = {};
  const schema = optionalString(data.$schema, "$schema", warnings);
  if (schema !== undefined) {
    config.$schema = schema;
  }
  const advisorUrl = optionalString(data.advisorUrl, "advisorUrl", warnings);
  if (advisorUrl !== undefined) {
    config.advisorUrl = advisorUrl;
  }
  const repository = optionalString(data.repository, "repository", warnings);
  if (repository !== undefined) {
    config.repository = repository;
  }
  const timeout = optionalNumber(
    data.advisorTimeoutMs,
    "advisorTimeoutMs",
    warnings
  );
  if (timeout !== undefined) {
    config.advisorTimeoutMs = timeout;
  }
  const sizeLimit = optionalNumber(data.sizeLimit, "sizeLimit", warnings);
  if (sizeLimit !== undefined) {
    config.sizeLimit = sizeLimit;
  }

  const uploadUrls = data.uploadUrls;
  if (uploadUrls !== undefined) {
    if (
      Array.isArray(uploadUrls) &&
      uploadUrls.every((url): url is string => typeof url === "string")
    ) {
      config.uploadUrls = uploadUrls;
    } else {
      warnings.push(`ignoring "uploadUrls": expected an array of strings`);
    }
  }

  return { config, warnings };
};

/**
 * Loads config with detailed error information.
 * A missing or empty file is an empty config; anything unreadable is an
 * empty config plus an error message.
 */
export const loadRepoConfigSafe = (repoRoot: string): ConfigLoadResult => {
  const configPath = getRepoConfigPath(repoRoot);

  let data: string;
  try {
    data = readFileSync(configPath, "utf-8");
  } catch (error) {
    switch (errorCode(error)) {
      case "ENOENT":
        return { config: {} };
      case "EACCES":
        return {
          config: {},
          error: `cannot read config at ${configPath}: permission denied`,
        };
      case "EISDIR":
        return {
          config: {},
          error: `config path is a directory: ${configPath}`,
        };
      default:
        return {
          config: {},
          error: `failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        };
    }
  }

  if (!data.trim()) {
    return { config: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return {
      config: {},
      error: `config file is corrupted: ${configPath} (invalid JSON)`,
    };
  }

  const { config, warnings } = parseRepoConfig(parsed);
  if (warnings.length > 0) {
    return { config, error: `${configPath}: ${warnings.join("; ")}` };
  }
  return { config };
};

/**
 * Loads the per-repo config, warning about corrupted or inaccessible files.
 */
export const loadRepoConfig = (repoRoot: string): RepoConfig => {
  const result = loadRepoConfigSafe(repoRoot);
  if (result.error) {
    console.error(`warning: ${result.error}`);
  }
  return result.config;
};

// ============================================================================
// Config Merging
// ============================================================================

const clamp = (value: number, min: number, max: number): number => {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Split a comma or whitespace separated URL list.
 */
export const parseUrlList = (value: string): string[] =>
  value.split(URL_LIST_SEPARATOR).filter((url) => url.length > 0);

/**
 * Validate a commit sha argument.
 */
export const isCommitSha = (value: string): boolean =>
  COMMIT_SHA_PATTERN.test(value);

/**
 * Parse a pull request number. Returns null unless it is a positive integer.
 */
export const parsePrNumber = (value: string | undefined): number | null => {
  const trimmed = nonEmpty(value);
  if (!(trimmed && DIGITS_PATTERN.test(trimmed))) {
    return null;
  }
  const n = safeParseInt(trimmed);
  return n !== undefined && n > 0 ? n : null;
};

/**
 * Merge defaults, the repo config, the environment and overrides.
 */
export const resolveConfig = (
  repo: RepoConfig,
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {}
): PremergeConfig => {
  const config: PremergeConfig = {
    advisorUrl: null,
    uploadUrls: [],
    advisorTimeoutMs: DEFAULT_ADVISOR_TIMEOUT_MS,
    sizeLimit: DEFAULT_SIZE_LIMIT,
    repository: null,
    githubToken: null,
    prNumber: null,
    isGitHubActions: env.GITHUB_ACTIONS !== undefined,
    runId: nonEmpty(env.GITHUB_RUN_NUMBER) ?? nonEmpty(env.BUILDBOT_BUILDNUMBER) ?? null,
  };

  if (repo.advisorUrl) {
    config.advisorUrl = repo.advisorUrl;
  }
  if (repo.uploadUrls) {
    config.uploadUrls = [...repo.uploadUrls];
  }
  if (repo.advisorTimeoutMs !== undefined) {
    config.advisorTimeoutMs = clamp(
      repo.advisorTimeoutMs,
      MIN_ADVISOR_TIMEOUT_MS,
      MAX_ADVISOR_TIMEOUT_MS
    );
  }
  if (repo.sizeLimit !== undefined) {
    config.sizeLimit = clamp(repo.sizeLimit, MIN_SIZE_LIMIT, MAX_SIZE_LIMIT);
  }
  if (repo.repository) {
    config.repository = repo.repository;
  }

  const envAdvisor = nonEmpty(env.PREMERGE_ADVISOR_URL);
  if (envAdvisor) {
    config.advisorUrl = envAdvisor;
  }
  const envUploads = nonEmpty(env.PREMERGE_ADVISOR_UPLOAD_URLS);
  if (envUploads) {
    config.uploadUrls = parseUrlList(envUploads);
  }
  config.repository = nonEmpty(env.GITHUB_REPOSITORY) ?? config.repository;
  config.githubToken = nonEmpty(env.GITHUB_TOKEN) ?? null;
  config.prNumber = parsePrNumber(env.GITHUB_PR_NUMBER);

  config.advisorUrl = nonEmpty(overrides.advisorUrl) ?? config.advisorUrl;
  config.repository = nonEmpty(overrides.repository) ?? config.repository;
  config.githubToken = nonEmpty(overrides.githubToken) ?? config.githubToken;
  if (overrides.prNumber !== undefined) {
    config.prNumber = parsePrNumber(overrides.prNumber);
  }

  return config;
};

/**
 * Loads the config for a repository checkout.
 */
export const loadConfig = (
  repoRoot: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): PremergeConfig => resolveConfig(loadRepoConfig(repoRoot), env, overrides);

// ============================================================================
// Validation Helpers
// ============================================================================

const isValidGitHubName = (name: string): boolean =>
  name.length > 0 &&
  name.length <= 100 &&
  GITHUB_NAME_PATTERN.test(name) &&
  !name.includes("..");

/**
 * Validate the pull request, token and repository of a run.
 *
 * @throws MissingArgumentError naming the first missing or malformed value
 */
export const requireIssueTarget = (config: PremergeConfig): IssueTarget => {
  if (config.prNumber === null) {
    throw new MissingArgumentError(
      "prNumber",
      "missing pull request number (set GITHUB_PR_NUMBER or pass --pr)"
    );
  }
  if (!config.githubToken) {
    throw new MissingArgumentError(
      "githubToken",
      "missing GitHub token (set GITHUB_TOKEN or pass --token)"
    );
  }
  if (!config.repository) {
    throw new MissingArgumentError(
      "repository",
      "missing repository (set GITHUB_REPOSITORY or pass --repo)"
    );
  }

  const [owner = "", repo = "", ...rest] = config.repository.split("/");
  if (
    rest.length > 0 ||
    !(isValidGitHubName(owner) && isValidGitHubName(repo))
  ) {
    throw new MissingArgumentError(
      "repository",
      `invalid repository "${config.repository}" (expected owner/repo)`
    );
  }

  return {
    owner,
    repo,
    issueNumber: config.prNumber,
    token: config.githubToken,
  };
};

/**
 * Validate everything comment reconciliation needs.
 * Called before any log is parsed so a misconfigured run fails fast.
 *
 * @throws MissingArgumentError naming the first missing or malformed value
 */
export const requireCommentTarget = (
  config: PremergeConfig,
  commitSha: string
): CommentTarget => {
  if (!isCommitSha(commitSha)) {
    throw new MissingArgumentError(
      "commitSha",
      `invalid commit sha: "${commitSha}"`
    );
  }
  return { ...requireIssueTarget(config), commitSha };
};
