/**
 * Base error class for fatal premerge failures.
 */
export class PremergeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PremergeError";
    Object.setPrototypeOf(this, PremergeError.prototype);
  }
}

/**
 * Error thrown when a required argument or setting is missing or malformed.
 * Raised before any log is parsed.
 */
export class MissingArgumentError extends PremergeError {
  readonly argument: string;

  constructor(argument: string, message = `missing required argument: ${argument}`) {
    super(message);
    this.name = "MissingArgumentError";
    this.argument = argument;
    Object.setPrototypeOf(this, MissingArgumentError.prototype);
  }
}

/**
 * Error thrown when a GitHub API call fails.
 */
export class GitHubApiError extends PremergeError {
  readonly status: number;

  constructor(action: string, status: number, detail = "") {
    super(
      detail
        ? `failed to ${action}: ${status} ${detail}`
        : `failed to ${action}: ${status}`
    );
    this.name = "GitHubApiError";
    this.status = status;
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

/**
 * Print a fatal error and exit.
 */
export const exitWithError = (error: unknown): never => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exit(1);
};
