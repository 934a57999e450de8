import { MissingArgumentError } from "./errors.js";

const EXIT_CODE_PATTERN = /^-?\d+$/;

/**
 * Parse the exit code of the CI build.
 *
 * @throws MissingArgumentError unless the value is an integer
 */
export const parseReturnCode = (value: string | undefined): number => {
  const trimmed = value?.trim() ?? "";
  if (!EXIT_CODE_PATTERN.test(trimmed)) {
    throw new MissingArgumentError(
      "returnCode",
      `invalid return code: "${value ?? ""}"`
    );
  }
  return Number.parseInt(trimmed, 10);
};

/**
 * Positional arguments after the first `count` named ones.
 */
export const remainingPositionals = (
  positionals: readonly string[],
  count: number
): string[] => positionals.slice(count);
