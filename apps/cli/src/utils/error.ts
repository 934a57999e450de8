/**
 * Formats an unknown error into a string message.
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

const ERROR_PREFIX_REGEX = /^Error:\s*/i;
const MAX_NOTICE_LENGTH = 200;

/**
 * Condenses an error message into a single log line:
 * strips an "Error:" prefix, keeps the first line and truncates long text.
 */
export const formatErrorNotice = (error: unknown): string => {
  let formatted = formatError(error).replace(ERROR_PREFIX_REGEX, "");

  const firstLine = formatted.split("\n")[0];
  if (firstLine) {
    formatted = firstLine;
  }

  if (formatted.length > MAX_NOTICE_LENGTH) {
    formatted = `${formatted.slice(0, MAX_NOTICE_LENGTH - 3)}...`;
  }

  return formatted.trim();
};
