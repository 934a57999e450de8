/**
 * Parser utilities shared across log parsers.
 */

// ============================================================================
// ANSI Escape Code Handling
// ============================================================================

/**
 * Pattern matching ANSI escape sequences for terminal output.
 * Covers CSI sequences (ESC[ ... final byte), OSC sequences
 * (ESC] ... BEL or ESC\) and single-character escapes.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: intentional ANSI escape sequence matching
const ansiEscapePattern =
  /\x1b\[[0-9;:?]*[A-Za-z]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)?|\x1b[()][AB012]|\x1b[@-_]/g;

/**
 * Remove ANSI escape sequences from a string.
 * Ninja forwards compiler output verbatim, which may be colored.
 */
export const stripAnsi = (s: string): string =>
  s.replace(ansiEscapePattern, "");

// ============================================================================
// Line Handling
// ============================================================================

const lineBreakPattern = /\r?\n/;

/**
 * Split file content into lines, each trimmed of surrounding whitespace
 * and ANSI escapes. A trailing newline does not produce an empty last line.
 */
export const splitLogLines = (content: string): string[] => {
  if (content === "") {
    return [];
  }
  const lines = content.split(lineBreakPattern);
  if (lines.at(-1) === "") {
    lines.pop();
  }
  return lines.map((line) => stripAnsi(line).trim());
};

// ============================================================================
// Number Parsing
// ============================================================================

/**
 * Safely parse a non-negative integer string.
 * Returns undefined for empty, invalid, negative or overflowing input.
 */
export const safeParseInt = (s: string | undefined): number | undefined => {
  if (!s) {
    return undefined;
  }
  const n = Number.parseInt(s, 10);
  if (Number.isNaN(n) || n < 0 || n > Number.MAX_SAFE_INTEGER) {
    return undefined;
  }
  return n;
};

// ============================================================================
// Unknown Value Narrowing
// ============================================================================

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
