/**
 * Parser interface types for log source parsers.
 */

import type { BuildLogDocument, TestResultDocument } from "./types.js";

// ============================================================================
// Log Files
// ============================================================================

/**
 * A candidate log file read from disk.
 */
export interface LogFile {
  /** Path as given on the command line */
  readonly path: string;

  /** Full file content decoded as UTF-8 */
  readonly content: string;
}

/**
 * Lower-cased extension of a log path including the dot, or "" when the
 * path has none.
 */
export const extensionOf = (path: string): string => {
  const slash = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  const base = path.slice(slash + 1);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot).toLowerCase() : "";
};

// ============================================================================
// Parse Results
// ============================================================================

/**
 * Tagged union of everything a log parser can produce.
 */
export type ParsedLogSource =
  | { readonly kind: "test-results"; readonly document: TestResultDocument }
  | { readonly kind: "build-log"; readonly document: BuildLogDocument };

/**
 * ParseResult represents the result of parsing a file.
 * null means the file is not in this parser's format after all.
 */
export type ParseResult = ParsedLogSource | null;

// ============================================================================
// Log Source Parser Interface
// ============================================================================

/**
 * LogSourceParser defines the interface for format-specific parsers.
 * Each format (JUnit XML, Ninja log) implements this interface, and the
 * registry picks a parser by asking each one how confident it is.
 */
export interface LogSourceParser {
  /**
   * Unique identifier for this parser (e.g., "junit", "ninja").
   */
  readonly id: string;

  /**
   * Parse order priority. Higher values win ties between equally
   * confident parsers.
   *   90-100: Structured formats (exact document match)
   *   50-89:  Tool logs with recognizable markers
   *   0-49:   Fallback parsers
   */
  readonly priority: number;

  /**
   * Returns a confidence score (0.0-1.0) that this parser handles the file.
   * Returns 0 if the file is not in this parser's format.
   */
  canParse(file: LogFile): number;

  /**
   * Parses the file.
   * Throws when the file looks like this format but is malformed; the
   * loader treats that as a corrupt input and skips it.
   */
  parse(file: LogFile): ParseResult;
}

// ============================================================================
// Base Parser Implementation
// ============================================================================

/**
 * Abstract base class with the extension-hint helper most parsers share.
 */
export abstract class BaseLogParser implements LogSourceParser {
  abstract readonly id: string;
  abstract readonly priority: number;

  /** Extensions that make this parser a likely match */
  protected abstract readonly extensions: readonly string[];

  abstract canParse(file: LogFile): number;
  abstract parse(file: LogFile): ParseResult;

  protected hasKnownExtension(file: LogFile): boolean {
    return this.extensions.includes(extensionOf(file.path));
  }
}
