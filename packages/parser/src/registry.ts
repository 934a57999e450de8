/**
 * Parser Registry for managing log source parsers.
 */

import {
  extensionOf,
  type LogFile,
  type LogSourceParser,
  type ParseResult,
} from "./parser-types.js";

// ============================================================================
// Parser Registry
// ============================================================================

/**
 * ParserRegistry manages log source parsers and routes files to the
 * appropriate parser. It keeps parsers in priority order and selects by
 * confidence, so callers never branch on file formats themselves.
 */
export class ParserRegistry {
  private readonly parsers: LogSourceParser[] = [];
  private readonly byID: Map<string, LogSourceParser> = new Map();

  /**
   * Register a parser with the registry.
   * Parsers are automatically sorted by priority (highest first).
   * Registering a second parser with the same ID replaces the first.
   */
  register(parser: LogSourceParser): void {
    const existing = this.byID.get(parser.id);
    if (existing) {
      this.parsers.splice(this.parsers.indexOf(existing), 1);
    }
    this.parsers.push(parser);
    this.byID.set(parser.id, parser);

    // Sort by priority descending (highest priority first)
    this.parsers.sort((a, b) => b.priority - a.priority);
  }

  /**
   * Get a parser by ID, or undefined if not found.
   */
  get(id: string): LogSourceParser | undefined {
    return this.byID.get(id);
  }

  /**
   * Find the parser most confident it can handle the file.
   * Ties go to the higher-priority parser. Returns undefined when no parser
   * reports a positive confidence.
   */
  findParser(file: LogFile): LogSourceParser | undefined {
    let best: LogSourceParser | undefined;
    let bestScore = 0;

    for (const p of this.parsers) {
      const score = p.canParse(file);
      if (score > bestScore) {
        bestScore = score;
        best = p;
      }
    }

    return best;
  }

  /**
   * Parse a file with the best matching parser.
   * Returns null when no parser recognizes the file. Errors thrown by the
   * parser propagate to the caller.
   */
  parse(file: LogFile): ParseResult {
    const parser = this.findParser(file);
    return parser ? parser.parse(file) : null;
  }

  /**
   * Get all registered parsers in priority order.
   */
  allParsers(): readonly LogSourceParser[] {
    return this.parsers;
  }

  /**
   * Get all registered parser IDs, sorted.
   */
  supportedParserIDs(): string[] {
    return [...this.byID.keys()].sort();
  }
}

/**
 * Create a new empty parser registry.
 */
export const createRegistry = (): ParserRegistry => new ParserRegistry();

/**
 * Describe why a file was not recognized, for the loader's skip notice.
 */
export const describeUnrecognized = (file: LogFile): string => {
  const ext = extensionOf(file.path);
  return ext
    ? `no parser recognizes ${ext} content`
    : "no parser recognizes the file content";
};
