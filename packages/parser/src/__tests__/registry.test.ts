/**
 * Tests for the ParserRegistry class.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { createDefaultRegistry } from "../index.js";
import {
  BaseLogParser,
  type LogFile,
  type ParseResult,
} from "../parser-types.js";
import { createRegistry, ParserRegistry } from "../registry.js";

// ============================================================================
// Test Fixtures - Mock Parsers
// ============================================================================

class MockParser extends BaseLogParser {
  readonly id: string;
  readonly priority: number;
  protected readonly extensions = [".mock"];
  private readonly confidence: number;

  constructor(id: string, priority: number, confidence = 0.5) {
    super();
    this.id = id;
    this.priority = priority;
    this.confidence = confidence;
  }

  canParse = (_file: LogFile): number => this.confidence;

  parse = (file: LogFile): ParseResult => ({
    kind: "build-log",
    document: { path: `${this.id}:${file.path}`, lines: [] },
  });
}

const file = (path: string, content = ""): LogFile => ({ path, content });

// ============================================================================
// Registration
// ============================================================================

describe("ParserRegistry", () => {
  let registry: ParserRegistry;

  beforeEach(() => {
    registry = createRegistry();
  });

  it("creates an empty registry", () => {
    expect(registry).toBeInstanceOf(ParserRegistry);
    expect(registry.allParsers()).toEqual([]);
  });

  it("keeps parsers sorted by priority", () => {
    registry.register(new MockParser("low", 10));
    registry.register(new MockParser("high", 90));
    registry.register(new MockParser("mid", 50));

    expect(registry.allParsers().map((p) => p.id)).toEqual([
      "high",
      "mid",
      "low",
    ]);
  });

  it("replaces a parser registered under the same id", () => {
    registry.register(new MockParser("dup", 10, 0.1));
    registry.register(new MockParser("dup", 20, 0.9));

    expect(registry.allParsers()).toHaveLength(1);
    expect(registry.get("dup")?.priority).toBe(20);
  });

  it("lists parser ids alphabetically", () => {
    registry.register(new MockParser("zeta", 10));
    registry.register(new MockParser("alpha", 90));

    expect(registry.supportedParserIDs()).toEqual(["alpha", "zeta"]);
  });

  // ==========================================================================
  // Selection
  // ==========================================================================

  it("selects the most confident parser", () => {
    registry.register(new MockParser("unsure", 90, 0.2));
    registry.register(new MockParser("sure", 10, 0.8));

    expect(registry.findParser(file("a.mock"))?.id).toBe("sure");
  });

  it("breaks confidence ties by priority", () => {
    registry.register(new MockParser("first", 10, 0.5));
    registry.register(new MockParser("second", 50, 0.5));

    expect(registry.findParser(file("a.mock"))?.id).toBe("second");
  });

  it("returns undefined when no parser is confident", () => {
    registry.register(new MockParser("never", 50, 0));

    expect(registry.findParser(file("a.mock"))).toBeUndefined();
    expect(registry.parse(file("a.mock"))).toBeNull();
  });

  it("parses with the selected parser", () => {
    registry.register(new MockParser("only", 50, 1));

    expect(registry.parse(file("a.mock"))).toEqual({
      kind: "build-log",
      document: { path: "only:a.mock", lines: [] },
    });
  });
});

// ============================================================================
// Default Registry
// ============================================================================

describe("createDefaultRegistry", () => {
  const registry = createDefaultRegistry();

  it("registers the JUnit and Ninja parsers", () => {
    expect(registry.allParsers().map((p) => p.id)).toEqual(["junit", "ninja"]);
  });

  it("routes JUnit content to the JUnit parser even with a .log name", () => {
    const junit = file("results.log", '<testsuite name="S"></testsuite>');

    expect(registry.findParser(junit)?.id).toBe("junit");
  });

  it("routes ninja logs to the Ninja parser", () => {
    expect(registry.findParser(file("ninja.log", "[1/1] ok"))?.id).toBe(
      "ninja"
    );
  });

  it("recognizes nothing in an unrelated file", () => {
    expect(registry.findParser(file("README.md", "# hello"))).toBeUndefined();
  });
});
