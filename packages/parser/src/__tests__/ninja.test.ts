/**
 * Tests for Ninja build log failure extraction.
 */

import { describe, expect, it } from "vitest";
import {
  createNinjaParser,
  findFailuresInBuildLogs,
  findNinjaFailures,
  maxFailureLines,
} from "../parsers/ninja.js";

describe("findNinjaFailures", () => {
  it("extracts a single failure up to the next progress line", () => {
    const failures = findNinjaFailures([
      "[1/5] test/1.stamp",
      "[2/5] test/2.stamp",
      "[3/5] test/3.stamp",
      "[4/5] test/4.stamp",
      "FAILED: touch test/4.stamp",
      "Wow! This system is really broken!",
      "[5/5] test/5.stamp",
    ]);

    expect(failures).toEqual([
      {
        name: "touch test/4.stamp",
        message:
          "FAILED: touch test/4.stamp\nWow! This system is really broken!",
      },
    ]);
  });

  it("returns nothing for a clean log", () => {
    expect(
      findNinjaFailures([
        "[1/3] test/1.stamp",
        "[2/3] test/2.stamp",
        "[3/3] test/3.stamp",
      ])
    ).toEqual([]);
  });

  it("extracts multiple failures in log order", () => {
    const failures = findNinjaFailures([
      "[1/5] test/1.stamp",
      "[2/5] test/2.stamp",
      "FAILED: touch test/2.stamp",
      "First failure!",
      "[3/5] test/3.stamp",
      "[4/5] test/4.stamp",
      "FAILED: touch test/4.stamp",
      "Second failure!",
      "[5/5] test/5.stamp",
    ]);

    expect(failures.map((f) => f.name)).toEqual([
      "touch test/2.stamp",
      "touch test/4.stamp",
    ]);
    expect(failures[1]?.message).toBe(
      "FAILED: touch test/4.stamp\nSecond failure!"
    );
  });

  it("stops a failure at the build-stopped line", () => {
    const failures = findNinjaFailures([
      "[1/2] compile a.o",
      "FAILED: a.o",
      "a.cpp:1:1: error: expected ';'",
      "ninja: build stopped: subcommand failed.",
    ]);

    expect(failures).toEqual([
      { name: "a.o", message: "FAILED: a.o\na.cpp:1:1: error: expected ';'" },
    ]);
  });

  it("skips the echo of a sub-ninja failure", () => {
    const failures = findNinjaFailures([
      "[1/2] inner",
      "FAILED: inner.o",
      "inner error",
      "ninja: build stopped: subcommand failed.",
      "FAILED: runtimes/CMakeFiles/check-runtimes",
      "cd /build/runtimes && ninja check-runtimes",
    ]);

    expect(failures.map((f) => f.name)).toEqual(["inner.o"]);
  });

  it("caps captured output", () => {
    const noise = Array.from({ length: maxFailureLines + 20 }, (_, i) => `line ${i}`);
    const [failure] = findNinjaFailures(["FAILED: big", ...noise]);

    expect(failure?.message.split("\n")).toHaveLength(maxFailureLines);
  });

  it("returns frozen records", () => {
    const [failure] = findNinjaFailures(["FAILED: x", "boom"]);

    expect(Object.isFrozen(failure)).toBe(true);
  });
});

describe("findFailuresInBuildLogs", () => {
  it("concatenates failures across logs in order", () => {
    const failures = findFailuresInBuildLogs([
      { path: "ninja.log", lines: ["FAILED: one", "[2/2] done"] },
      { path: "ninja_runtimes.log", lines: ["FAILED: two"] },
    ]);

    expect(failures.map((f) => f.name)).toEqual(["one", "two"]);
  });
});

describe("NinjaParser", () => {
  const parser = createNinjaParser();

  it("claims .log files", () => {
    expect(parser.canParse({ path: "ninja.log", content: "" })).toBe(0.8);
  });

  it("recognizes ninja output without a .log extension", () => {
    expect(
      parser.canParse({ path: "build-output.txt", content: "[1/9] cc a.c\n" })
    ).toBe(0.5);
  });

  it("ignores unrelated text", () => {
    expect(
      parser.canParse({ path: "notes.txt", content: "nothing to see" })
    ).toBe(0);
  });

  it("splits and trims lines", () => {
    const result = parser.parse({
      path: "ninja.log",
      content: "  [1/2] a  \r\nFAILED: b\n\u001b[31merror\u001b[0m\n",
    });

    expect(result).toEqual({
      kind: "build-log",
      document: { path: "ninja.log", lines: ["[1/2] a", "FAILED: b", "error"] },
    });
  });
});
