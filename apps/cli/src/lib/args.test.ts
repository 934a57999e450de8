import { describe, expect, it } from "vitest";
import { parseReturnCode, remainingPositionals } from "./args.js";
import { MissingArgumentError } from "./errors.js";

describe("parseReturnCode", () => {
  it("parses integers", () => {
    expect(parseReturnCode("0")).toBe(0);
    expect(parseReturnCode(" 2 ")).toBe(2);
    expect(parseReturnCode("-1")).toBe(-1);
  });

  it("rejects anything else", () => {
    expect(() => parseReturnCode("abc")).toThrow('invalid return code: "abc"');
    expect(() => parseReturnCode(undefined)).toThrow(MissingArgumentError);
    expect(() => parseReturnCode("1.5")).toThrow(MissingArgumentError);
  });
});

describe("remainingPositionals", () => {
  it("drops the named positionals", () => {
    expect(remainingPositionals(["1", "a.xml", "b.log"], 1)).toEqual([
      "a.xml",
      "b.log",
    ]);
  });
});
