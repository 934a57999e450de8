/**
 * JUnit XML test result parser.
 *
 * Handles the documents lit and most test runners write:
 * - a `<testsuites>` root holding `<testsuite>` elements
 * - a bare `<testsuite>` root
 * - nested `<testsuite>` elements (flattened depth-first)
 *
 * Each `<testcase>` is classified by its first result child:
 * `<failure>` → failed, `<error>` → errored, `<skipped>` → skipped.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { BaseLogParser, type LogFile, type ParseResult } from "../parser-types.js";
import type { TestCaseResult, TestOutcome, TestSuiteResult } from "../types.js";
import { isRecord, safeParseInt } from "../utils.js";

// ============================================================================
// Patterns
// ============================================================================

const xmlStartPattern = /^\s*</;
const suiteTagPattern = /<testsuites?[\s>/]/;

const attributePrefix = "@_";
const textKey = "#text";

const repeatedElements = new Set([
  "testsuite",
  "testcase",
  "failure",
  "error",
  "skipped",
]);

// ============================================================================
// XML Node Helpers
// ============================================================================

const asNodes = (value: unknown): unknown[] => {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
};

const attribute = (node: unknown, name: string): string | undefined => {
  if (!isRecord(node)) {
    return undefined;
  }
  const value = node[`${attributePrefix}${name}`];
  return typeof value === "string" ? value : undefined;
};

const elementText = (node: unknown): string => {
  if (typeof node === "string") {
    return node;
  }
  if (isRecord(node)) {
    const text = node[textKey];
    return typeof text === "string" ? text : "";
  }
  return "";
};

/**
 * Captured output of a `<failure>` or `<error>` element, unchanged. Falls
 * back to the message attribute when the element holds only whitespace.
 */
const resultMessage = (node: unknown): string => {
  const text = elementText(node);
  if (text.trim() !== "") {
    return text;
  }
  return attribute(node, "message") ?? "";
};

const child = (node: unknown, name: string): unknown[] =>
  isRecord(node) ? asNodes(node[name]) : [];

// ============================================================================
// Conversion
// ============================================================================

const toTestCase = (node: unknown): TestCaseResult => {
  const classname = attribute(node, "classname") ?? "";
  const name = attribute(node, "name") ?? "";

  const [failure] = child(node, "failure");
  const [error] = child(node, "error");
  const skipped = child(node, "skipped");

  let outcome: TestOutcome = "passed";
  let message = "";
  if (failure !== undefined) {
    outcome = "failed";
    message = resultMessage(failure);
  } else if (error !== undefined) {
    outcome = "errored";
    message = resultMessage(error);
  } else if (skipped.length > 0) {
    outcome = "skipped";
  }

  return { classname, name, outcome, message };
};

const countOutcome = (
  cases: readonly TestCaseResult[],
  outcome: TestOutcome
): number => cases.filter((c) => c.outcome === outcome).length;

/**
 * Counter attribute of a leaf suite. A suite holding nested suites may
 * carry totals that include them, so its counters come from its own cases.
 */
const suiteCounter = (
  node: unknown,
  name: string,
  isLeaf: boolean,
  fallback: number
): number =>
  (isLeaf ? safeParseInt(attribute(node, name)) : undefined) ?? fallback;

const toSuites = (node: unknown, out: TestSuiteResult[]): void => {
  const cases = child(node, "testcase").map(toTestCase);
  const nestedSuites = child(node, "testsuite");
  const isLeaf = nestedSuites.length === 0;

  out.push({
    name: attribute(node, "name") ?? "",
    tests: suiteCounter(node, "tests", isLeaf, cases.length),
    failures: suiteCounter(
      node,
      "failures",
      isLeaf,
      countOutcome(cases, "failed")
    ),
    errors: suiteCounter(node, "errors", isLeaf, countOutcome(cases, "errored")),
    skipped: suiteCounter(
      node,
      "skipped",
      isLeaf,
      countOutcome(cases, "skipped")
    ),
    cases,
  });

  for (const nested of nestedSuites) {
    toSuites(nested, out);
  }
};

// ============================================================================
// Parser
// ============================================================================

export class JUnitParser extends BaseLogParser {
  readonly id = "junit";
  readonly priority = 90;
  protected readonly extensions = [".xml"] as const;

  private readonly xml = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: attributePrefix,
    textNodeName: textKey,
    alwaysCreateTextNode: true,
    parseTagValue: false,
    trimValues: false,
    isArray: (tagName) => repeatedElements.has(tagName),
  });

  canParse(file: LogFile): number {
    if (!xmlStartPattern.test(file.content)) {
      return 0;
    }
    if (!suiteTagPattern.test(file.content)) {
      return 0;
    }
    return this.hasKnownExtension(file) ? 1.0 : 0.9;
  }

  parse(file: LogFile): ParseResult {
    const validation = XMLValidator.validate(file.content);
    if (validation !== true) {
      const { msg, line } = validation.err;
      throw new Error(`invalid JUnit XML: ${msg} (line ${line})`);
    }

    const root: unknown = this.xml.parse(file.content);
    if (!isRecord(root)) {
      return null;
    }

    const suites: TestSuiteResult[] = [];
    if ("testsuites" in root) {
      for (const suite of child(root.testsuites, "testsuite")) {
        toSuites(suite, suites);
      }
    } else if ("testsuite" in root) {
      for (const suite of asNodes(root.testsuite)) {
        toSuites(suite, suites);
      }
    } else {
      return null;
    }

    return {
      kind: "test-results",
      document: { path: file.path, suites },
    };
  }
}

export const createJUnitParser = (): JUnitParser => new JUnitParser();
