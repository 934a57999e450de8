/**
 * Markdown building blocks shared by every report section.
 */

import type { FailureRecord } from "@premerge/parser";
import type { ExplanationEntry, ExplanationList } from "./types.js";

export const ALREADY_FAILING_SUFFIX = " (Likely Already Failing)";

const BACKTICK_RUN = /`{3,}/g;

/**
 * Explained entries keyed by failure name. Unexplained and null entries are
 * dropped; the first entry for a name wins.
 */
export const indexExplanations = (
  explanations: ExplanationList | undefined
): Map<string, ExplanationEntry> => {
  const byName = new Map<string, ExplanationEntry>();
  for (const entry of explanations ?? []) {
    if (entry?.explained && !byName.has(entry.name)) {
      byName.set(entry.name, entry);
    }
  }
  return byName;
};

/**
 * Code fence long enough that no backtick run inside `text` closes it.
 */
export const fenceFor = (text: string): string => {
  let longest = 2;
  for (const match of text.matchAll(BACKTICK_RUN)) {
    longest = Math.max(longest, match[0].length);
  }
  return "`".repeat(longest + 1);
};

/**
 * Render one failure as a collapsible block:
 *
 *   <details>
 *   <summary>name</summary>
 *
 *   ```
 *   message
 *   ```
 *   </details>
 *
 * An explained failure gets the "Likely Already Failing" suffix and its
 * reason ahead of the output.
 */
export const formatFailureDetails = (
  failure: FailureRecord,
  explanations: ReadonlyMap<string, ExplanationEntry>
): string[] => {
  const explanation = explanations.get(failure.name);
  const output = ["<details>"];

  if (explanation) {
    output.push(
      `<summary>${failure.name}${ALREADY_FAILING_SUFFIX}</summary>`,
      ""
    );
    if (explanation.reason) {
      output.push(explanation.reason, "");
    }
  } else {
    output.push(`<summary>${failure.name}</summary>`, "");
  }

  const fence = fenceFor(failure.message);
  output.push(fence, failure.message, fence, "</details>");
  return output;
};

/**
 * "test" or "tests" to match the count.
 */
export const pluralTests = (count: number): string =>
  count === 1 ? "test" : "tests";
