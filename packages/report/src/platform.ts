/**
 * Platform identification for reports and comment reconciliation.
 *
 * The tag (`linux-x86_64`) keys the status comment of a platform; the title
 * (`:penguin: Linux x64 Test Results`) heads the report.
 */

import { machine, type } from "node:os";
import type { PlatformInfo, PlatformTag } from "./types.js";

const WINDOWS = "Windows";
const WHITESPACE = /\s+/g;

/** Architectures displayed as x64 in titles */
const X64_MACHINES = new Set(["x86_64", "AMD64", "amd64", "x64"]);

/**
 * Map `os.type()` onto the conventional system name.
 * Node reports Windows as "Windows_NT".
 */
export const normalizeSystemName = (osType: string): string =>
  osType === "Windows_NT" ? WINDOWS : osType;

/**
 * Describe the machine this process runs on.
 */
export const detectPlatform = (): PlatformInfo => ({
  system: normalizeSystemName(type()),
  machine: machine(),
});

/**
 * Build the platform tag: `{system}-{machine}` in lower case.
 * Two runs on the same platform always produce the same tag.
 */
export const computePlatformTag = (platform: PlatformInfo): PlatformTag =>
  `${platform.system.trim()}-${platform.machine.trim()}`
    .toLowerCase()
    .replace(WHITESPACE, "_") as PlatformTag;

/**
 * Build the report title for a platform.
 */
export const computePlatformTitle = (platform: PlatformInfo): string => {
  const logo = platform.system === WINDOWS ? ":window:" : ":penguin:";
  const arch = X64_MACHINES.has(platform.machine) ? "x64" : platform.machine;
  return `${logo} ${platform.system} ${arch} Test Results`;
};
