/**
 * Log source parsers.
 *
 * Each parser handles one file format:
 * - JUnit XML test results (90)
 * - Ninja build logs (60)
 */

export { createJUnitParser, JUnitParser } from "./junit.js";
export {
  BUILD_STOPPED_PREFIX,
  createNinjaParser,
  FAILED_PREFIX,
  findFailuresInBuildLogs,
  findNinjaFailures,
  maxFailureLines,
  NinjaParser,
} from "./ninja.js";
