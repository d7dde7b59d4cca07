/**
 * Report assembly.
 */

import { EXIT_CODES } from "../core/errors";
import { comparePaths } from "./walk";
import type { Match, Report, ScanStats } from "./types";

/**
 * Order matches by file, then line. Array.prototype.sort is stable, so
 * matches sharing a file and line keep their discovery order.
 */
export function compareMatches(a: Match, b: Match): number {
  return comparePaths(a.file, b.file) || a.line - b.line;
}

/**
 * Exit code of a report: depends only on whether errors exist.
 */
export function exitCodeFor(errors: readonly Match[]): 0 | 1 {
  return errors.length === 0 ? EXIT_CODES.PASS : EXIT_CODES.FAIL;
}

/**
 * Split matches by resolved severity and build the final report.
 */
export function buildReport(matches: readonly Match[], stats: ScanStats): Report {
  const sorted = [...matches].sort(compareMatches);
  const errors = sorted.filter((m) => m.severity === "fail");
  const notices = sorted.filter((m) => m.severity === "notice");

  return {
    errors,
    notices,
    exitCode: exitCodeFor(errors),
    stats,
  };
}
