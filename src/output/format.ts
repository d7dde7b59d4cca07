/**
 * Report rendering for terminals and CI logs.
 */

import type { CompiledRule, Match, Report } from "../analysis/types";

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * `file:line`, or just the file for whole-file entries.
 */
export function formatLocation(match: Match): string {
  const file = match.file || ".";
  return match.line > 0 ? `${file}:${match.line}` : file;
}

/**
 * One report line for a match.
 */
export function formatMatch(match: Match): string {
  let line = `${formatLocation(match)} [${match.ruleId}] ${match.message}`;
  if (match.matchedText) {
    line += `: "${match.matchedText}"`;
  }
  if (match.exception) {
    line += ` (allowed: ${match.exception})`;
  }
  return line;
}

/**
 * Summary line: status, counts, files scanned.
 */
export function formatSummary(report: Report): string {
  const status = report.exitCode === 0 ? "PASS" : "FAIL";
  return (
    `policy-scan: ${status} - ${plural(report.errors.length, "error")}, ` +
    `${plural(report.notices.length, "notice")}, ${plural(report.stats.filesScanned, "file")} scanned`
  );
}

export interface TextRenderOptions {
  /**
   * Compiled rules, used to print remediation for rules with errors.
   */
  rules?: readonly CompiledRule[];
}

/**
 * Render a report as grouped, human-readable text.
 */
export function renderText(report: Report, options: TextRenderOptions = {}): string {
  const out: string[] = [formatSummary(report)];

  if (report.errors.length > 0) {
    out.push("", "Errors:");
    for (const match of report.errors) {
      out.push(`  ${formatMatch(match)}`);
    }
  }

  if (report.notices.length > 0) {
    out.push("", "Notices:");
    for (const match of report.notices) {
      out.push(`  ${formatMatch(match)}`);
    }
  }

  const failingRules = new Set(report.errors.map((m) => m.ruleId));
  const fixes = (options.rules ?? []).filter((r) => failingRules.has(r.id) && r.remediation.length > 0);
  if (fixes.length > 0) {
    out.push("", "Suggested fixes:");
    for (const rule of fixes) {
      out.push(`  ${rule.id}:`);
      for (const step of rule.remediation) {
        out.push(`    - ${step}`);
      }
    }
  }

  return `${out.join("\n")}\n`;
}

/**
 * Render a report as JSON for machine consumption.
 */
export function renderJson(report: Report): string {
  return `${JSON.stringify(
    {
      exitCode: report.exitCode,
      errors: report.errors,
      notices: report.notices,
      stats: report.stats,
    },
    null,
    2
  )}\n`;
}
