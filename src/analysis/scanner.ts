/**
 * Policy scanning over a documentation tree.
 *
 * Walks every regular file under a root, applies the rule set line by line
 * (or to the whole text for multiline rules), resolves each match's
 * severity through contextual exceptions, and returns a deterministic report.
 */

import * as fs from "fs";
import * as path from "path";
import { SetupError, describeError } from "../core/errors";
import { INLINE_ALLOW_DESCRIPTION, isAllowed, parseAllowDirectives } from "../core/suppression";
import { logger } from "../logger";
import { DEFAULT_CONTEXT_WINDOW, findApplicableException, getContextText } from "./exceptions";
import { buildReport } from "./report";
import { compileRules, resolveRuleSettings, type RuleOverride } from "./rules";
import { FILE_ACCESS_RULE_ID, type CompiledRule, type Match, type Report, type Severity } from "./types";
import { walkFiles } from "./walk";

/**
 * Bytes inspected when deciding whether a file is binary.
 */
export const BINARY_SNIFF_BYTES = 8000;

export interface ScanOptions {
  /** Lines on each side of a match searched for exception context (default: 3). */
  contextWindow?: number;
  /** File globs to scan; empty scans every regular file. */
  include?: readonly string[];
  /** Path-specific rule settings, applied in order. */
  overrides?: readonly RuleOverride[];
  /** File reader, replaceable for tests. */
  readFile?: (absPath: string) => Buffer;
}

export interface TextScanOptions {
  contextWindow?: number;
  overrides?: readonly RuleOverride[];
}

/**
 * Check whether file content looks binary (NUL byte near the start).
 */
export function isBinaryContent(content: Buffer): boolean {
  return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * 0-based index of the line containing an offset.
 */
function lineIndexAt(lineStarts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo;
}

function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
}

interface RawHit {
  rule: CompiledRule;
  ruleIndex: number;
  firstLine: number;
  lastLine: number;
  text: string;
}

function collectHits(text: string, lines: readonly string[], rule: CompiledRule, ruleIndex: number): RawHit[] {
  const hits: RawHit[] = [];

  if (rule.matcher.kind !== "multiline") {
    for (let i = 0; i < lines.length; i++) {
      const found = rule.matcher.find(lines[i]);
      if (found) {
        hits.push({ rule, ruleIndex, firstLine: i, lastLine: i, text: found.text });
      }
    }
    return hits;
  }

  const lineStarts = computeLineStarts(text);
  const seenLines = new Set<number>();
  for (const found of rule.matcher.findAll(text)) {
    const firstLine = lineIndexAt(lineStarts, found.index);
    if (seenLines.has(firstLine)) {
      continue;
    }
    seenLines.add(firstLine);
    const endOffset = found.index + Math.max(found.text.length - 1, 0);
    hits.push({
      rule,
      ruleIndex,
      firstLine,
      lastLine: lineIndexAt(lineStarts, endOffset),
      text: found.text.trim(),
    });
  }
  return hits;
}

/**
 * Apply compiled rules to the text of a single file.
 *
 * @param relPath - Root-relative path reported in matches
 * @param text - File content
 * @param rules - Compiled rule set
 * @returns Matches ordered by line, then rule declaration order
 */
export function scanText(
  relPath: string,
  text: string,
  rules: readonly CompiledRule[],
  options: TextScanOptions = {}
): Match[] {
  const contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
  const overrides = options.overrides ?? [];
  // Multiline patterns are written against \n, so CRLF and CR endings are folded first
  const normalized = text.replace(/\r\n?/g, "\n");
  const lines = normalized.split("\n");
  const directives = parseAllowDirectives(lines, new Set(rules.map((r) => r.id)));

  const hits: { hit: RawHit; severity: Severity }[] = [];
  rules.forEach((rule, ruleIndex) => {
    const settings = resolveRuleSettings(rule, relPath, overrides);
    if (!settings.enabled) {
      return;
    }
    for (const hit of collectHits(normalized, lines, rule, ruleIndex)) {
      hits.push({ hit, severity: settings.severity });
    }
  });

  hits.sort((a, b) => a.hit.firstLine - b.hit.firstLine || a.hit.ruleIndex - b.hit.ruleIndex);

  return hits.map(({ hit, severity }): Match => {
    const base = {
      file: relPath,
      line: hit.firstLine + 1,
      matchedText: hit.text,
      ruleId: hit.rule.id,
      message: hit.rule.message,
    };

    // Exceptions only ever downgrade; a notice stays a notice
    if (severity === "notice") {
      return { ...base, severity };
    }

    const context = getContextText(lines, hit.firstLine, hit.lastLine, contextWindow);
    const exception = findApplicableException(hit.rule, context);
    if (exception) {
      return { ...base, severity: "notice", exception: exception.description };
    }

    if (isAllowed(hit.rule.id, hit.firstLine + 1, directives)) {
      return { ...base, severity: "notice", exception: INLINE_ALLOW_DESCRIPTION };
    }

    return { ...base, severity: "fail" };
  });
}

function fileAccessNotice(relPath: string, reason: string): Match {
  return {
    file: relPath,
    line: 0,
    matchedText: "",
    ruleId: FILE_ACCESS_RULE_ID,
    severity: "notice",
    message: `Skipped unreadable path: ${reason}`,
  };
}

function assertReadableDirectory(root: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch (err) {
    throw new SetupError(`Cannot read root directory ${root}: ${describeError(err)}`, { cause: err });
  }
  if (!stat.isDirectory()) {
    throw new SetupError(`Root is not a directory: ${root}`);
  }
  try {
    fs.accessSync(root, fs.constants.R_OK | fs.constants.X_OK);
  } catch (err) {
    throw new SetupError(`Cannot read root directory ${root}: ${describeError(err)}`, { cause: err });
  }
}

function validateContextWindow(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new SetupError(`Context window must be a non-negative integer (got ${value})`);
  }
  return value;
}

/**
 * Scan a directory tree against a rule set.
 *
 * Rules and root are validated before any file is read. Identical inputs
 * always produce an identical report.
 *
 * @param root - Directory to scan
 * @param rules - Rule definitions, validated and compiled here
 * @param exclusions - Directory patterns skipped entirely during the walk
 * @param options - Context window, include globs, per-path overrides
 * @throws SetupError on a malformed rule set or an unusable root
 */
export function scan(
  root: string,
  rules: readonly unknown[],
  exclusions: readonly string[],
  options: ScanOptions = {}
): Report {
  const compiled = compileRules(rules);
  const contextWindow = validateContextWindow(options.contextWindow ?? DEFAULT_CONTEXT_WINDOW);
  const readFile = options.readFile ?? ((absPath: string) => fs.readFileSync(absPath));

  const absRoot = path.resolve(root);
  assertReadableDirectory(absRoot);

  const { files, failures } = walkFiles(absRoot, exclusions, options.include ?? []);
  logger.debug("Collected files for policy scan", { root: absRoot, files: files.length });

  const matches: Match[] = [];
  let filesScanned = 0;
  let filesSkipped = 0;

  for (const failure of failures) {
    logger.warn("Could not list directory", { path: failure.relPath, reason: failure.reason });
    matches.push(fileAccessNotice(failure.relPath, failure.reason));
  }

  for (const file of files) {
    let content: Buffer;
    try {
      content = readFile(file.absPath);
    } catch (err) {
      const reason = describeError(err);
      logger.warn("Could not read file", { path: file.relPath, reason });
      matches.push(fileAccessNotice(file.relPath, reason));
      continue;
    }

    if (isBinaryContent(content)) {
      logger.debug("Skipping binary file", { path: file.relPath });
      filesSkipped++;
      continue;
    }

    filesScanned++;
    const fileMatches = scanText(file.relPath, content.toString("utf8"), compiled, {
      contextWindow,
      overrides: options.overrides,
    });
    matches.push(...fileMatches);
  }

  const report = buildReport(matches, { filesScanned, filesSkipped });
  logger.debug("Policy scan complete", {
    filesScanned,
    filesSkipped,
    errors: report.errors.length,
    notices: report.notices.length,
  });
  return report;
}
