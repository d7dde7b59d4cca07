/**
 * Core types shared by the scanner, report, and renderers.
 */

import type { Matcher } from "./matchers";

/**
 * Resolved severity of a rule or a match.
 * - fail: a policy violation, makes the scan exit 1
 * - notice: surfaced in the report, never affects the exit code
 */
export type Severity = "fail" | "notice";

export const SEVERITIES: readonly Severity[] = ["fail", "notice"];

/**
 * Pattern as written in configuration. A bare string is a literal.
 */
export type PatternDefinition =
  | string
  | { literal: string; ignore_case?: boolean }
  | { regex: string; ignore_case?: boolean }
  | { multiline: string; ignore_case?: boolean };

export interface RuleExceptionDefinition {
  context: PatternDefinition;
  description?: string;
}

/**
 * A rule as supplied by configuration, before validation.
 */
export interface RuleDefinition {
  id: string;
  pattern: PatternDefinition;
  severity: string;
  message?: string;
  exceptions?: RuleExceptionDefinition[];
  remediation?: string[];
}

export interface CompiledException {
  readonly context: Matcher;
  readonly description: string;
}

/**
 * A validated rule with compiled matchers.
 */
export interface CompiledRule {
  readonly id: string;
  readonly matcher: Matcher;
  readonly severity: Severity;
  readonly message: string;
  readonly exceptions: readonly CompiledException[];
  readonly remediation: readonly string[];
}

/**
 * One occurrence of a rule's pattern in a scanned file.
 */
export interface Match {
  readonly file: string;
  /** 1-based line number; 0 for entries about the whole file. */
  readonly line: number;
  readonly matchedText: string;
  readonly ruleId: string;
  readonly severity: Severity;
  readonly message: string;
  /** Description of the exception that downgraded this match, if any. */
  readonly exception?: string;
}

export interface ScanStats {
  readonly filesScanned: number;
  /** Binary files skipped without being reported. */
  readonly filesSkipped: number;
}

export interface Report {
  readonly errors: readonly Match[];
  readonly notices: readonly Match[];
  readonly exitCode: 0 | 1;
  readonly stats: ScanStats;
}

/**
 * Rule id used for files or directories that could not be read mid-walk.
 */
export const FILE_ACCESS_RULE_ID = "file-access";
