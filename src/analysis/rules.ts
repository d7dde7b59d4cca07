/**
 * Rule validation and compilation.
 *
 * Rule definitions arrive from YAML or from API callers and are validated
 * here before any file is touched. Every problem becomes a SetupError so a
 * malformed rule can never silently pass.
 */

import { minimatch } from "minimatch";
import { SetupError } from "../core/errors";
import { compilePattern, PatternError, type Matcher } from "./matchers";
import {
  FILE_ACCESS_RULE_ID,
  SEVERITIES,
  type CompiledException,
  type CompiledRule,
  type Severity,
} from "./types";

/**
 * Per-rule settings that configuration can change for matching paths.
 */
export interface RuleSettings {
  enabled?: boolean;
  severity?: Severity;
}

/**
 * A rule override that applies to specific file patterns.
 */
export interface RuleOverride {
  patterns: string[];
  rules: Record<string, RuleSettings>;
}

/**
 * Complete (required) rule settings for one file.
 */
export interface ResolvedRuleSettings {
  enabled: boolean;
  severity: Severity;
}

/**
 * Check if a file matches any of the given glob patterns.
 */
export function matchesAnyGlob(filePath: string, patterns: readonly string[]): boolean {
  const normalizedPath = filePath.replace(/\\/g, "/");
  return patterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
}

/**
 * Get the effective settings of a rule for a file.
 * Overrides apply in order; later overrides take precedence.
 */
export function resolveRuleSettings(
  rule: CompiledRule,
  filePath: string,
  overrides: readonly RuleOverride[]
): ResolvedRuleSettings {
  let result: ResolvedRuleSettings = { enabled: true, severity: rule.severity };

  for (const override of overrides) {
    const settings = override.rules[rule.id];
    if (settings && matchesAnyGlob(filePath, override.patterns)) {
      result = {
        enabled: settings.enabled ?? result.enabled,
        severity: settings.severity ?? result.severity,
      };
    }
  }

  return result;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check if a string is a valid severity (case-insensitive).
 */
export function parseSeverity(value: unknown): Severity | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  return SEVERITIES.find((s) => s === normalized) ?? null;
}

function compileRulePattern(ruleId: string, what: string, definition: unknown): Matcher {
  try {
    return compilePattern(definition);
  } catch (err) {
    if (err instanceof PatternError) {
      throw new SetupError(`Rule "${ruleId}": ${what}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

function compileStringList(ruleId: string, field: string, value: unknown): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new SetupError(`Rule "${ruleId}": ${field} must be a list of strings`);
  }
  return value;
}

function compileExceptions(ruleId: string, value: unknown): CompiledException[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new SetupError(`Rule "${ruleId}": exceptions must be a list`);
  }

  return value.map((entry: unknown, i) => {
    if (!isRecord(entry) || entry.context === undefined) {
      throw new SetupError(`Rule "${ruleId}": exception #${i + 1} must have a context pattern`);
    }
    const context = compileRulePattern(ruleId, `exception #${i + 1} context`, entry.context);
    const description = entry.description;
    if (description !== undefined && typeof description !== "string") {
      throw new SetupError(`Rule "${ruleId}": exception #${i + 1} description must be a string`);
    }
    return { context, description: description ?? context.source };
  });
}

/**
 * Validate and compile a single rule definition.
 *
 * @param definition - Raw rule definition (from YAML or an API caller)
 * @param index - Position in the rule set, used in error messages
 */
export function compileRule(definition: unknown, index: number): CompiledRule {
  if (!isRecord(definition)) {
    throw new SetupError(`Rule #${index + 1} must be an object`);
  }

  const id = definition.id;
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new SetupError(`Rule #${index + 1} is missing an id`);
  }
  if (id === FILE_ACCESS_RULE_ID) {
    throw new SetupError(`Rule id "${FILE_ACCESS_RULE_ID}" is reserved`);
  }

  const severity = parseSeverity(definition.severity);
  if (!severity) {
    throw new SetupError(
      `Rule "${id}": severity must be one of ${SEVERITIES.join(", ")} (got ${JSON.stringify(definition.severity)})`
    );
  }

  if (definition.pattern === undefined) {
    throw new SetupError(`Rule "${id}" is missing a pattern`);
  }
  const matcher = compileRulePattern(id, "pattern", definition.pattern);

  const message = definition.message;
  if (message !== undefined && typeof message !== "string") {
    throw new SetupError(`Rule "${id}": message must be a string`);
  }

  return {
    id,
    matcher,
    severity,
    message: message ?? id,
    exceptions: compileExceptions(id, definition.exceptions),
    remediation: compileStringList(id, "remediation", definition.remediation),
  };
}

/**
 * Validate and compile a rule set. Order is preserved: it decides the
 * order of matches that share a file and line.
 *
 * @throws SetupError when the set is empty, an id repeats, or any rule is malformed
 */
export function compileRules(definitions: readonly unknown[]): CompiledRule[] {
  if (definitions.length === 0) {
    throw new SetupError("Rule set is empty; configure at least one rule");
  }

  const seen = new Set<string>();
  return definitions.map((definition, index) => {
    const rule = compileRule(definition, index);
    if (seen.has(rule.id)) {
      throw new SetupError(`Duplicate rule id "${rule.id}"`);
    }
    seen.add(rule.id);
    return rule;
  });
}
