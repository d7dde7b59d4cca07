/**
 * policy-scan: text-policy compliance checking for documentation trees.
 *
 * Public API. The CLI lives in ./cli and the CI entry point in ./action.
 */

export type {
  CompiledRule,
  Match,
  PatternDefinition,
  Report,
  RuleDefinition,
  RuleExceptionDefinition,
  ScanStats,
  Severity,
} from "./analysis/types";
export { FILE_ACCESS_RULE_ID } from "./analysis/types";

export { scan, scanText, isBinaryContent } from "./analysis/scanner";
export type { ScanOptions, TextScanOptions } from "./analysis/scanner";
export { compileRule, compileRules, resolveRuleSettings } from "./analysis/rules";
export type { RuleOverride, RuleSettings } from "./analysis/rules";
export { compilePattern, literalMatcher, regexMatcher, multilineMatcher } from "./analysis/matchers";
export type { Matcher, MatcherKind, TextMatch } from "./analysis/matchers";
export { DEFAULT_CONTEXT_WINDOW } from "./analysis/exceptions";
export { buildReport, exitCodeFor } from "./analysis/report";

export { loadConfig, loadConfigFromString, createDefaultConfig } from "./config/loader";
export type { LoadedConfig, ConfigLoadOptions } from "./config/loader";
export { listPresets, loadPreset } from "./config/presets";
export type { PolicyScanConfig } from "./config/schema";

export { SetupError, EXIT_CODES, isSetupError } from "./core/errors";
export type { ExitCode } from "./core/errors";
export { renderText, renderJson, formatMatch, formatSummary } from "./output/format";
