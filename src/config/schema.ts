/**
 * Configuration schema types for .policyscan.yml files.
 *
 * The same shape is used by bundled presets under `rulesets/`, except that
 * presets cannot extend other presets.
 */

import type { RuleOverride } from "../analysis/rules";

/**
 * Complete .policyscan.yml configuration schema.
 */
export interface PolicyScanConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  /**
   * Bundled presets whose rules are loaded before this file's rules.
   * Example: ["constitution"]
   */
  extends?: string[];

  /**
   * Lines on each side of a match searched for exception context.
   * Default: 3
   */
  context_window?: number;

  /**
   * Directory names, globs, or root-relative prefixes skipped entirely.
   * Added to DEFAULT_EXCLUDE.
   */
  exclude?: string[];

  /**
   * File globs to scan. Empty scans every regular file.
   * Example: ["**\/*.md", "**\/*.yml"]
   */
  include?: string[];

  /**
   * Rule definitions, validated when the scan starts.
   * A rule whose id matches a preset rule replaces it in place.
   */
  rules?: unknown[];

  /**
   * Path-specific rule settings.
   * Applied in order; later overrides take precedence.
   */
  overrides?: RuleOverride[];
}

export const CONFIG_FILE_NAME = ".policyscan.yml";

export const SUPPORTED_CONFIG_VERSION = 1;

/**
 * Directories never worth scanning.
 */
export const DEFAULT_EXCLUDE: readonly string[] = [".git", "node_modules", ".venv", "venv"];
