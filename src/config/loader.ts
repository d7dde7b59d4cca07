/**
 * Configuration loader for policy-scan.
 *
 * Loads .policyscan.yml files, resolves presets, and validates every
 * field. A configuration that cannot be used is a SetupError: falling
 * back to defaults would let a broken rule set pass silently.
 */

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_CONTEXT_WINDOW } from "../analysis/exceptions";
import { isRecord, type RuleOverride } from "../analysis/rules";
import { SetupError, describeError } from "../core/errors";
import { parseConfigYaml } from "./parse";
import { loadPreset } from "./presets";
import {
  CONFIG_FILE_NAME,
  DEFAULT_EXCLUDE,
  SUPPORTED_CONFIG_VERSION,
  type PolicyScanConfig,
} from "./schema";

/**
 * The loaded and resolved configuration.
 */
export interface LoadedConfig {
  /**
   * The parsed configuration file (or defaults if no file was found).
   */
  raw: PolicyScanConfig;

  /**
   * Where the configuration came from: a file path, "<string>", or null for defaults.
   */
  source: string | null;

  /**
   * Preset rules followed by this configuration's own rules.
   */
  rules: unknown[];

  exclude: string[];

  include: string[];

  contextWindow: number;

  overrides: RuleOverride[];
}

export interface ConfigLoadOptions {
  /**
   * Explicit config file. Missing files are an error, unlike the default lookup.
   */
  configPath?: string;

  /**
   * Extra presets, loaded after the ones named under `extends`.
   */
  presets?: string[];
}

function ruleIdOf(rule: unknown): string | undefined {
  return isRecord(rule) && typeof rule.id === "string" ? rule.id : undefined;
}

/**
 * Append rules, letting a later rule replace an earlier one with the same id in place.
 */
function mergeRules(base: unknown[], additions: readonly unknown[]): unknown[] {
  const merged = [...base];
  for (const rule of additions) {
    const id = ruleIdOf(rule);
    const existing = id === undefined ? -1 : merged.findIndex((r) => ruleIdOf(r) === id);
    if (existing === -1) {
      merged.push(rule);
    } else {
      merged[existing] = rule;
    }
  }
  return merged;
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Build a LoadedConfig from a validated raw config, resolving presets.
 */
function buildLoadedConfig(
  rawConfig: PolicyScanConfig,
  source: string | null,
  extraPresets: readonly string[]
): LoadedConfig {
  const presetNames = unique([...(rawConfig.extends ?? []), ...extraPresets]);
  const presets = presetNames.map((name) => loadPreset(name));

  let rules: unknown[] = [];
  let exclude: string[] = [...DEFAULT_EXCLUDE];
  let include: string[] = [];
  let contextWindow = DEFAULT_CONTEXT_WINDOW;
  let overrides: RuleOverride[] = [];

  for (const layer of [...presets, rawConfig]) {
    rules = mergeRules(rules, layer.rules ?? []);
    exclude = unique([...exclude, ...(layer.exclude ?? [])]);
    include = unique([...include, ...(layer.include ?? [])]);
    contextWindow = layer.context_window ?? contextWindow;
    overrides = [...overrides, ...(layer.overrides ?? [])];
  }

  return { raw: rawConfig, source, rules, exclude, include, contextWindow, overrides };
}

/**
 * Load configuration for a scan root.
 *
 * Uses `options.configPath` when given, else `<root>/.policyscan.yml` when
 * present, else defaults (with no rules of their own).
 *
 * @param root - Path to the directory being scanned
 * @throws SetupError when the file is unreadable or invalid
 */
export function loadConfig(root: string, options: ConfigLoadOptions = {}): LoadedConfig {
  const presets = options.presets ?? [];
  const explicit = options.configPath !== undefined;
  const configPath =
    options.configPath !== undefined
      ? path.resolve(options.configPath)
      : path.join(path.resolve(root), CONFIG_FILE_NAME);

  if (!explicit && !fs.existsSync(configPath)) {
    return createDefaultConfig(presets);
  }

  let fileContents: string;
  try {
    fileContents = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new SetupError(`Cannot read config file ${configPath}: ${describeError(err)}`, { cause: err });
  }

  return buildLoadedConfig(parseConfigYaml(fileContents, configPath), configPath, presets);
}

/**
 * Load configuration from a YAML string (useful for testing or API usage).
 * This function does not touch the filesystem apart from bundled presets.
 */
export function loadConfigFromString(yamlContent: string, presets: string[] = []): LoadedConfig {
  return buildLoadedConfig(parseConfigYaml(yamlContent, "<string>"), "<string>", presets);
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(presets: string[] = []): LoadedConfig {
  return buildLoadedConfig({ version: SUPPORTED_CONFIG_VERSION }, null, presets);
}
