/**
 * Validation of parsed configuration documents.
 */

import * as yaml from "js-yaml";
import { isRecord, parseSeverity, type RuleOverride, type RuleSettings } from "../analysis/rules";
import { SetupError, describeError } from "../core/errors";
import { SUPPORTED_CONFIG_VERSION, type PolicyScanConfig } from "./schema";

function expectStringList(value: unknown, field: string, source: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new SetupError(`${source}: ${field} must be a list of strings`);
  }
  return value;
}

function parseOverrides(value: unknown, source: string): RuleOverride[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new SetupError(`${source}: overrides must be a list`);
  }

  return value.map((entry: unknown, i): RuleOverride => {
    const where = `${source}: overrides[${i}]`;
    if (!isRecord(entry)) {
      throw new SetupError(`${where} must be an object`);
    }
    const patterns = expectStringList(entry.patterns, `overrides[${i}].patterns`, source);
    if (!patterns || patterns.length === 0) {
      throw new SetupError(`${where} needs at least one path pattern`);
    }
    if (!isRecord(entry.rules)) {
      throw new SetupError(`${where}.rules must map rule ids to settings`);
    }

    const rules: Record<string, RuleSettings> = {};
    for (const [ruleId, raw] of Object.entries(entry.rules)) {
      if (!isRecord(raw)) {
        throw new SetupError(`${where}.rules.${ruleId} must be an object`);
      }
      const settings: RuleSettings = {};
      if (raw.enabled !== undefined) {
        if (typeof raw.enabled !== "boolean") {
          throw new SetupError(`${where}.rules.${ruleId}.enabled must be a boolean`);
        }
        settings.enabled = raw.enabled;
      }
      if (raw.severity !== undefined) {
        const severity = parseSeverity(raw.severity);
        if (!severity) {
          throw new SetupError(`${where}.rules.${ruleId}.severity must be fail or notice`);
        }
        settings.severity = severity;
      }
      rules[ruleId] = settings;
    }

    return { patterns, rules };
  });
}

/**
 * Validate a parsed YAML document against the config schema.
 *
 * @param parsed - Result of yaml.load
 * @param source - Name used in error messages
 * @param allowExtends - Presets themselves cannot extend other presets
 */
export function parseConfigObject(parsed: unknown, source: string, allowExtends = true): PolicyScanConfig {
  if (parsed === undefined || parsed === null) {
    return { version: SUPPORTED_CONFIG_VERSION };
  }
  if (!isRecord(parsed)) {
    throw new SetupError(`${source}: configuration must be a mapping`);
  }

  const version = parsed.version ?? SUPPORTED_CONFIG_VERSION;
  if (version !== SUPPORTED_CONFIG_VERSION) {
    throw new SetupError(`${source}: unsupported config version ${JSON.stringify(version)}`);
  }

  const extendsList = expectStringList(parsed.extends, "extends", source);
  if (extendsList && !allowExtends) {
    throw new SetupError(`${source}: presets cannot extend other presets`);
  }

  let contextWindow: number | undefined;
  if (parsed.context_window !== undefined && parsed.context_window !== null) {
    const value = parsed.context_window;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new SetupError(`${source}: context_window must be a non-negative integer`);
    }
    contextWindow = value;
  }

  const rules = parsed.rules;
  if (rules !== undefined && rules !== null && !Array.isArray(rules)) {
    throw new SetupError(`${source}: rules must be a list`);
  }

  return {
    version: SUPPORTED_CONFIG_VERSION,
    extends: extendsList,
    context_window: contextWindow,
    exclude: expectStringList(parsed.exclude, "exclude", source),
    include: expectStringList(parsed.include, "include", source),
    rules: Array.isArray(rules) ? rules : undefined,
    overrides: parseOverrides(parsed.overrides, source),
  };
}

/**
 * Parse YAML text into a validated config object.
 */
export function parseConfigYaml(yamlContent: string, source: string, allowExtends = true): PolicyScanConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    throw new SetupError(`${source}: invalid YAML: ${describeError(err)}`, { cause: err });
  }
  return parseConfigObject(parsed, source, allowExtends);
}
