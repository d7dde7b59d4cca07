/**
 * Bundled rule set presets, stored as YAML under `rulesets/`.
 */

import * as fs from "fs";
import * as path from "path";
import { SetupError, describeError } from "../core/errors";
import { parseConfigYaml } from "./parse";
import type { PolicyScanConfig } from "./schema";

/**
 * Resolves to <package>/rulesets from both src/config and dist/config.
 */
export const PRESETS_DIR = path.resolve(__dirname, "..", "..", "rulesets");

const PRESET_NAME = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Names of the bundled presets, sorted.
 */
export function listPresets(): string[] {
  if (!fs.existsSync(PRESETS_DIR)) {
    return [];
  }
  return fs
    .readdirSync(PRESETS_DIR)
    .filter((file) => file.endsWith(".yml"))
    .map((file) => file.slice(0, -".yml".length))
    .sort();
}

/**
 * Load and validate a bundled preset by name.
 *
 * @throws SetupError for unknown or invalid presets
 */
export function loadPreset(name: string): PolicyScanConfig {
  if (!PRESET_NAME.test(name)) {
    throw new SetupError(`Invalid preset name "${name}"`);
  }

  const presetPath = path.join(PRESETS_DIR, `${name}.yml`);
  if (!fs.existsSync(presetPath)) {
    const available = listPresets();
    throw new SetupError(
      `Unknown preset "${name}"${available.length > 0 ? ` (available: ${available.join(", ")})` : ""}`
    );
  }

  let contents: string;
  try {
    contents = fs.readFileSync(presetPath, "utf-8");
  } catch (err) {
    throw new SetupError(`Cannot read preset ${presetPath}: ${describeError(err)}`, { cause: err });
  }
  return parseConfigYaml(contents, `preset ${name}`, false);
}
