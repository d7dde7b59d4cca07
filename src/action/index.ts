/**
 * GitHub Action entry point for policy-scan.
 *
 * Scans the checked-out workspace, annotates each match on its file and
 * line, and fails the step when policy violations are found.
 */

import * as core from "@actions/core";
import { scan } from "../analysis/scanner";
import type { Match } from "../analysis/types";
import { loadConfig } from "../config/loader";
import { EXIT_CODES, describeError, isSetupError } from "../core/errors";
import { formatSummary } from "../output/format";

function annotationFor(match: Match): core.AnnotationProperties {
  return {
    title: match.ruleId,
    file: match.file || undefined,
    startLine: match.line > 0 ? match.line : undefined,
  };
}

function annotationMessage(match: Match): string {
  const text = match.matchedText ? `${match.message}: "${match.matchedText}"` : match.message;
  return match.exception ? `${text} (allowed: ${match.exception})` : text;
}

/**
 * Run the action. Resolves with the scan's exit code.
 */
export async function run(): Promise<number> {
  try {
    const root = core.getInput("root") || ".";
    const configPath = core.getInput("config") || undefined;
    const presets = core
      .getInput("preset")
      .split(/[\s,]+/)
      .filter((name) => name.length > 0);

    core.info(`Scanning ${root} for policy violations...`);

    const loaded = loadConfig(root, { configPath, presets });
    const report = scan(root, loaded.rules, loaded.exclude, {
      contextWindow: loaded.contextWindow,
      include: loaded.include,
      overrides: loaded.overrides,
    });

    for (const match of report.errors) {
      core.error(annotationMessage(match), annotationFor(match));
    }
    for (const match of report.notices) {
      core.notice(annotationMessage(match), annotationFor(match));
    }

    core.setOutput("errors-count", report.errors.length);
    core.setOutput("notices-count", report.notices.length);
    core.setOutput("exit-code", report.exitCode);
    core.info(formatSummary(report));

    if (report.exitCode !== EXIT_CODES.PASS) {
      core.setFailed(`Found ${report.errors.length} policy violation(s)`);
    }
    return report.exitCode;
  } catch (error) {
    core.setOutput("exit-code", EXIT_CODES.SETUP_ERROR);
    core.setFailed(isSetupError(error) ? `Setup error: ${error.message}` : describeError(error));
    return EXIT_CODES.SETUP_ERROR;
  }
}

if (require.main === module) {
  run().catch((error: unknown) => core.setFailed(describeError(error)));
}
