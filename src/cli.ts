#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { compileRules, isRecord } from "./analysis/rules";
import { scan } from "./analysis/scanner";
import { loadConfig } from "./config/loader";
import { listPresets } from "./config/presets";
import { EXIT_CODES, SetupError, describeError, isSetupError } from "./core/errors";
import { config } from "./env";
import { logger } from "./logger";
import { renderJson, renderText } from "./output/format";

export interface CliOptions {
  root: string;
  configPath?: string;
  presets: string[];
  exclude: string[];
  include: string[];
  contextWindow?: number;
  json: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const VALUE_FLAGS = new Set(["--config", "--preset", "--exclude", "--include", "--context-window"]);

function readVersion(): string {
  const pkgPath = path.join(__dirname, "..", "package.json");
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
    return isRecord(pkg) && typeof pkg.version === "string" ? pkg.version : "unknown";
  } catch (err) {
    logger.debug("Could not read package version", { path: pkgPath, reason: describeError(err) });
    return "unknown";
  }
}

function helpText(): string {
  const presets = listPresets();
  return `Usage: policy-scan [root] [options]

Scan a documentation tree for prohibited text patterns.

Options:
  --config <file>         Config file (default: $POLICYSCAN_CONFIG or <root>/.policyscan.yml)
  --preset <name>         Add a bundled rule set (repeatable)${presets.length > 0 ? `; available: ${presets.join(", ")}` : ""}
  --exclude <pattern>     Skip directories by name, glob, or root-relative prefix (repeatable)
  --include <glob>        Only scan matching files (repeatable)
  --context-window <n>    Lines around a match checked for exceptions (default: 3)
  --json                  Print the report as JSON
  --verbose               Debug logging on stderr
  --version               Print version
  -h, --help              Show this help

Exit codes:
  0  no policy violations
  1  one or more violations
  2  setup or configuration error
`;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.length === 0) {
    throw new SetupError(`Option ${flag} needs a value`);
  }
  return value;
}

/**
 * Parse command-line arguments.
 *
 * @throws SetupError on unknown options or missing values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    root: ".",
    presets: [],
    exclude: [],
    include: [],
    json: false,
    verbose: false,
    help: false,
    version: false,
  };
  let rootSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let flag = arg;
    let value: string | undefined;

    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq !== -1) {
      flag = arg.slice(0, eq);
      value = arg.slice(eq + 1);
    }

    if (VALUE_FLAGS.has(flag) && value === undefined) {
      value = argv[i + 1];
      i++;
    }

    switch (flag) {
      case "--config":
        options.configPath = requireValue(flag, value);
        break;
      case "--preset":
        options.presets.push(requireValue(flag, value));
        break;
      case "--exclude":
        options.exclude.push(requireValue(flag, value));
        break;
      case "--include":
        options.include.push(requireValue(flag, value));
        break;
      case "--context-window": {
        const n = Number(requireValue(flag, value));
        if (!Number.isInteger(n) || n < 0) {
          throw new SetupError(`--context-window must be a non-negative integer (got ${value})`);
        }
        options.contextWindow = n;
        break;
      }
      case "--json":
        options.json = true;
        break;
      case "--verbose":
        options.verbose = true;
        break;
      case "--version":
        options.version = true;
        break;
      case "-h":
      case "--help":
        options.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new SetupError(`Unknown option ${arg}`);
        }
        if (rootSeen) {
          throw new SetupError(`Unexpected argument ${arg}; only one root directory can be scanned`);
        }
        options.root = arg;
        rootSeen = true;
    }
  }

  return options;
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(argv: readonly string[], io: CliIO = defaultIO): number {
  try {
    const options = parseCliArgs(argv);

    if (options.help) {
      io.stdout(helpText());
      return EXIT_CODES.PASS;
    }
    if (options.version) {
      io.stdout(`${readVersion()}\n`);
      return EXIT_CODES.PASS;
    }
    if (options.verbose) {
      logger.setLevel("debug");
    }

    const loaded = loadConfig(options.root, {
      configPath: options.configPath ?? config.POLICYSCAN_CONFIG,
      presets: options.presets,
    });
    logger.debug("Loaded configuration", {
      source: loaded.source,
      rules: loaded.rules.length,
      presets: options.presets,
    });

    const rules = compileRules(loaded.rules);
    const report = scan(options.root, loaded.rules, [...loaded.exclude, ...options.exclude], {
      contextWindow: options.contextWindow ?? loaded.contextWindow,
      include: options.include.length > 0 ? options.include : loaded.include,
      overrides: loaded.overrides,
    });

    io.stdout(options.json ? renderJson(report) : renderText(report, { rules }));
    return report.exitCode;
  } catch (err) {
    if (isSetupError(err)) {
      io.stderr(`policy-scan: ${err.message}\n`);
      return err.exitCode;
    }
    logger.error("Unexpected failure", { error: describeError(err) });
    return EXIT_CODES.SETUP_ERROR;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
