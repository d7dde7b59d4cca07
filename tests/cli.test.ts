/**
 * Tests for the policy-scan command line.
 */

import * as path from "path";
import { parseCliArgs, runCli, type CliIO } from "../src/cli";
import { createTree, removeTree } from "./helpers/tree";

const CONFIG = `version: 1
include:
  - "**/*.md"
rules:
  - id: exit-code-99
    severity: fail
    message: Deprecated exit code
    pattern: exit code 99
    exceptions:
      - context: historical
        description: historical context
    remediation:
      - Document only the 0/1/2 exit code contract
`;

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

describe("parseCliArgs", () => {
  it("should use defaults with no arguments", () => {
    expect(parseCliArgs([])).toEqual({
      root: ".",
      presets: [],
      exclude: [],
      include: [],
      json: false,
      verbose: false,
      help: false,
      version: false,
    });
  });

  it("should parse flags in both spaced and inline forms", () => {
    const options = parseCliArgs([
      "docs",
      "--preset",
      "constitution",
      "--preset=extra",
      "--exclude",
      "archive",
      "--include=*.md",
      "--context-window",
      "0",
      "--config",
      "ci.yml",
      "--json",
    ]);

    expect(options.root).toBe("docs");
    expect(options.presets).toEqual(["constitution", "extra"]);
    expect(options.exclude).toEqual(["archive"]);
    expect(options.include).toEqual(["*.md"]);
    expect(options.contextWindow).toBe(0);
    expect(options.configPath).toBe("ci.yml");
    expect(options.json).toBe(true);
  });

  it("should reject bad arguments", () => {
    expect(() => parseCliArgs(["--frobnicate"])).toThrow("Unknown option --frobnicate");
    expect(() => parseCliArgs(["--config"])).toThrow("Option --config needs a value");
    expect(() => parseCliArgs(["a", "b"])).toThrow("Unexpected argument b; only one root directory can be scanned");
    expect(() => parseCliArgs(["--context-window=-1"])).toThrow(
      "--context-window must be a non-negative integer (got -1)"
    );
  });
});

describe("runCli", () => {
  let root: string | null = null;

  afterEach(() => {
    if (root) {
      removeTree(root);
      root = null;
    }
  });

  function createProject(): string {
    root = createTree({
      ".policyscan.yml": CONFIG,
      "docs/guide.md": "Scripts use exit code 99 on timeout.\n",
      "docs/history.md": "In historical releases exit code 99 meant timeout.\n",
      "notes.txt": "exit code 99\n",
    });
    return root;
  }

  it("should print a grouped text report and return 1 on violations", () => {
    const io = captureIO();

    const code = runCli([createProject()], io);

    expect(code).toBe(1);
    expect(io.err).toEqual([]);
    expect(io.out.join("")).toBe(
      [
        "policy-scan: FAIL - 1 error, 1 notice, 2 files scanned",
        "",
        "Errors:",
        '  docs/guide.md:1 [exit-code-99] Deprecated exit code: "exit code 99"',
        "",
        "Notices:",
        '  docs/history.md:1 [exit-code-99] Deprecated exit code: "exit code 99" (allowed: historical context)',
        "",
        "Suggested fixes:",
        "  exit-code-99:",
        "    - Document only the 0/1/2 exit code contract",
        "",
      ].join("\n")
    );
  });

  it("should print JSON when asked", () => {
    const io = captureIO();

    const code = runCli([createProject(), "--json"], io);
    const parsed: unknown = JSON.parse(io.out.join(""));

    expect(code).toBe(1);
    expect(parsed).toEqual({
      exitCode: 1,
      errors: [
        {
          file: "docs/guide.md",
          line: 1,
          matchedText: "exit code 99",
          ruleId: "exit-code-99",
          severity: "fail",
          message: "Deprecated exit code",
        },
      ],
      notices: [
        {
          file: "docs/history.md",
          line: 1,
          matchedText: "exit code 99",
          ruleId: "exit-code-99",
          severity: "notice",
          message: "Deprecated exit code",
          exception: "historical context",
        },
      ],
      stats: { filesScanned: 2, filesSkipped: 0 },
    });
  });

  it("should return 0 when exclusions remove every violation", () => {
    const io = captureIO();

    const code = runCli([createProject(), "--exclude", "docs"], io);

    expect(code).toBe(0);
    expect(io.out.join("")).toBe("policy-scan: PASS - 0 errors, 0 notices, 0 files scanned\n");
  });

  it("should let --include replace the configured globs", () => {
    const io = captureIO();

    const code = runCli([createProject(), "--include", "*.txt", "--json"], io);
    const parsed: unknown = JSON.parse(io.out.join(""));

    expect(code).toBe(1);
    expect(parsed).toMatchObject({ errors: [{ file: "notes.txt", line: 1 }], notices: [] });
  });

  it("should read an explicit config file", () => {
    const project = createProject();
    const io = captureIO();

    const code = runCli([path.join(project, "docs"), "--config", path.join(project, ".policyscan.yml")], io);

    expect(code).toBe(1);
    expect(io.out[0].startsWith("policy-scan: FAIL - 1 error, 1 notice, 2 files scanned\n")).toBe(true);
  });

  it("should return 2 for an empty rule set", () => {
    root = createTree({ "a.md": "text\n" });
    const io = captureIO();

    const code = runCli([root], io);

    expect(code).toBe(2);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual(["policy-scan: Rule set is empty; configure at least one rule\n"]);
  });

  it("should return 2 for an unknown option", () => {
    const io = captureIO();

    expect(runCli(["--frobnicate"], io)).toBe(2);
    expect(io.err).toEqual(["policy-scan: Unknown option --frobnicate\n"]);
  });

  it("should return 2 for a missing root", () => {
    const io = captureIO();

    const code = runCli(["/nonexistent/policy-scan-root", "--preset", "constitution"], io);

    expect(code).toBe(2);
    expect(io.err[0].startsWith("policy-scan: Cannot read root directory /nonexistent/policy-scan-root:")).toBe(true);
  });

  it("should print help", () => {
    const io = captureIO();

    expect(runCli(["--help"], io)).toBe(0);
    expect(io.out[0].startsWith("Usage: policy-scan [root] [options]\n")).toBe(true);
    expect(io.out[0]).toContain("available: constitution");
  });

  it("should print the package version", () => {
    const io = captureIO();

    expect(runCli(["--version"], io)).toBe(0);
    expect(io.out).toEqual(["0.1.0\n"]);
  });
});
