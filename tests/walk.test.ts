/**
 * Tests for the file walk and report assembly.
 */

import { buildReport } from "../src/analysis/report";
import type { Match } from "../src/analysis/types";
import { comparePaths, isExcludedDirectory, isIncluded, walkFiles } from "../src/analysis/walk";
import { createTree, removeTree } from "./helpers/tree";

describe("isExcludedDirectory", () => {
  it("should match plain names exactly", () => {
    expect(isExcludedDirectory("a/.git", ".git", [".git"])).toBe(true);
    expect(isExcludedDirectory("gitdocs", "gitdocs", [".git"])).toBe(false);
  });

  it("should treat patterns with a slash as root-relative prefixes", () => {
    expect(isExcludedDirectory("docs/archive", "archive", ["docs/archive"])).toBe(true);
    expect(isExcludedDirectory("docs/archive/2020", "2020", ["docs/archive"])).toBe(true);
    expect(isExcludedDirectory("other/archive", "archive", ["docs/archive"])).toBe(false);
    expect(isExcludedDirectory("docs/archive-new", "archive-new", ["docs/archive/"])).toBe(false);
    expect(isExcludedDirectory("docs/archive", "archive", ["./docs/archive/"])).toBe(true);
  });

  it("should match glob patterns against the directory name", () => {
    expect(isExcludedDirectory("x/70_evidence", "70_evidence", ["*_evidence"])).toBe(true);
    expect(isExcludedDirectory("x/evidence", "evidence", ["*_evidence"])).toBe(false);
  });

  it("should ignore empty patterns", () => {
    expect(isExcludedDirectory("docs", "docs", ["", "/"])).toBe(false);
  });
});

describe("isIncluded", () => {
  it("should include everything without globs", () => {
    expect(isIncluded("any/file.bin", [])).toBe(true);
  });

  it("should match slash-free globs against the base name", () => {
    expect(isIncluded("deep/dir/readme.md", ["*.md"])).toBe(true);
    expect(isIncluded("deep/dir/readme.txt", ["*.md"])).toBe(false);
  });

  it("should match globs with a slash against the whole path", () => {
    expect(isIncluded("docs/a.md", ["docs/*.md"])).toBe(true);
    expect(isIncluded("guide/docs/a.md", ["docs/*.md"])).toBe(false);
  });
});

describe("comparePaths", () => {
  it("should order by code unit", () => {
    expect(["b", "B", "a/b", "a"].sort(comparePaths)).toEqual(["B", "a", "a/b", "b"]);
  });
});

describe("walkFiles", () => {
  let root: string | null = null;

  afterEach(() => {
    if (root) {
      removeTree(root);
      root = null;
    }
  });

  it("should list files in sorted root-relative order", () => {
    root = createTree({
      "b.md": "",
      "a/z.md": "",
      "a/c.md": "",
      ".hidden/x.md": "",
    });

    const result = walkFiles(root, []);

    expect(result.files.map((f) => f.relPath)).toEqual([".hidden/x.md", "a/c.md", "a/z.md", "b.md"]);
    expect(result.failures).toEqual([]);
  });

  it("should skip excluded directories and filter by include globs", () => {
    root = createTree({
      "keep.md": "",
      "keep.txt": "",
      "skip/me.md": "",
    });

    const result = walkFiles(root, ["skip"], ["*.md"]);

    expect(result.files.map((f) => f.relPath)).toEqual(["keep.md"]);
  });
});

describe("buildReport", () => {
  function match(file: string, line: number, ruleId: string, severity: "fail" | "notice"): Match {
    return { file, line, matchedText: "x", ruleId, severity, message: ruleId };
  }

  it("should sort by file and line, keeping discovery order for ties", () => {
    const report = buildReport(
      [match("b.md", 1, "r1", "fail"), match("a.md", 5, "r2", "fail"), match("a.md", 5, "r1", "notice"), match("a.md", 2, "r3", "fail")],
      { filesScanned: 2, filesSkipped: 0 }
    );

    expect(report.errors.map((m) => `${m.file}:${m.line}:${m.ruleId}`)).toEqual(["a.md:2:r3", "a.md:5:r2", "b.md:1:r1"]);
    expect(report.notices.map((m) => `${m.file}:${m.line}:${m.ruleId}`)).toEqual(["a.md:5:r1"]);
    expect(report.exitCode).toBe(1);
  });

  it("should pass when only notices exist", () => {
    expect(buildReport([match("a.md", 1, "r1", "notice")], { filesScanned: 1, filesSkipped: 0 }).exitCode).toBe(0);
  });
});
