/**
 * Deterministic file walk with directory exclusions.
 */

import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";

export interface WalkEntry {
  /** Root-relative path with `/` separators. */
  relPath: string;
  absPath: string;
}

export interface WalkFailure {
  relPath: string;
  reason: string;
}

export interface WalkResult {
  files: WalkEntry[];
  /** Directories that could not be listed. */
  failures: WalkFailure[];
}

const GLOB_CHARS = /[*?[\]{}!]/;

/**
 * Code-unit comparison; independent of locale so ordering is reproducible.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Normalize a path to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

/**
 * Check whether a directory is excluded.
 *
 * - Patterns containing `/` are root-relative path prefixes ("docs/archive").
 * - Patterns with glob characters are matched against the directory name ("*_evidence").
 * - Anything else must equal the directory name (".git").
 *
 * @param dirRelPath - Root-relative directory path
 * @param dirName - The directory's own name
 * @param exclusions - Exclusion patterns
 */
export function isExcludedDirectory(
  dirRelPath: string,
  dirName: string,
  exclusions: readonly string[]
): boolean {
  return exclusions.some((raw) => {
    const pattern = toPosixPath(raw).replace(/^\.\//, "").replace(/\/+$/, "");
    if (pattern.length === 0) {
      return false;
    }
    if (pattern.includes("/")) {
      return dirRelPath === pattern || dirRelPath.startsWith(`${pattern}/`);
    }
    if (GLOB_CHARS.test(pattern)) {
      return minimatch(dirName, pattern, { dot: true });
    }
    return dirName === pattern;
  });
}

/**
 * Check if a file matches any include glob. An empty list includes everything.
 */
export function isIncluded(relPath: string, include: readonly string[]): boolean {
  if (include.length === 0) {
    return true;
  }
  return include.some((pattern) => minimatch(relPath, pattern, { dot: true, matchBase: !pattern.includes("/") }));
}

/**
 * Walk regular files under root in stable path order.
 * Symbolic links are not followed; excluded directories are never opened.
 *
 * @param root - Absolute path to the root directory
 * @param exclusions - Directory exclusion patterns
 * @param include - Optional file globs; empty includes everything
 */
export function walkFiles(
  root: string,
  exclusions: readonly string[],
  include: readonly string[] = []
): WalkResult {
  const files: WalkEntry[] = [];
  const failures: WalkFailure[] = [];

  function visit(absDir: string, relDir: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(absDir, { withFileTypes: true });
    } catch (err) {
      failures.push({
        relPath: relDir,
        reason: err instanceof Error ? err.message : String(err),
      });
      return;
    }

    for (const entry of entries) {
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
      const absPath = path.join(absDir, entry.name);

      if (entry.isDirectory()) {
        if (!isExcludedDirectory(relPath, entry.name, exclusions)) {
          visit(absPath, relPath);
        }
      } else if (entry.isFile() && isIncluded(relPath, include)) {
        files.push({ relPath, absPath });
      }
    }
  }

  visit(root, "");

  files.sort((a, b) => comparePaths(a.relPath, b.relPath));
  failures.sort((a, b) => comparePaths(a.relPath, b.relPath));
  return { files, failures };
}
