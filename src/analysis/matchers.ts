/**
 * Pattern matchers for policy rules.
 *
 * Literal, regex and multiline patterns share one interface so the scanner
 * never special-cases the kind of pattern it is evaluating:
 * - literal: substring search, optionally case-insensitive
 * - regex: evaluated line by line
 * - multiline: evaluated against the whole file text with the `m` flag
 */

import type { PatternDefinition } from "./types";

export type MatcherKind = "literal" | "regex" | "multiline";

export interface TextMatch {
  /** Offset of the match within the searched text. */
  index: number;
  text: string;
}

export interface Matcher {
  readonly kind: MatcherKind;
  readonly source: string;
  test(text: string): boolean;
  find(text: string): TextMatch | null;
  findAll(text: string): TextMatch[];
}

/**
 * Thrown by compilePattern; rule compilation wraps it with the rule id.
 */
export class PatternError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PatternError";
  }
}

/**
 * Escape a string for use inside a regular expression.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function createRegexMatcher(kind: MatcherKind, source: string, regex: RegExp): Matcher {
  const flags = regex.flags.includes("g") ? regex.flags : `${regex.flags}g`;

  function findAll(text: string): TextMatch[] {
    // Fresh regex per call to avoid lastIndex state leaking between lines
    const global = new RegExp(regex.source, flags);
    const results: TextMatch[] = [];
    let match: RegExpExecArray | null;
    while ((match = global.exec(text)) !== null) {
      results.push({ index: match.index, text: match[0] });
      if (match[0].length === 0) {
        global.lastIndex++;
      }
    }
    return results;
  }

  return {
    kind,
    source,
    test(text) {
      return regex.test(text);
    },
    find(text) {
      const match = regex.exec(text);
      return match ? { index: match.index, text: match[0] } : null;
    },
    findAll,
  };
}

/**
 * Create a substring matcher.
 */
export function literalMatcher(value: string, ignoreCase = false): Matcher {
  if (value.length === 0) {
    throw new PatternError("literal pattern must not be empty");
  }
  return createRegexMatcher("literal", value, new RegExp(escapeRegExp(value), ignoreCase ? "i" : ""));
}

function compileRegex(source: string, flags: string): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (err) {
    throw new PatternError(`invalid regular expression /${source}/: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (regex.test("")) {
    throw new PatternError(`pattern /${source}/ matches the empty string`);
  }
  return regex;
}

/**
 * Create a matcher evaluated one line at a time.
 */
export function regexMatcher(source: string, ignoreCase = false): Matcher {
  return createRegexMatcher("regex", source, compileRegex(source, ignoreCase ? "i" : ""));
}

/**
 * Create a matcher evaluated against the whole file text.
 * `^` and `$` match at line boundaries.
 */
export function multilineMatcher(source: string, ignoreCase = false): Matcher {
  return createRegexMatcher("multiline", source, compileRegex(source, ignoreCase ? "im" : "m"));
}

/**
 * Compile a pattern definition into a matcher.
 * Throws PatternError when the definition is malformed.
 */
export function compilePattern(definition: unknown): Matcher {
  if (typeof definition === "string") {
    return literalMatcher(definition);
  }
  if (!definition || typeof definition !== "object" || Array.isArray(definition)) {
    throw new PatternError("pattern must be a string or an object with literal, regex or multiline");
  }

  const entries = Object.entries(definition);
  let ignoreCase = false;
  const ignoreCaseEntry = entries.find(([key]) => key === "ignore_case");
  if (ignoreCaseEntry) {
    const value = ignoreCaseEntry[1];
    if (typeof value !== "boolean") {
      throw new PatternError("ignore_case must be a boolean");
    }
    ignoreCase = value;
  }

  const kinds = entries.filter(([key]) => key !== "ignore_case");
  if (kinds.length !== 1) {
    throw new PatternError("pattern must set exactly one of literal, regex or multiline");
  }

  const [kind, value] = kinds[0];
  if (typeof value !== "string") {
    throw new PatternError(`${kind} pattern must be a string`);
  }

  switch (kind) {
    case "literal":
      return literalMatcher(value, ignoreCase);
    case "regex":
      return regexMatcher(value, ignoreCase);
    case "multiline":
      return multilineMatcher(value, ignoreCase);
    default:
      throw new PatternError(`unknown pattern kind "${kind}"`);
  }
}
