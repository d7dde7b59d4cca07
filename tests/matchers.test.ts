/**
 * Tests for pattern compilation and matching.
 */

import {
  PatternError,
  compilePattern,
  escapeRegExp,
  literalMatcher,
  multilineMatcher,
  regexMatcher,
} from "../src/analysis/matchers";

describe("escapeRegExp", () => {
  it("should escape regex metacharacters", () => {
    expect(escapeRegExp("a.b*(c)")).toBe("a\\.b\\*\\(c\\)");
  });
});

describe("literalMatcher", () => {
  it("should match substrings verbatim", () => {
    const matcher = literalMatcher("exit(99)");

    expect(matcher.kind).toBe("literal");
    expect(matcher.find("call exit(99) now")).toEqual({ index: 5, text: "exit(99)" });
    expect(matcher.test("exit 99")).toBe(false);
  });

  it("should be case-sensitive unless asked otherwise", () => {
    expect(literalMatcher("Legacy").test("legacy tool")).toBe(false);
    expect(literalMatcher("Legacy", true).find("legacy tool")).toEqual({ index: 0, text: "legacy" });
  });

  it("should reject an empty literal", () => {
    expect(() => literalMatcher("")).toThrow(PatternError);
  });
});

describe("regexMatcher", () => {
  it("should return the first match on a line", () => {
    const matcher = regexMatcher("v\\d+");

    expect(matcher.find("from v1 to v2")).toEqual({ index: 5, text: "v1" });
  });

  it("should return every match from findAll", () => {
    const matcher = regexMatcher("v\\d+");

    expect(matcher.findAll("from v1 to v2")).toEqual([
      { index: 5, text: "v1" },
      { index: 11, text: "v2" },
    ]);
  });

  it("should give the same result when called repeatedly", () => {
    const matcher = regexMatcher("v\\d+");

    expect(matcher.findAll("v1 v2")).toHaveLength(2);
    expect(matcher.findAll("v1 v2")).toHaveLength(2);
  });

  it("should reject an invalid regular expression", () => {
    expect(() => regexMatcher("(unclosed")).toThrow("invalid regular expression /(unclosed/");
  });

  it("should reject a pattern that matches the empty string", () => {
    expect(() => regexMatcher("a*")).toThrow("pattern /a*/ matches the empty string");
  });
});

describe("multilineMatcher", () => {
  it("should anchor ^ and $ at line boundaries", () => {
    const matcher = multilineMatcher("^cd validators$");

    expect(matcher.kind).toBe("multiline");
    expect(matcher.find("intro\ncd validators\nmore")).toEqual({ index: 6, text: "cd validators" });
  });

  it("should match across line breaks", () => {
    const matcher = multilineMatcher("cd validators\\n\\s*python");

    expect(matcher.findAll("cd validators\n  python check.py")).toEqual([
      { index: 0, text: "cd validators\n  python" },
    ]);
  });
});

describe("compilePattern", () => {
  it("should treat a bare string as a literal", () => {
    const matcher = compilePattern("a.b");

    expect(matcher.kind).toBe("literal");
    expect(matcher.test("aXb")).toBe(false);
    expect(matcher.test("a.b")).toBe(true);
  });

  it("should build each pattern kind from an object", () => {
    expect(compilePattern({ literal: "x" }).kind).toBe("literal");
    expect(compilePattern({ regex: "x+" }).kind).toBe("regex");
    expect(compilePattern({ multiline: "^x$" }).kind).toBe("multiline");
  });

  it("should honor ignore_case", () => {
    expect(compilePattern({ regex: "todo", ignore_case: true }).test("TODO: fix")).toBe(true);
    expect(compilePattern({ regex: "todo", ignore_case: false }).test("TODO: fix")).toBe(false);
  });

  it("should reject malformed definitions", () => {
    expect(() => compilePattern(42)).toThrow(
      "pattern must be a string or an object with literal, regex or multiline"
    );
    expect(() => compilePattern(["x"])).toThrow(PatternError);
    expect(() => compilePattern({})).toThrow("pattern must set exactly one of literal, regex or multiline");
    expect(() => compilePattern({ literal: "x", regex: "y" })).toThrow(
      "pattern must set exactly one of literal, regex or multiline"
    );
    expect(() => compilePattern({ regex: 5 })).toThrow("regex pattern must be a string");
    expect(() => compilePattern({ glob: "*.md" })).toThrow('unknown pattern kind "glob"');
    expect(() => compilePattern({ literal: "x", ignore_case: "yes" })).toThrow("ignore_case must be a boolean");
  });
});
