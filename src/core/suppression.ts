/**
 * Inline allow directive parsing.
 *
 * Documentation authors can acknowledge a finding in place. An allowed
 * match is downgraded to a notice, never dropped:
 * - policyscan-allow-file ALL|RULE_ID[,RULE_ID...]
 * - policyscan-allow ALL|RULE_ID[,RULE_ID...]            (same line)
 * - policyscan-allow-next-line ALL|RULE_ID[,RULE_ID...]
 */

/**
 * The scope of an allow directive.
 */
export type AllowScope = "file" | "line" | "next-line";

export const INLINE_ALLOW_DESCRIPTION = "inline allow directive";

/**
 * A parsed allow directive.
 */
export interface AllowDirective {
  scope: AllowScope;

  /**
   * If true, all rules are allowed for this scope.
   */
  allRules: boolean;

  /**
   * Specific rule IDs to allow (empty if allRules is true).
   */
  rules: string[];

  /**
   * The 1-based line number where this directive appears.
   */
  line: number;
}

/**
 * Parse all allow directives from file text.
 *
 * @param lines - The file's lines
 * @param knownRuleIds - Rule ids of the active rule set; unknown ids are ignored
 */
export function parseAllowDirectives(
  lines: readonly string[],
  knownRuleIds: ReadonlySet<string>
): AllowDirective[] {
  const directives: AllowDirective[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    // Create fresh regex per line to avoid global state issues
    const directiveRegex = /policyscan-allow(-file|-next-line)?\s+([A-Za-z0-9_.-]+(?:\s*,\s*[A-Za-z0-9_.-]+)*)/g;

    let match: RegExpExecArray | null;
    while ((match = directiveRegex.exec(line)) !== null) {
      const suffix = match[1];
      const scope: AllowScope =
        suffix === "-file" ? "file" : suffix === "-next-line" ? "next-line" : "line";
      const rulesStr = match[2].trim();

      if (rulesStr === "ALL") {
        directives.push({ scope, allRules: true, rules: [], line: i + 1 });
        continue;
      }

      const rules = rulesStr
        .split(",")
        .map((s) => s.trim())
        .filter((s) => knownRuleIds.has(s));

      if (rules.length > 0) {
        directives.push({ scope, allRules: false, rules, line: i + 1 });
      }
    }
  }

  return directives;
}

/**
 * Check if a rule is allowed at a given line.
 *
 * @param ruleId - The rule ID to check
 * @param line - The 1-based line number of the match
 * @param directives - The parsed directives for the file
 */
export function isAllowed(
  ruleId: string,
  line: number,
  directives: readonly AllowDirective[]
): boolean {
  for (const directive of directives) {
    const matchesRule = directive.allRules || directive.rules.includes(ruleId);
    if (!matchesRule) {
      continue;
    }

    switch (directive.scope) {
      case "file":
        return true;

      case "line":
        if (directive.line === line) {
          return true;
        }
        break;

      case "next-line":
        if (directive.line + 1 === line) {
          return true;
        }
        break;
    }
  }

  return false;
}
