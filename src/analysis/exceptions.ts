/**
 * Contextual exception evaluation.
 */

import type { CompiledException, CompiledRule } from "./types";

export const DEFAULT_CONTEXT_WINDOW = 3;

/**
 * Text surrounding a match: `window` lines before the first matched line
 * through `window` lines after the last one, joined by newlines.
 *
 * @param lines - All lines of the file
 * @param firstIndex - 0-based index of the first matched line
 * @param lastIndex - 0-based index of the last matched line
 * @param window - Number of lines to include on each side
 */
export function getContextText(
  lines: readonly string[],
  firstIndex: number,
  lastIndex: number,
  window: number
): string {
  const start = Math.max(0, firstIndex - window);
  const end = Math.min(lines.length, lastIndex + window + 1);
  return lines.slice(start, end).join("\n");
}

/**
 * Return the first exception, in declaration order, whose context pattern
 * matches the surrounding text.
 */
export function findApplicableException(
  rule: CompiledRule,
  contextText: string
): CompiledException | undefined {
  for (const exception of rule.exceptions) {
    if (exception.context.test(contextText)) {
      return exception;
    }
  }
  return undefined;
}
