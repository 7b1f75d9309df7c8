/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Regex rewrite rules applied to archives after they are closed.
 */

/**
 * A single rewrite rule.
 */
export interface RegexRule {
  /** Pattern source (JavaScript syntax, multiline mode) */
  regex: string;
  /** Replacement, supporting `$1`, `$<name>`, `$&` and `$$` */
  replace: string;
  /** Maximum number of substitutions (0 = all) */
  matches: number;
}

/**
 * Apply a rule to text, replacing at most `rule.matches` occurrences.
 *
 * @throws {SyntaxError} If the pattern is not a valid regular expression
 */
export function applyRegexRule(text: string, rule: RegexRule): string {
  const pattern = new RegExp(rule.regex, 'gm');
  const limit = rule.matches > 0 ? rule.matches : Infinity;
  let count = 0;

  return text.replace(pattern, (...args: unknown[]) => {
    const match = String(args[0]);
    if (count >= limit) return match;
    count += 1;
    return expandReplacement(rule.replace, args);
  });
}

/**
 * Parse the `matches` attribute of a rule (empty means all).
 */
export function parseMatchCount(value: string): number {
  const text = value.trim();
  if (text === '') return 0;
  const count = Number(text);
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Invalid match count '${value}'`);
  }
  return count;
}

/**
 * Expand a replacement template for one match.
 *
 * `args` are the arguments `String.prototype.replace` passes to a replacer:
 * match, groups..., offset, input[, namedGroups].
 */
function expandReplacement(template: string, args: unknown[]): string {
  const last = args[args.length - 1];
  const hasNamed = typeof last === 'object' && last !== null;
  const named = new Map<string, string>();
  if (hasNamed) {
    for (const [key, value] of Object.entries(last)) {
      named.set(key, value === undefined ? '' : String(value));
    }
  }
  const groupCount = args.length - (hasNamed ? 4 : 3);
  const group = (index: number): string | undefined => {
    if (index < 1 || index > groupCount) return undefined;
    const value = args[index];
    return value === undefined ? '' : String(value);
  };

  return template.replace(/\$(\$|&|<([^>]*)>|(\d{1,2}))/g, (token, symbol: string, name: string | undefined, digits: string | undefined) => {
    if (symbol === '$') return '$';
    if (symbol === '&') return String(args[0]);
    if (name !== undefined) {
      return named.get(name) ?? token;
    }
    if (digits !== undefined) {
      // $12 falls back to $1 followed by "2" when there are fewer than 12 groups
      const two = group(Number(digits));
      if (two !== undefined) return two;
      const one = group(Number(digits[0]));
      if (digits.length === 2 && one !== undefined) return one + digits[1];
      return token;
    }
    return token;
  });
}
