/**
 * Ordered keyword rules shared by the role, skill and industry classifiers.
 *
 * A rule table is an ordered list of `{ label, patterns }`. Order is part of
 * the contract: classifiers scan it front to back and stop at the first match,
 * so more specific rules must be declared before generic ones.
 */

export interface RuleDefinition {
  label: string;
  patterns: string[];
}

/** Anything with a `test` method; a RegExp satisfies it. */
export interface PatternMatcher {
  test(text: string): boolean;
}

export interface CompiledRule {
  readonly label: string;
  readonly patterns: readonly string[];
  readonly matchers: readonly PatternMatcher[];
}

export type RuleTable = readonly CompiledRule[];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive match bounded by non-alphanumerics on both sides, so
 * "Go" never matches inside "Google" while "C++" and ".NET" still match.
 * Inner whitespace matches any run of whitespace.
 */
export function compilePattern(pattern: string): RegExp {
  const body = pattern
    .trim()
    .split(/\s+/)
    .map((part) => escapeRegExp(part))
    .join('\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'i');
}

export function compileRule(definition: RuleDefinition): CompiledRule {
  const patterns = definition.patterns.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
  return Object.freeze({
    label: definition.label.trim(),
    patterns: Object.freeze(patterns),
    matchers: Object.freeze(patterns.map(compilePattern)),
  });
}

export function compileRuleTable(definitions: readonly RuleDefinition[]): RuleTable {
  return Object.freeze(definitions.map(compileRule));
}

export function ruleMatches(rule: CompiledRule, text: string): boolean {
  return rule.matchers.some((matcher) => matcher.test(text));
}

/**
 * First-match scan with field precedence: every rule is tried against the
 * first field before any rule is tried against the second. Empty fields are
 * skipped.
 */
export function findFirstMatchingRule(
  table: RuleTable,
  fields: ReadonlyArray<string | null | undefined>,
): CompiledRule | null {
  for (const field of fields) {
    if (!field) continue;

    for (const rule of table) {
      if (ruleMatches(rule, field)) {
        return rule;
      }
    }
  }

  return null;
}
