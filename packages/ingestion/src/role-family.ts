import { findFirstMatchingRule, type RuleTable } from './rules.js';

/**
 * Assign a role family from the taxonomy. A keyword in the title always beats
 * one that only appears in the description, so boilerplate such as "work with
 * our engineers" does not pull a recruiter into engineering.
 */
export function classifyRoleFamily(
  title: string,
  description: string | null | undefined,
  taxonomy: RuleTable,
): string | null {
  return findFirstMatchingRule(taxonomy, [title, description])?.label ?? null;
}
