import { findFirstMatchingRule, type RuleTable } from './rules.js';

const DESCRIPTION_WINDOW = 1000;

export interface IndustrySignals {
  companyName?: string | null;
  companyDomain?: string | null;
  description?: string | null;
}

/**
 * Industry tag from company identity first, then the head of the description.
 */
export function tagIndustry(signals: IndustrySignals, rules: RuleTable): string | null {
  const description = signals.description ? signals.description.slice(0, DESCRIPTION_WINDOW) : null;
  return findFirstMatchingRule(rules, [signals.companyName, signals.companyDomain, description])?.label ?? null;
}
