import { ruleMatches, type RuleTable } from './rules.js';

/**
 * Skills mentioned in the title or description, in lexicon order.
 */
export function extractSkills(title: string, description: string | null | undefined, lexicon: RuleTable): string[] {
  const text = description ? `${title}\n${description}` : title;
  const skills: string[] = [];
  const seen = new Set<string>();

  for (const rule of lexicon) {
    if (seen.has(rule.label)) continue;
    if (ruleMatches(rule, text)) {
      seen.add(rule.label);
      skills.push(rule.label);
    }
  }

  return skills;
}
