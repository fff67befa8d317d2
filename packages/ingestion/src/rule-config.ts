import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { z } from 'zod';
import { readConfigFile } from './config-files.js';
import { RuleConfigError } from './errors.js';
import { LocationClassifier } from './location.js';
import { DEFAULT_DATA_DIR, loadLocationData, type LocationData } from './location-data.js';
import { compileRuleTable, type RuleDefinition, type RuleTable } from './rules.js';

export const DEFAULT_RULES_DIR = fileURLToPath(new URL('../rules/', import.meta.url));

export const ROLE_TAXONOMY_FILE = 'role-taxonomy.json';
export const SKILL_LEXICON_FILE = 'skills.json';
export const INDUSTRY_RULES_FILE = 'industry-rules.json';

const ruleDefinitionSchema = z.object({
  // Role family and industry labels land in varchar(100) columns.
  label: z.string().trim().min(1, 'label must not be empty').max(100, 'label must be at most 100 characters'),
  patterns: z
    .array(z.string())
    .refine((patterns) => patterns.some((pattern) => pattern.trim().length > 0), {
      message: 'rule needs at least one non-blank pattern',
    }),
});

export const ruleTableSchema = z.array(ruleDefinitionSchema).superRefine((rules, ctx) => {
  const seen = new Set<string>();
  rules.forEach((rule, index) => {
    if (seen.has(rule.label)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'label'],
        message: `duplicate label "${rule.label}"`,
      });
    }
    seen.add(rule.label);
  });
});

/**
 * Everything classification reads during a run. Built once, frozen, and
 * shared by every build call.
 */
export interface RuleConfig {
  readonly roleTaxonomy: RuleTable;
  readonly skillLexicon: RuleTable;
  readonly industryRules: RuleTable;
  readonly location: LocationClassifier;
}

export interface RuleTables {
  roleTaxonomy: RuleDefinition[];
  skillLexicon: RuleDefinition[];
  industryRules: RuleDefinition[];
  location?: LocationData;
}

function validateTable(name: string, definitions: unknown): RuleDefinition[] {
  const result = ruleTableSchema.safeParse(definitions);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new RuleConfigError(`Invalid ${name}${where}: ${first?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

/**
 * Build a config from in-memory tables, e.g. for tests. Tables are validated
 * the same way as files on disk.
 */
export function createRuleConfig(tables: RuleTables): RuleConfig {
  return Object.freeze({
    roleTaxonomy: compileRuleTable(validateTable('role taxonomy', tables.roleTaxonomy)),
    skillLexicon: compileRuleTable(validateTable('skill lexicon', tables.skillLexicon)),
    industryRules: compileRuleTable(validateTable('industry rules', tables.industryRules)),
    location: new LocationClassifier(tables.location ?? loadLocationData()),
  });
}

export interface LoadRuleConfigOptions {
  rulesDir?: string;
  dataDir?: string;
}

export function loadRuleConfig(options: LoadRuleConfigOptions = {}): RuleConfig {
  const rulesDir = options.rulesDir ?? DEFAULT_RULES_DIR;

  return Object.freeze({
    roleTaxonomy: compileRuleTable(readConfigFile(join(rulesDir, ROLE_TAXONOMY_FILE), ruleTableSchema)),
    skillLexicon: compileRuleTable(readConfigFile(join(rulesDir, SKILL_LEXICON_FILE), ruleTableSchema)),
    industryRules: compileRuleTable(readConfigFile(join(rulesDir, INDUSTRY_RULES_FILE), ruleTableSchema)),
    location: new LocationClassifier(loadLocationData(options.dataDir ?? DEFAULT_DATA_DIR)),
  });
}
