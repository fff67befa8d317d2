import { loadRuleConfig, type RuleConfig } from '../src/rule-config.js';
import type { CanonicalJobRecord } from '../src/types.js';

let rules: RuleConfig | undefined;

/** Rule config built from the tables shipped in rules/ and data/. */
export function shippedRules(): RuleConfig {
  rules ??= loadRuleConfig();
  return rules;
}

export function makePosting(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    source: 'greenhouse',
    sourceJobId: '123',
    companyId: 'abc',
    companyName: 'Acme Analytics',
    title: 'Senior Software Engineer',
    description: '<p>Build services in Python and Go on AWS.</p>',
    locationRaw: 'Austin, TX',
    jobUrl: 'https://boards.example.com/acme/jobs/123',
    postedAt: '2025-01-10T08:00:00Z',
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<CanonicalJobRecord> = {}): CanonicalJobRecord {
  return {
    jobKey: 'key-1',
    runDate: '2025-01-15',
    scrapedAt: '2025-01-15T06:00:00.000Z',
    source: 'greenhouse',
    sourceJobId: '123',
    jobUrl: 'https://boards.example.com/acme/jobs/123',
    companyId: 'abc',
    companyName: 'Acme',
    companyDomain: null,
    title: 'Software Engineer',
    description: 'Build things',
    department: null,
    employmentType: null,
    locationRaw: 'Austin, TX',
    city: 'Austin',
    state: 'TX',
    postalCode: null,
    msa: null,
    country: 'US',
    isRemote: false,
    postedAt: null,
    roleFamily: 'Tech/Engineering',
    skills: [],
    industryTag: null,
    ...overrides,
  };
}
