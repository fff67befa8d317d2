import type { CanonicalJobRecord, RejectCounts, RejectRecord } from './types.js';
import { countRejects } from './batch.js';

export interface SkillCount {
  skill: string;
  count: number;
}

export interface GroupedSkillCount extends SkillCount {
  group: string;
}

export interface RoleMixEntry {
  industryTag: string;
  roleFamily: string;
  count: number;
}

export interface RunSummary {
  totalJobs: number;
  bySource: Record<string, number>;
  uniqueCompanies: number;
  remoteJobs: number;
  statesCovered: string[];
  withSkills: number;
  withIndustry: number;
  withRoleFamily: number;
  topSkills: SkillCount[];
  skillsByRoleFamily: GroupedSkillCount[];
  skillsByState: GroupedSkillCount[];
  roleMixByIndustry: RoleMixEntry[];
}

export interface SummarizeOptions {
  /** Length of `topSkills`. */
  topSkillsLimit?: number;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function byCountThenName(a: SkillCount, b: SkillCount): number {
  return b.count - a.count || a.skill.localeCompare(b.skill);
}

function groupedSkills(records: readonly CanonicalJobRecord[], groupOf: (record: CanonicalJobRecord) => string | null): GroupedSkillCount[] {
  const counts = new Map<string, Map<string, number>>();

  for (const record of records) {
    const group = groupOf(record);
    if (!group) continue;
    const skills = counts.get(group) ?? new Map<string, number>();
    counts.set(group, skills);
    for (const skill of record.skills) increment(skills, skill);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .flatMap(([group, skills]) =>
      [...skills.entries()].map(([skill, count]) => ({ skill, count })).sort(byCountThenName).map((entry) => ({ group, ...entry })),
    );
}

/**
 * Aggregate figures over a set of canonical records, typically one run or
 * the latest snapshot.
 */
export function summarizeRecords(records: readonly CanonicalJobRecord[], options: SummarizeOptions = {}): RunSummary {
  const limit = options.topSkillsLimit ?? 20;
  const bySource = new Map<string, number>();
  const companies = new Set<string>();
  const states = new Set<string>();
  const skills = new Map<string, number>();
  const roleMix = new Map<string, RoleMixEntry>();
  let remoteJobs = 0;
  let withSkills = 0;
  let withIndustry = 0;
  let withRoleFamily = 0;

  for (const record of records) {
    increment(bySource, record.source);
    companies.add(record.companyId);
    if (record.state) states.add(record.state);
    if (record.isRemote) remoteJobs++;
    if (record.skills.length > 0) withSkills++;
    if (record.industryTag) withIndustry++;
    if (record.roleFamily) withRoleFamily++;
    for (const skill of record.skills) increment(skills, skill);

    if (record.industryTag && record.roleFamily) {
      const key = `${record.industryTag}|${record.roleFamily}`;
      const entry = roleMix.get(key) ?? { industryTag: record.industryTag, roleFamily: record.roleFamily, count: 0 };
      entry.count++;
      roleMix.set(key, entry);
    }
  }

  return {
    totalJobs: records.length,
    bySource: Object.fromEntries([...bySource.entries()].sort(([a], [b]) => a.localeCompare(b))),
    uniqueCompanies: companies.size,
    remoteJobs,
    statesCovered: [...states].sort(),
    withSkills,
    withIndustry,
    withRoleFamily,
    topSkills: [...skills.entries()]
      .map(([skill, count]) => ({ skill, count }))
      .sort(byCountThenName)
      .slice(0, limit),
    skillsByRoleFamily: groupedSkills(records, (record) => record.roleFamily),
    skillsByState: groupedSkills(records, (record) => record.state),
    roleMixByIndustry: [...roleMix.values()].sort(
      (a, b) => a.industryTag.localeCompare(b.industryTag) || b.count - a.count || a.roleFamily.localeCompare(b.roleFamily),
    ),
  };
}

export function summarizeRejects(rejects: readonly RejectRecord[]): RejectCounts {
  return countRejects(rejects);
}
