// Pipeline
export { ingestPartition, refreshLatestSnapshot } from './pipeline.js';
export type { IngestPartitionOptions, RefreshLatestOptions } from './pipeline.js';

// Individual stages
export { buildCanonicalRecord } from './builder.js';
export { buildBatch, batchOptionsFor, countRejects } from './batch.js';
export type { BatchBuildOptions } from './batch.js';
export { classifyAgainstHistory } from './dedup.js';
export type { HistoryClassification } from './dedup.js';
export { compareLatest, mergeLatest, reduceLatest, buildLatestSnapshot, canonicalJson } from './latest.js';
export { summarizeRecords, summarizeRejects } from './summary.js';
export type { RunSummary, SkillCount, GroupedSkillCount, RoleMixEntry, SummarizeOptions } from './summary.js';

// Classifiers
export { LocationClassifier, classifyLocation, getDefaultLocationClassifier } from './location.js';
export { loadLocationData, DEFAULT_DATA_DIR } from './location-data.js';
export type { LocationData, UsState, NonUsMarker, MetroArea } from './location-data.js';
export { classifyRoleFamily } from './role-family.js';
export { extractSkills } from './skills.js';
export { tagIndustry } from './industry.js';
export type { IndustrySignals } from './industry.js';
export { computeJobKey } from './job-key.js';
export type { JobIdentity } from './job-key.js';
export { compilePattern, compileRule, compileRuleTable, findFirstMatchingRule } from './rules.js';
export type { RuleDefinition, CompiledRule, RuleTable } from './rules.js';
export { loadRuleConfig, createRuleConfig, DEFAULT_RULES_DIR } from './rule-config.js';
export type { RuleConfig, RuleTables, LoadRuleConfigOptions } from './rule-config.js';
export {
  normalizeWhitespace,
  stripHtml,
  decodeHtmlEntities,
  normalizeDescription,
  normalizePostedDate,
  normalizeTimestamp,
  isRunDate,
  assertRunDate,
  normalizeOptionalText,
  normalizeSource,
} from './normalize.js';

// Storage
export { MemoryPartitionStore } from './partition-store.js';
export type { PartitionStore, PartitionWriteResult } from './partition-store.js';
export { PostgresPartitionStore } from './store.js';
export type { PostgresPartitionStoreOptions } from './store.js';

// Errors
export { RuleConfigError, PartitionKeyMismatchError, SnapshotOrderError } from './errors.js';

// Types
export type {
  CanonicalJobRecord,
  RejectRecord,
  RejectReason,
  RejectCounts,
  LocationClassification,
  LocationRejectReason,
  BuildContext,
  BuildOutcome,
  BuildStats,
  BatchBuildResult,
  BatchStageStats,
  PartitionKey,
  PartitionIngestionResult,
  SnapshotResult,
  IngestionLogger,
} from './types.js';
