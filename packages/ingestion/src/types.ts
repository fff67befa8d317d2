import type { RuleConfig } from './rule-config.js';

export type LocationRejectReason = 'non-US' | 'ambiguous';

export type RejectReason =
  | LocationRejectReason
  | 'missing_required_field'
  | 'invalid_field'
  | 'source_mismatch'
  | 'enrichment_error'
  | 'duplicate_job_key';

interface LocationFields {
  country: string | null;
  state: string | null;
  city: string | null;
  postalCode: string | null;
  msa: string | null;
  isRemote: boolean;
}

/**
 * Result of classifying a free-text location. `country` is always "US" when
 * accepted; on rejection it carries the detected foreign country, if any.
 */
export type LocationClassification =
  | (LocationFields & { accepted: true; reason: null })
  | (LocationFields & { accepted: false; reason: LocationRejectReason });

/**
 * Normalized, enriched, US-accepted representation of one posting as observed
 * in one run.
 */
export interface CanonicalJobRecord {
  jobKey: string;
  runDate: string;
  scrapedAt: string;
  source: string;
  sourceJobId: string;
  jobUrl: string | null;
  companyId: string;
  companyName: string | null;
  companyDomain: string | null;
  title: string;
  description: string;
  department: string | null;
  employmentType: string | null;
  locationRaw: string;
  city: string | null;
  state: string | null;
  postalCode: string | null;
  msa: string | null;
  country: 'US';
  isRemote: boolean;
  postedAt: string | null;
  roleFamily: string | null;
  skills: string[];
  industryTag: string | null;
}

export interface RejectRecord {
  runDate: string;
  source: string | null;
  sourceJobId: string | null;
  companyId: string | null;
  companyName: string | null;
  locationRaw: string | null;
  reason: RejectReason;
  detail: string;
}

export type BuildOutcome =
  | { action: 'accept'; record: CanonicalJobRecord }
  | { action: 'reject'; reject: RejectRecord };

export interface BuildContext {
  /** Batch date, `YYYY-MM-DD`. */
  runDate: string;
  /** Fallback scrape timestamp for postings that carry none. */
  scrapedAt: string;
  rules: RuleConfig;
}

export interface PartitionKey {
  runDate: string;
  source: string;
}

export type RejectCounts = Partial<Record<RejectReason, number>>;

export interface BuildStats {
  received: number;
  accepted: number;
  rejected: number;
  rejectsByReason: RejectCounts;
}

/**
 * Per-stage counts for observability.
 */
export interface BatchStageStats extends BuildStats {
  newJobs: number;
  seenBefore: number;
  written: number;
}

export interface BatchBuildResult {
  records: CanonicalJobRecord[];
  rejects: RejectRecord[];
  stats: BuildStats;
}

/**
 * Result of ingesting one (run_date, source) partition.
 */
export interface PartitionIngestionResult {
  runDate: string;
  source: string;
  stats: BatchStageStats;
  errors: string[];
  durationMs: number;
}

export interface SnapshotResult {
  jobs: number;
  scanned: number;
  durationMs: number;
}

/**
 * Minimal logger interface; defaults to console.
 */
export interface IngestionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
