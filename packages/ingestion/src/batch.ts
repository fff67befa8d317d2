import { buildCanonicalRecord } from './builder.js';
import { normalizeSource } from './normalize.js';
import type {
  BatchBuildResult,
  BuildContext,
  CanonicalJobRecord,
  PartitionKey,
  RejectCounts,
  RejectRecord,
} from './types.js';

export interface BatchBuildOptions extends BuildContext {
  /** Postings whose source differs from the partition's are rejected. */
  source?: string;
}

export function countRejects(rejects: readonly RejectRecord[]): RejectCounts {
  const counts: RejectCounts = {};
  for (const reject of rejects) {
    counts[reject.reason] = (counts[reject.reason] ?? 0) + 1;
  }
  return counts;
}

function duplicateReject(record: CanonicalJobRecord): RejectRecord {
  return {
    runDate: record.runDate,
    source: record.source,
    sourceJobId: record.sourceJobId,
    companyId: record.companyId,
    companyName: record.companyName,
    locationRaw: record.locationRaw,
    reason: 'duplicate_job_key',
    detail: `Job key ${record.jobKey} already seen earlier in this batch`,
  };
}

function sourceMismatchReject(record: CanonicalJobRecord, expected: string): RejectRecord {
  return {
    ...duplicateReject(record),
    reason: 'source_mismatch',
    detail: `Posting source "${record.source}" does not belong to partition source "${expected}"`,
  };
}

/**
 * Build every posting of one batch. A failing posting never stops the batch;
 * the first posting for a job key wins and later ones are rejected.
 */
export function buildBatch(postings: readonly unknown[], options: BatchBuildOptions): BatchBuildResult {
  const expectedSource = options.source ? normalizeSource(options.source) : null;
  const records: CanonicalJobRecord[] = [];
  const rejects: RejectRecord[] = [];
  const seen = new Set<string>();

  for (const posting of postings) {
    const outcome = buildCanonicalRecord(posting, options);

    if (outcome.action === 'reject') {
      rejects.push(outcome.reject);
      continue;
    }

    const record = outcome.record;
    if (expectedSource && record.source !== expectedSource) {
      rejects.push(sourceMismatchReject(record, expectedSource));
      continue;
    }

    if (seen.has(record.jobKey)) {
      rejects.push(duplicateReject(record));
      continue;
    }

    seen.add(record.jobKey);
    records.push(record);
  }

  return {
    records,
    rejects,
    stats: {
      received: postings.length,
      accepted: records.length,
      rejected: rejects.length,
      rejectsByReason: countRejects(rejects),
    },
  };
}

/** Build context for a partition key: the key pins both run date and source. */
export function batchOptionsFor(key: PartitionKey, context: Omit<BuildContext, 'runDate'>): BatchBuildOptions {
  return { ...context, runDate: key.runDate, source: key.source };
}
