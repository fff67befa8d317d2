import type { PartitionStore } from './partition-store.js';
import type { CanonicalJobRecord } from './types.js';

export interface HistoryClassification {
  newJobs: CanonicalJobRecord[];
  seenBefore: CanonicalJobRecord[];
}

/**
 * Split a batch into jobs first observed in this run and jobs already stored
 * under an earlier run date. Same-day partitions never count as history, so a
 * repeated run classifies the same way.
 */
export async function classifyAgainstHistory(
  records: readonly CanonicalJobRecord[],
  store: Pick<PartitionStore, 'findKnownJobKeys'>,
  runDate: string,
): Promise<HistoryClassification> {
  if (records.length === 0) return { newJobs: [], seenBefore: [] };

  const known = await store.findKnownJobKeys(
    records.map((record) => record.jobKey),
    runDate,
  );

  const newJobs: CanonicalJobRecord[] = [];
  const seenBefore: CanonicalJobRecord[] = [];
  for (const record of records) {
    (known.has(record.jobKey) ? seenBefore : newJobs).push(record);
  }

  return { newJobs, seenBefore };
}
