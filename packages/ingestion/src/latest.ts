import { SnapshotOrderError } from './errors.js';
import type { PartitionStore } from './partition-store.js';
import type { CanonicalJobRecord } from './types.js';

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** JSON with sorted keys, so equal records always serialize identically. */
export function canonicalJson(record: CanonicalJobRecord): string {
  return JSON.stringify(record, Object.keys(record).sort());
}

/**
 * Total order used to pick the latest observation: job key ascending, then
 * newest run date, newest scrape, smallest job URL (missing URLs last), and
 * finally the canonical JSON of the record.
 */
export function compareLatest(a: CanonicalJobRecord, b: CanonicalJobRecord): number {
  const byKey = compareStrings(a.jobKey, b.jobKey);
  if (byKey !== 0) return byKey;

  const byRunDate = compareStrings(b.runDate, a.runDate);
  if (byRunDate !== 0) return byRunDate;

  const byScrape = Date.parse(b.scrapedAt) - Date.parse(a.scrapedAt);
  if (byScrape !== 0) return byScrape;

  if (a.jobUrl !== b.jobUrl) {
    if (a.jobUrl === null) return 1;
    if (b.jobUrl === null) return -1;
    return compareStrings(a.jobUrl, b.jobUrl);
  }

  return compareStrings(canonicalJson(a), canonicalJson(b));
}

/**
 * One record per job key, the latest observation of each, ordered by job key.
 */
export function mergeLatest(records: Iterable<CanonicalJobRecord>): CanonicalJobRecord[] {
  const sorted = [...records].sort(compareLatest);
  const latest: CanonicalJobRecord[] = [];

  for (const record of sorted) {
    const previous = latest[latest.length - 1];
    if (previous?.jobKey !== record.jobKey) {
      latest.push(record);
    }
  }

  return latest;
}

/**
 * Streaming variant of mergeLatest. Input must already be in compareLatest
 * order; only the current group head is held in memory.
 */
export async function* reduceLatest(
  ordered: AsyncIterable<CanonicalJobRecord>,
): AsyncGenerator<CanonicalJobRecord, void, undefined> {
  let previousKey: string | null = null;

  for await (const record of ordered) {
    if (previousKey !== null && record.jobKey < previousKey) {
      throw new SnapshotOrderError(previousKey, record.jobKey);
    }

    if (record.jobKey !== previousKey) {
      previousKey = record.jobKey;
      yield record;
    }
  }
}

export async function buildLatestSnapshot(store: PartitionStore): Promise<CanonicalJobRecord[]> {
  const latest: CanonicalJobRecord[] = [];
  for await (const record of reduceLatest(store.scanLatestOrder())) {
    latest.push(record);
  }
  return latest;
}
