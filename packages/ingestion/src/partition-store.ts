import { PartitionKeyMismatchError } from './errors.js';
import { compareLatest } from './latest.js';
import { assertRunDate, normalizeSource } from './normalize.js';
import type { CanonicalJobRecord, PartitionKey, RejectRecord } from './types.js';

export interface PartitionWriteResult {
  written: number;
  rejects: number;
}

/**
 * Storage for partitioned history. A partition is replaced wholesale on every
 * write; nothing is patched in place.
 */
export interface PartitionStore {
  writePartition(
    key: PartitionKey,
    records: readonly CanonicalJobRecord[],
    rejects: readonly RejectRecord[],
  ): Promise<PartitionWriteResult>;
  /** Every stored record in compareLatest order. */
  scanLatestOrder(): AsyncIterable<CanonicalJobRecord>;
  /** Job keys among `jobKeys` already stored under a run date before `beforeRunDate`. */
  findKnownJobKeys(jobKeys: readonly string[], beforeRunDate: string): Promise<Set<string>>;
  listPartitions(): Promise<PartitionKey[]>;
  /** Replace the materialized latest snapshot; returns the row count. */
  replaceLatest(records: AsyncIterable<CanonicalJobRecord>): Promise<number>;
  readLatest(): Promise<CanonicalJobRecord[]>;
}

export function normalizePartitionKey(key: PartitionKey): PartitionKey {
  return { runDate: assertRunDate(key.runDate), source: normalizeSource(key.source) };
}

/**
 * Throws PartitionKeyMismatchError for the first record that belongs to
 * another partition.
 */
export function assertRecordsMatchKey(key: PartitionKey, records: readonly CanonicalJobRecord[]): void {
  for (const record of records) {
    if (record.runDate !== key.runDate || record.source !== key.source) {
      throw new PartitionKeyMismatchError(key, record.jobKey, { runDate: record.runDate, source: record.source });
    }
  }
}

function partitionId(key: PartitionKey): string {
  return `${key.runDate}|${key.source}`;
}

function copyRecord(record: CanonicalJobRecord): CanonicalJobRecord {
  return { ...record, skills: [...record.skills] };
}

function comparePartitionKeys(a: PartitionKey, b: PartitionKey): number {
  if (a.runDate !== b.runDate) return a.runDate < b.runDate ? -1 : 1;
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  return 0;
}

interface StoredPartition {
  key: PartitionKey;
  records: CanonicalJobRecord[];
  rejects: RejectRecord[];
}

/**
 * In-process PartitionStore for tests and dry runs.
 */
export class MemoryPartitionStore implements PartitionStore {
  private readonly partitions = new Map<string, StoredPartition>();
  private latest: CanonicalJobRecord[] = [];

  async writePartition(
    key: PartitionKey,
    records: readonly CanonicalJobRecord[],
    rejects: readonly RejectRecord[],
  ): Promise<PartitionWriteResult> {
    const normalized = normalizePartitionKey(key);
    assertRecordsMatchKey(normalized, records);

    this.partitions.set(partitionId(normalized), {
      key: normalized,
      records: records.map(copyRecord),
      rejects: rejects.map((reject) => ({ ...reject })),
    });

    return { written: records.length, rejects: rejects.length };
  }

  async *scanLatestOrder(): AsyncGenerator<CanonicalJobRecord, void, undefined> {
    const all = [...this.partitions.values()].flatMap((partition) => partition.records);
    for (const record of all.sort(compareLatest)) {
      yield copyRecord(record);
    }
  }

  async findKnownJobKeys(jobKeys: readonly string[], beforeRunDate: string): Promise<Set<string>> {
    const wanted = new Set(jobKeys);
    const known = new Set<string>();

    for (const partition of this.partitions.values()) {
      if (partition.key.runDate >= beforeRunDate) continue;
      for (const record of partition.records) {
        if (wanted.has(record.jobKey)) known.add(record.jobKey);
      }
    }

    return known;
  }

  async listPartitions(): Promise<PartitionKey[]> {
    return [...this.partitions.values()].map((partition) => ({ ...partition.key })).sort(comparePartitionKeys);
  }

  async replaceLatest(records: AsyncIterable<CanonicalJobRecord>): Promise<number> {
    const next: CanonicalJobRecord[] = [];
    for await (const record of records) {
      next.push(copyRecord(record));
    }
    this.latest = next;
    return next.length;
  }

  async readLatest(): Promise<CanonicalJobRecord[]> {
    return this.latest.map(copyRecord);
  }

  /** Stored rows of one partition; empty when it was never written. */
  readPartition(key: PartitionKey): { records: CanonicalJobRecord[]; rejects: RejectRecord[] } {
    const stored = this.partitions.get(partitionId(normalizePartitionKey(key)));
    return {
      records: stored ? stored.records.map(copyRecord) : [],
      rejects: stored ? stored.rejects.map((reject) => ({ ...reject })) : [],
    };
  }
}
