import type { Database } from '@jobledger/db';
import { jobLatest, jobPartitions, jobRejects } from '@jobledger/db';
import { and, asc, desc, eq, gt, inArray, lt, or, sql } from 'drizzle-orm';
import {
  assertRecordsMatchKey,
  normalizePartitionKey,
  type PartitionStore,
  type PartitionWriteResult,
} from './partition-store.js';
import type { CanonicalJobRecord, PartitionKey, RejectRecord } from './types.js';

const INSERT_CHUNK_SIZE = 500;
const LOOKUP_CHUNK_SIZE = 1000;
const DEFAULT_PAGE_SIZE = 1000;

type CanonicalRow = typeof jobPartitions.$inferSelect;
type CanonicalInsert = typeof jobPartitions.$inferInsert;
type RejectInsert = typeof jobRejects.$inferInsert;

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

export function toCanonicalRow(record: CanonicalJobRecord): CanonicalInsert {
  return {
    ...record,
    skills: [...record.skills],
    scrapedAt: new Date(record.scrapedAt),
  };
}

export function fromCanonicalRow(row: CanonicalRow): CanonicalJobRecord {
  if (row.country !== 'US') {
    throw new Error(`Stored job ${row.jobKey} has country ${row.country}; only US rows are canonical`);
  }

  return {
    jobKey: row.jobKey,
    runDate: row.runDate,
    scrapedAt: row.scrapedAt.toISOString(),
    source: row.source,
    sourceJobId: row.sourceJobId,
    jobUrl: row.jobUrl,
    companyId: row.companyId,
    companyName: row.companyName,
    companyDomain: row.companyDomain,
    title: row.title,
    description: row.description,
    department: row.department,
    employmentType: row.employmentType,
    locationRaw: row.locationRaw,
    city: row.city,
    state: row.state,
    postalCode: row.postalCode,
    msa: row.msa,
    country: row.country,
    isRemote: row.isRemote,
    postedAt: row.postedAt,
    roleFamily: row.roleFamily,
    skills: row.skills,
    industryTag: row.industryTag,
  };
}

function toRejectRow(key: PartitionKey, reject: RejectRecord): RejectInsert {
  return {
    runDate: key.runDate,
    source: key.source,
    sourceJobId: reject.sourceJobId,
    companyId: reject.companyId,
    companyName: reject.companyName,
    locationRaw: reject.locationRaw,
    reason: reject.reason,
    detail: reject.detail,
  };
}

export interface PostgresPartitionStoreOptions {
  /** Rows fetched per query while scanning history. */
  pageSize?: number;
}

/**
 * PartitionStore over job_partitions / job_rejects / job_latest. Writers of
 * the same partition are serialized with a transaction-scoped advisory lock.
 */
export class PostgresPartitionStore implements PartitionStore {
  private readonly pageSize: number;

  constructor(
    private readonly db: Database,
    options: PostgresPartitionStoreOptions = {},
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async writePartition(
    key: PartitionKey,
    records: readonly CanonicalJobRecord[],
    rejects: readonly RejectRecord[],
  ): Promise<PartitionWriteResult> {
    const normalized = normalizePartitionKey(key);
    assertRecordsMatchKey(normalized, records);

    const rows = records.map(toCanonicalRow);
    const rejectRows = rejects.map((reject) => toRejectRow(normalized, reject));

    await this.db.transaction(async (tx) => {
      await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${`partition:${normalized.runDate}:${normalized.source}`}))`);

      await tx
        .delete(jobPartitions)
        .where(and(eq(jobPartitions.runDate, normalized.runDate), eq(jobPartitions.source, normalized.source)));
      await tx
        .delete(jobRejects)
        .where(and(eq(jobRejects.runDate, normalized.runDate), eq(jobRejects.source, normalized.source)));

      for (const batch of chunk(rows, INSERT_CHUNK_SIZE)) {
        await tx.insert(jobPartitions).values(batch);
      }
      for (const batch of chunk(rejectRows, INSERT_CHUNK_SIZE)) {
        await tx.insert(jobRejects).values(batch);
      }
    });

    return { written: rows.length, rejects: rejectRows.length };
  }

  /**
   * Keyset-paged scan. Within one job key the run date is unique, so
   * (job_key, run_date) is a stable cursor.
   */
  async *scanLatestOrder(): AsyncGenerator<CanonicalJobRecord, void, undefined> {
    let cursor: { jobKey: string; runDate: string } | null = null;

    while (true) {
      const after = cursor
        ? or(
            gt(jobPartitions.jobKey, cursor.jobKey),
            and(eq(jobPartitions.jobKey, cursor.jobKey), lt(jobPartitions.runDate, cursor.runDate)),
          )
        : undefined;

      const rows: CanonicalRow[] = await this.db
        .select()
        .from(jobPartitions)
        .where(after)
        .orderBy(
          asc(jobPartitions.jobKey),
          desc(jobPartitions.runDate),
          desc(jobPartitions.scrapedAt),
          asc(jobPartitions.jobUrl),
        )
        .limit(this.pageSize);

      for (const row of rows) {
        yield fromCanonicalRow(row);
      }

      const last = rows[rows.length - 1];
      if (!last || rows.length < this.pageSize) return;
      cursor = { jobKey: last.jobKey, runDate: last.runDate };
    }
  }

  async findKnownJobKeys(jobKeys: readonly string[], beforeRunDate: string): Promise<Set<string>> {
    const known = new Set<string>();
    const unique = [...new Set(jobKeys)];

    for (const batch of chunk(unique, LOOKUP_CHUNK_SIZE)) {
      const rows = await this.db
        .selectDistinct({ jobKey: jobPartitions.jobKey })
        .from(jobPartitions)
        .where(and(inArray(jobPartitions.jobKey, batch), lt(jobPartitions.runDate, beforeRunDate)));

      for (const row of rows) {
        known.add(row.jobKey);
      }
    }

    return known;
  }

  async listPartitions(): Promise<PartitionKey[]> {
    const [canonical, rejected] = await Promise.all([
      this.db.selectDistinct({ runDate: jobPartitions.runDate, source: jobPartitions.source }).from(jobPartitions),
      this.db.selectDistinct({ runDate: jobRejects.runDate, source: jobRejects.source }).from(jobRejects),
    ]);

    const keys = new Map<string, PartitionKey>();
    for (const row of [...canonical, ...rejected]) {
      keys.set(`${row.runDate}|${row.source}`, { runDate: row.runDate, source: row.source });
    }

    return [...keys.values()].sort((a, b) =>
      a.runDate === b.runDate ? a.source.localeCompare(b.source) : a.runDate.localeCompare(b.runDate),
    );
  }

  async replaceLatest(records: AsyncIterable<CanonicalJobRecord>): Promise<number> {
    let count = 0;

    await this.db.transaction(async (tx) => {
      await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${'job_latest'}))`);
      await tx.delete(jobLatest);

      let pending: CanonicalInsert[] = [];
      for await (const record of records) {
        pending.push(toCanonicalRow(record));
        if (pending.length >= INSERT_CHUNK_SIZE) {
          await tx.insert(jobLatest).values(pending);
          count += pending.length;
          pending = [];
        }
      }

      if (pending.length > 0) {
        await tx.insert(jobLatest).values(pending);
        count += pending.length;
      }
    });

    return count;
  }

  async readLatest(): Promise<CanonicalJobRecord[]> {
    const rows: CanonicalRow[] = await this.db.select().from(jobLatest).orderBy(asc(jobLatest.jobKey));
    return rows.map(fromCanonicalRow);
  }
}
