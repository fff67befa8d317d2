import { describe, it, expect, vi } from 'vitest';
import type { Database } from '@jobledger/db';
import { PostgresPartitionStore, chunk, fromCanonicalRow, toCanonicalRow } from '../src/store.js';
import { PartitionKeyMismatchError } from '../src/errors.js';
import type { CanonicalJobRecord } from '../src/types.js';
import { makeRecord } from './fixtures.js';

function mockTx() {
  const execute = vi.fn().mockResolvedValue([]);
  const where = vi.fn().mockResolvedValue([]);
  const del = vi.fn().mockReturnValue({ where });
  const values = vi.fn().mockResolvedValue([]);
  const insert = vi.fn().mockReturnValue({ values });

  return { tx: { execute, delete: del, insert }, execute, delete: del, where, insert, values };
}

function mockDb() {
  const txMock = mockTx();
  const transaction = vi.fn(async (run: (tx: unknown) => Promise<void>) => run(txMock.tx));

  const limit = vi.fn();
  const orderBy = vi.fn().mockReturnValue({ limit });
  const selectWhere = vi.fn().mockReturnValue({ orderBy });
  const from = vi.fn().mockReturnValue({ where: selectWhere });
  const select = vi.fn().mockReturnValue({ from });

  const distinctWhere = vi.fn();
  const distinctFrom = vi.fn().mockReturnValue({ where: distinctWhere });
  const selectDistinct = vi.fn().mockReturnValue({ from: distinctFrom });

  return {
    db: { transaction, select, selectDistinct } as unknown as Database,
    transaction,
    limit,
    selectWhere,
    distinctWhere,
    distinctFrom,
    selectDistinct,
    ...txMock,
  };
}

async function collect(iterable: AsyncIterable<CanonicalJobRecord>): Promise<CanonicalJobRecord[]> {
  const out: CanonicalJobRecord[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

describe('PostgresPartitionStore', () => {
  const key = { runDate: '2025-01-15', source: 'greenhouse' };

  it('replaces a partition inside one locked transaction', async () => {
    const mock = mockDb();
    const store = new PostgresPartitionStore(mock.db);

    const result = await store.writePartition(key, [makeRecord({ jobKey: 'a' }), makeRecord({ jobKey: 'b' })], [
      {
        runDate: '2025-01-15',
        source: null,
        sourceJobId: null,
        companyId: null,
        companyName: null,
        locationRaw: null,
        reason: 'missing_required_field',
        detail: 'Missing or empty: source',
      },
    ]);

    expect(result).toEqual({ written: 2, rejects: 1 });
    expect(mock.transaction).toHaveBeenCalledTimes(1);
    expect(mock.execute).toHaveBeenCalledTimes(1);
    expect(mock.delete).toHaveBeenCalledTimes(2);
    expect(mock.insert).toHaveBeenCalledTimes(2);

    const insertedJobs = mock.values.mock.calls[0]?.[0];
    expect(insertedJobs).toHaveLength(2);
    expect(insertedJobs[0].scrapedAt).toEqual(new Date('2025-01-15T06:00:00.000Z'));

    const insertedRejects = mock.values.mock.calls[1]?.[0];
    expect(insertedRejects[0]).toMatchObject({ source: 'greenhouse', reason: 'missing_required_field' });
  });

  it('deletes without inserting when the partition is now empty', async () => {
    const mock = mockDb();
    const store = new PostgresPartitionStore(mock.db);

    await store.writePartition(key, [], []);

    expect(mock.delete).toHaveBeenCalledTimes(2);
    expect(mock.insert).not.toHaveBeenCalled();
  });

  it('refuses mismatched records before opening a transaction', async () => {
    const mock = mockDb();
    const store = new PostgresPartitionStore(mock.db);

    await expect(store.writePartition(key, [makeRecord({ source: 'lever' })], [])).rejects.toBeInstanceOf(
      PartitionKeyMismatchError,
    );
    expect(mock.transaction).not.toHaveBeenCalled();
  });

  it('pages through history until a short page', async () => {
    const mock = mockDb();
    const store = new PostgresPartitionStore(mock.db, { pageSize: 2 });
    mock.limit
      .mockResolvedValueOnce([
        toCanonicalRow(makeRecord({ jobKey: 'a', runDate: '2025-01-16' })),
        toCanonicalRow(makeRecord({ jobKey: 'a', runDate: '2025-01-15' })),
      ])
      .mockResolvedValueOnce([toCanonicalRow(makeRecord({ jobKey: 'b' }))]);

    const scanned = await collect(store.scanLatestOrder());

    expect(scanned.map((record) => `${record.jobKey}@${record.runDate}`)).toEqual([
      'a@2025-01-16',
      'a@2025-01-15',
      'b@2025-01-15',
    ]);
    expect(mock.limit).toHaveBeenCalledTimes(2);
    expect(mock.selectWhere.mock.calls[0]?.[0]).toBeUndefined();
    expect(mock.selectWhere.mock.calls[1]?.[0]).toBeDefined();
  });

  it('looks up known job keys in chunks', async () => {
    const mock = mockDb();
    const store = new PostgresPartitionStore(mock.db);
    mock.distinctWhere.mockResolvedValueOnce([{ jobKey: 'k1' }]).mockResolvedValueOnce([{ jobKey: 'k1500' }]);
    const keys = Array.from({ length: 1500 }, (_, index) => `k${index + 1}`);

    const known = await store.findKnownJobKeys(keys, '2025-01-15');

    expect(known).toEqual(new Set(['k1', 'k1500']));
    expect(mock.distinctWhere).toHaveBeenCalledTimes(2);
  });
});

describe('row mapping', () => {
  it('round-trips a record through its row shape', () => {
    const record = makeRecord({ skills: ['SQL'], postedAt: '2025-01-10' });
    const row = { ...toCanonicalRow(record), jobUrl: record.jobUrl };

    expect(
      fromCanonicalRow({
        ...row,
        scrapedAt: new Date(record.scrapedAt),
        companyName: record.companyName,
        companyDomain: null,
        jobUrl: record.jobUrl,
        department: null,
        employmentType: null,
        city: record.city,
        state: record.state,
        postalCode: null,
        msa: null,
        postedAt: '2025-01-10',
        roleFamily: record.roleFamily,
        industryTag: null,
      }),
    ).toEqual(record);
  });

  it('refuses non-US rows', () => {
    const row = toCanonicalRow(makeRecord());

    expect(() =>
      fromCanonicalRow({
        ...row,
        country: 'GB',
        scrapedAt: new Date('2025-01-15T06:00:00.000Z'),
        jobUrl: null,
        companyName: null,
        companyDomain: null,
        department: null,
        employmentType: null,
        city: null,
        state: null,
        postalCode: null,
        msa: null,
        postedAt: null,
        roleFamily: null,
        industryTag: null,
      }),
    ).toThrow('Stored job key-1 has country GB; only US rows are canonical');
  });
});

describe('chunk', () => {
  it('splits into fixed-size slices', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 2)).toEqual([]);
  });
});
