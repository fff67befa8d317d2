import { describe, it, expect } from 'vitest';
import { MemoryPartitionStore } from '../src/partition-store.js';
import { PartitionKeyMismatchError } from '../src/errors.js';
import type { CanonicalJobRecord, RejectRecord } from '../src/types.js';
import { makeRecord } from './fixtures.js';

async function collect(iterable: AsyncIterable<CanonicalJobRecord>): Promise<CanonicalJobRecord[]> {
  const out: CanonicalJobRecord[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

const reject: RejectRecord = {
  runDate: '2025-01-15',
  source: 'greenhouse',
  sourceJobId: '9',
  companyId: 'abc',
  companyName: 'Acme',
  locationRaw: 'Remote',
  reason: 'ambiguous',
  detail: 'Location "Remote" is ambiguous',
};

describe('MemoryPartitionStore', () => {
  const key = { runDate: '2025-01-15', source: 'greenhouse' };

  it('replaces a partition wholesale on rewrite', async () => {
    const store = new MemoryPartitionStore();
    await store.writePartition(key, [makeRecord({ jobKey: 'a' }), makeRecord({ jobKey: 'b' })], [reject]);
    await store.writePartition(key, [makeRecord({ jobKey: 'a' })], []);

    const stored = store.readPartition(key);
    expect(stored.records.map((record) => record.jobKey)).toEqual(['a']);
    expect(stored.rejects).toEqual([]);
  });

  it('gives identical contents when the same run is written twice', async () => {
    const store = new MemoryPartitionStore();
    const records = [makeRecord({ jobKey: 'a' }), makeRecord({ jobKey: 'b' })];

    await store.writePartition(key, records, [reject]);
    const first = await collect(store.scanLatestOrder());
    await store.writePartition(key, records, [reject]);
    const second = await collect(store.scanLatestOrder());

    expect(second).toEqual(first);
    expect(second).toHaveLength(2);
  });

  it('refuses records from another partition', async () => {
    const store = new MemoryPartitionStore();

    await expect(store.writePartition(key, [makeRecord({ runDate: '2025-01-14' })], [])).rejects.toBeInstanceOf(
      PartitionKeyMismatchError,
    );
  });

  it('refuses malformed run dates', async () => {
    const store = new MemoryPartitionStore();

    await expect(store.writePartition({ runDate: '2025-13-01', source: 'greenhouse' }, [], [])).rejects.toThrow(
      'Invalid run date "2025-13-01", expected YYYY-MM-DD',
    );
  });

  it('scans records in latest order', async () => {
    const store = new MemoryPartitionStore();
    await store.writePartition(key, [makeRecord({ jobKey: 'b' }), makeRecord({ jobKey: 'a' })], []);
    await store.writePartition({ runDate: '2025-01-16', source: 'greenhouse' }, [makeRecord({ jobKey: 'a', runDate: '2025-01-16' })], []);

    const scanned = await collect(store.scanLatestOrder());
    expect(scanned.map((record) => `${record.jobKey}@${record.runDate}`)).toEqual([
      'a@2025-01-16',
      'a@2025-01-15',
      'b@2025-01-15',
    ]);
  });

  it('finds job keys stored before a run date only', async () => {
    const store = new MemoryPartitionStore();
    await store.writePartition(key, [makeRecord({ jobKey: 'a' })], []);
    await store.writePartition({ runDate: '2025-01-16', source: 'greenhouse' }, [makeRecord({ jobKey: 'b', runDate: '2025-01-16' })], []);

    expect(await store.findKnownJobKeys(['a', 'b', 'c'], '2025-01-16')).toEqual(new Set(['a']));
    expect(await store.findKnownJobKeys(['a', 'b'], '2025-01-15')).toEqual(new Set());
  });

  it('lists written partitions, including empty ones', async () => {
    const store = new MemoryPartitionStore();
    await store.writePartition({ runDate: '2025-01-16', source: 'Lever' }, [], []);
    await store.writePartition(key, [makeRecord()], []);

    expect(await store.listPartitions()).toEqual([
      { runDate: '2025-01-15', source: 'greenhouse' },
      { runDate: '2025-01-16', source: 'lever' },
    ]);
  });

  it('does not share record objects with callers', async () => {
    const store = new MemoryPartitionStore();
    const record = makeRecord({ skills: ['SQL'] });
    await store.writePartition(key, [record], []);
    record.skills.push('Python');

    expect(store.readPartition(key).records[0]?.skills).toEqual(['SQL']);
  });
});
