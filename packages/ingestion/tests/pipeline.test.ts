import { describe, it, expect, vi } from 'vitest';
import { ingestPartition, refreshLatestSnapshot } from '../src/pipeline.js';
import { MemoryPartitionStore, type PartitionStore } from '../src/partition-store.js';
import { computeJobKey } from '../src/job-key.js';
import { makePosting, shippedRules } from './fixtures.js';

function createLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('ingestPartition', () => {
  it('builds, classifies against history and writes a partition', async () => {
    const store = new MemoryPartitionStore();
    const logger = createLogger();

    const result = await ingestPartition(
      [
        makePosting({ sourceJobId: '1' }),
        makePosting({ sourceJobId: '2', locationRaw: 'London, UK' }),
        makePosting({ sourceJobId: '3', locationRaw: 'Remote' }),
      ],
      {
        key: { runDate: '2025-01-15', source: 'greenhouse' },
        store,
        rules: shippedRules(),
        scrapedAt: '2025-01-15T06:00:00.000Z',
        logger,
      },
    );

    expect(result.errors).toEqual([]);
    expect(result.stats).toEqual({
      received: 3,
      accepted: 1,
      rejected: 2,
      rejectsByReason: { 'non-US': 1, ambiguous: 1 },
      newJobs: 1,
      seenBefore: 0,
      written: 1,
    });
    expect(store.readPartition({ runDate: '2025-01-15', source: 'greenhouse' }).rejects).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith('[ingest:2025-01-15:greenhouse] 2 postings rejected (non-US=1, ambiguous=1)');
  });

  it('produces identical partitions when a run is repeated', async () => {
    const store = new MemoryPartitionStore();
    const options = {
      key: { runDate: '2025-01-15', source: 'greenhouse' },
      store,
      rules: shippedRules(),
      scrapedAt: '2025-01-15T06:00:00.000Z',
      logger: createLogger(),
    };
    const postings = [makePosting({ sourceJobId: '1' }), makePosting({ sourceJobId: '2', locationRaw: 'Denver, CO' })];

    await ingestPartition(postings, options);
    const first = store.readPartition(options.key);
    await ingestPartition(postings, options);
    const second = store.readPartition(options.key);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(second.records).toHaveLength(2);
  });

  it('keeps the job key across runs and surfaces only the later run in the snapshot', async () => {
    const store = new MemoryPartitionStore();
    const rules = shippedRules();
    const logger = createLogger();

    await ingestPartition([makePosting({ title: 'Data Analyst' })], {
      key: { runDate: '2025-01-15', source: 'greenhouse' },
      store,
      rules,
      scrapedAt: '2025-01-15T06:00:00.000Z',
      logger,
    });
    const second = await ingestPartition([makePosting({ title: 'Senior Data Analyst', locationRaw: 'Dallas, TX' })], {
      key: { runDate: '2025-01-16', source: 'greenhouse' },
      store,
      rules,
      scrapedAt: '2025-01-16T06:00:00.000Z',
      logger,
    });

    expect(second.stats.seenBefore).toBe(1);
    expect(second.stats.newJobs).toBe(0);

    const history = [];
    for await (const record of store.scanLatestOrder()) history.push(record);
    const jobKey = computeJobKey({ source: 'greenhouse', sourceJobId: '123', companyId: 'abc' });
    expect(history.map((record) => [record.jobKey, record.runDate, record.title])).toEqual([
      [jobKey, '2025-01-16', 'Senior Data Analyst'],
      [jobKey, '2025-01-15', 'Data Analyst'],
    ]);

    const snapshot = await refreshLatestSnapshot(store, { logger });
    expect(snapshot).toMatchObject({ jobs: 1, scanned: 2 });

    const latest = await store.readLatest();
    expect(latest).toHaveLength(1);
    expect(latest[0]).toMatchObject({ jobKey, runDate: '2025-01-16', title: 'Senior Data Analyst', city: 'Dallas' });
  });

  it('reports store failures as errors instead of throwing', async () => {
    const logger = createLogger();
    const failing: PartitionStore = {
      writePartition: vi.fn().mockRejectedValue(new Error('connection reset')),
      scanLatestOrder: vi.fn(),
      findKnownJobKeys: vi.fn().mockResolvedValue(new Set<string>()),
      listPartitions: vi.fn(),
      replaceLatest: vi.fn(),
      readLatest: vi.fn(),
    };

    const result = await ingestPartition([makePosting()], {
      key: { runDate: '2025-01-15', source: 'greenhouse' },
      store: failing,
      rules: shippedRules(),
      logger,
    });

    expect(result.errors).toEqual(['connection reset']);
    expect(result.stats.written).toBe(0);
    expect(logger.error).toHaveBeenCalledWith('[ingest:2025-01-15:greenhouse] Error: connection reset');
  });

  it('reports an invalid run date as an error', async () => {
    const result = await ingestPartition([], {
      key: { runDate: 'yesterday', source: 'greenhouse' },
      store: new MemoryPartitionStore(),
      rules: shippedRules(),
      logger: createLogger(),
    });

    expect(result.errors).toEqual(['Invalid run date "yesterday", expected YYYY-MM-DD']);
  });
});

describe('refreshLatestSnapshot', () => {
  it('writes an empty snapshot for an empty store', async () => {
    const store = new MemoryPartitionStore();

    const result = await refreshLatestSnapshot(store, { logger: createLogger() });

    expect(result).toMatchObject({ jobs: 0, scanned: 0 });
    expect(await store.readLatest()).toEqual([]);
  });
});
