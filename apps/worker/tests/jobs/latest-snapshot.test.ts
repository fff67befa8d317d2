import type { Job } from 'bullmq';
import { MemoryPartitionStore, type CanonicalJobRecord } from '@jobledger/ingestion';
import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { handleLatestSnapshotJob } from '../../src/jobs/latest-snapshot.js';
import type { LatestSnapshotJobData } from '../../src/queues.js';
import { stub } from '../test-helpers.js';

function record(overrides: Partial<CanonicalJobRecord>): CanonicalJobRecord {
  return {
    jobKey: 'key-1',
    runDate: '2024-05-01',
    scrapedAt: '2024-05-01T06:00:00.000Z',
    source: 'greenhouse',
    sourceJobId: '1',
    jobUrl: null,
    companyId: 'abc',
    companyName: 'Acme',
    companyDomain: null,
    title: 'Data Engineer',
    description: '',
    department: null,
    employmentType: null,
    locationRaw: 'Austin, TX',
    city: 'Austin',
    state: 'TX',
    postalCode: null,
    msa: null,
    country: 'US',
    isRemote: false,
    postedAt: null,
    roleFamily: 'Data/Analytics',
    skills: ['Python'],
    industryTag: null,
    ...overrides,
  };
}

describe('handleLatestSnapshotJob', () => {
  it('rebuilds the latest snapshot and logs its summary', async () => {
    const store = new MemoryPartitionStore();
    await store.writePartition(
      { runDate: '2024-04-30', source: 'greenhouse' },
      [record({ runDate: '2024-04-30', title: 'Old title' }), record({ jobKey: 'key-2', runDate: '2024-04-30' })],
      [],
    );
    await store.writePartition(
      { runDate: '2024-05-01', source: 'greenhouse' },
      [record({ title: 'New title', isRemote: true })],
      [],
    );

    const logger = stub<Logger>({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });
    logger.child = vi.fn().mockReturnValue(logger);
    const job = stub<Job<LatestSnapshotJobData>>({
      id: 'snapshot-2024-05-01',
      name: 'latest-snapshot',
      timestamp: Date.parse('2024-05-01T06:00:00.000Z'),
      data: { runDate: '2024-05-01' },
    });

    const result = await handleLatestSnapshotJob(job, { store, logger });

    expect(result).toMatchObject({ runDate: '2024-05-01', jobs: 2, scanned: 3 });
    expect(result.summary.totalJobs).toBe(2);
    expect(result.summary.remoteJobs).toBe(1);

    const latest = await store.readLatest();
    expect(latest.map((row) => [row.jobKey, row.runDate, row.title])).toEqual([
      ['key-1', '2024-05-01', 'New title'],
      ['key-2', '2024-04-30', 'Data Engineer'],
    ]);

    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({
        event: 'snapshot_summary',
        totalJobs: 2,
        bySource: { greenhouse: 2 },
        uniqueCompanies: 1,
        remoteJobs: 1,
        statesCovered: ['TX'],
        topSkills: [{ skill: 'Python', count: 2 }],
      }),
      'Latest snapshot summary',
    );
  });
});
