import { assertRunDate, normalizeSource } from '@jobledger/ingestion';
import type { FlowProducer, JobsOptions } from 'bullmq';
import {
  LATEST_SNAPSHOT_QUEUE,
  PARTITION_BUILD_QUEUE,
  type LatestSnapshotJobData,
  type PartitionBuildJobData,
  type Queues,
} from './queues.js';

const RUN_ATTEMPTS = 3;
const RUN_BACKOFF_MS = 5000;

const retryOptions = {
  attempts: RUN_ATTEMPTS,
  backoff: {
    type: 'exponential',
    delay: RUN_BACKOFF_MS,
  },
  removeOnComplete: true,
  removeOnFail: 1000,
} satisfies JobsOptions;

// BullMQ reserves ':' in custom job ids.
export function buildJobId(runDate: string, source: string): string {
  return `build-${runDate}-${source}`;
}

export function snapshotJobId(runDate: string): string {
  return `snapshot-${runDate}`;
}

export interface DailyRunScheduleOptions {
  cron: string;
  sources: string[];
}

/** Register the repeatable job that starts one run per cron tick. */
export async function scheduleDailyRun(queues: Queues, options: DailyRunScheduleOptions): Promise<void> {
  await queues.runScheduleQueue.add(
    'daily-run',
    {
      sources: options.sources,
    },
    {
      jobId: 'daily-run',
      repeat: {
        pattern: options.cron,
      },
      ...retryOptions,
    },
  );
}

export interface EnqueueRunOptions {
  runDate: string;
  sources: string[];
  traceId?: string;
}

export interface EnqueuedRun {
  runDate: string;
  sources: string[];
  snapshotJobId: string;
  buildJobIds: string[];
}

/**
 * Enqueue one run as a flow: a build job per source, parented by the
 * snapshot job. BullMQ holds the parent until every child completed.
 */
export async function enqueueRun(flowProducer: FlowProducer, options: EnqueueRunOptions): Promise<EnqueuedRun> {
  const runDate = assertRunDate(options.runDate);
  const sources = [...new Set(options.sources.map(normalizeSource).filter((source) => source.length > 0))];
  if (sources.length === 0) {
    throw new Error(`Run ${runDate} has no sources to build`);
  }

  const parentId = snapshotJobId(runDate);
  const children = sources.map((source) => {
    const data: PartitionBuildJobData = { runDate, source, traceId: options.traceId };
    return {
      name: 'partition-build',
      queueName: PARTITION_BUILD_QUEUE,
      data,
      opts: {
        jobId: buildJobId(runDate, source),
        ...retryOptions,
      },
    };
  });
  const parentData: LatestSnapshotJobData = { runDate, traceId: options.traceId };

  await flowProducer.add({
    name: 'latest-snapshot',
    queueName: LATEST_SNAPSHOT_QUEUE,
    data: parentData,
    opts: {
      jobId: parentId,
      ...retryOptions,
    },
    children,
  });

  return {
    runDate,
    sources,
    snapshotJobId: parentId,
    buildJobIds: children.map((child) => child.opts.jobId),
  };
}
