import type { Job } from 'bullmq';
import { Worker } from 'bullmq';
import { createDatabase, type Database } from '@jobledger/db';
import { loadRuleConfig, PostgresPartitionStore } from '@jobledger/ingestion';
import type { Logger } from 'pino';
import { loadWorkerConfig } from './config.js';
import { handleBuildPartitionJob } from './jobs/build-partition.js';
import { handleDailyRunJob } from './jobs/daily-run.js';
import { handleLatestSnapshotJob } from './jobs/latest-snapshot.js';
import {
  createQueues,
  type DailyRunJobData,
  LATEST_SNAPSHOT_QUEUE,
  type LatestSnapshotJobData,
  PARTITION_BUILD_QUEUE,
  type PartitionBuildJobData,
  type Queues,
  RUN_SCHEDULE_QUEUE,
} from './queues.js';
import { createRedisConnection } from './redis.js';
import { scheduleDailyRun } from './scheduler.js';
import { createWorkerLogger } from './observability/logger.js';
import { withLogger, type WithLoggerOptions } from './observability/with-logger.js';
import type { TraceableData } from './observability/trace.js';

interface RuntimeState {
  db: Database | null;
  redis: ReturnType<typeof createRedisConnection> | null;
  queues: Queues | null;
  workers: Array<Worker>;
}

const runtimeState: RuntimeState = {
  db: null,
  redis: null,
  queues: null,
  workers: [],
};

async function closeDbConnection(db: Database | null): Promise<void> {
  if (!db) {
    return;
  }

  await db.$client.end();
}

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  await Promise.allSettled(state.workers.map((worker) => worker.close()));

  if (state.queues) {
    await Promise.allSettled([state.queues.runScheduleQueue.close(), state.queues.flowProducer.close()]);
  }

  if (state.redis) {
    await Promise.allSettled([state.redis.quit()]);
  }

  await Promise.allSettled([closeDbConnection(state.db)]);
}

async function run(logger: Logger): Promise<void> {
  const config = loadWorkerConfig();

  // Rule tables are validated before anything connects.
  const rules = loadRuleConfig({ rulesDir: config.rulesDir });

  const db = createDatabase(config.databaseUrl);
  runtimeState.db = db;
  const store = new PostgresPartitionStore(db, { pageSize: config.snapshotPageSize });

  const redis = createRedisConnection(config.redisUrl);
  runtimeState.redis = redis;
  const queues = createQueues(redis);
  runtimeState.queues = queues;

  function createObservedWorker<TData extends TraceableData, TResult>(
    queue: string,
    concurrency: number,
    processor: (job: Job<TData>) => Promise<TResult>,
    observe: Pick<WithLoggerOptions<TData, TResult>, 'summary'> & {
      context?: (job: Job<TData>) => Record<string, unknown>;
    },
  ): Worker<TData, TResult> {
    const { context, summary } = observe;
    return new Worker<TData, TResult>(
      queue,
      (job) =>
        withLogger({
          logger,
          queue,
          job,
          context: context ? () => context(job) : undefined,
          summary,
          run: () => processor(job),
        }),
      { connection: redis, concurrency },
    );
  }

  const dailyRunWorker = createObservedWorker(
    RUN_SCHEDULE_QUEUE,
    1,
    (job: Job<DailyRunJobData>) => handleDailyRunJob(job, { queues }),
    {
      summary: (result) => ({
        runDate: result.runDate,
        sources: result.sources,
        snapshotJobId: result.snapshotJobId,
      }),
    },
  );

  const buildWorker = createObservedWorker(
    PARTITION_BUILD_QUEUE,
    config.concurrency,
    (job: Job<PartitionBuildJobData>) => handleBuildPartitionJob(job, { db, store, rules, logger }),
    {
      context: (job) => ({
        runDate: job.data.runDate,
        source: job.data.source,
      }),
      summary: (result) => ({
        received: result.stats.received,
        accepted: result.stats.accepted,
        rejected: result.stats.rejected,
        rejectsByReason: result.stats.rejectsByReason,
        newJobs: result.stats.newJobs,
        seenBefore: result.stats.seenBefore,
        written: result.stats.written,
      }),
    },
  );

  const snapshotWorker = createObservedWorker(
    LATEST_SNAPSHOT_QUEUE,
    1,
    (job: Job<LatestSnapshotJobData>) => handleLatestSnapshotJob(job, { store, logger }),
    {
      context: (job) => ({
        runDate: job.data.runDate,
      }),
      summary: (result) => ({
        jobs: result.jobs,
        scanned: result.scanned,
      }),
    },
  );

  const workers: Worker[] = [dailyRunWorker, buildWorker, snapshotWorker];
  runtimeState.workers.push(...workers);

  for (const worker of workers) {
    worker.on('error', (error) => {
      logger.error(
        {
          event: 'worker_runtime_error',
          queue: worker.name,
          error,
        },
        'Worker runtime error',
      );
    });
  }

  await scheduleDailyRun(queues, {
    cron: config.runCron,
    sources: config.runSources,
  });
  logger.info(
    {
      event: 'run_scheduled',
      cron: config.runCron,
      sources: config.runSources,
    },
    'Daily run scheduled',
  );

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info(
      {
        event: 'shutdown_requested',
        signal,
      },
      'Shutdown requested',
    );

    await cleanupRuntimeState(runtimeState);

    logger.info(
      {
        event: 'shutdown_completed',
        signal,
      },
      'Shutdown completed',
    );

    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info(
    {
      event: 'worker_started',
      redisUrl: config.redisUrl,
      concurrency: config.concurrency,
    },
    'Worker started',
  );
}

const logger = createWorkerLogger();

run(logger).catch(async (error: unknown) => {
  await cleanupRuntimeState(runtimeState);
  logger.error(
    {
      event: 'worker_fatal_error',
      error,
    },
    'Worker fatal error',
  );
  process.exit(1);
});
