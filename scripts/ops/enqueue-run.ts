import { createRedisConnection } from '../../apps/worker/src/redis.js';
import { createQueues } from '../../apps/worker/src/queues.js';
import { enqueueRun } from '../../apps/worker/src/scheduler.js';
import { loadWorkerConfig } from '../../apps/worker/src/config.js';

// Usage: enqueue-run.ts <YYYY-MM-DD> [source ...]
async function main(): Promise<void> {
  const [runDate, ...requestedSources] = process.argv.slice(2);
  if (!runDate) {
    throw new Error('Run date is required (YYYY-MM-DD)');
  }

  const config = loadWorkerConfig();
  const sources = requestedSources.length > 0 ? requestedSources : config.runSources;

  const redis = createRedisConnection(config.redisUrl);
  const queues = createQueues(redis);

  try {
    const run = await enqueueRun(queues.flowProducer, {
      runDate,
      sources,
      traceId: `manual-${runDate}-${Date.now()}`,
    });

    console.log(`queued ${run.buildJobIds.join(', ')} under ${run.snapshotJobId}`);
  } finally {
    await Promise.all([queues.runScheduleQueue.close(), queues.flowProducer.close()]);
    await redis.quit();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
