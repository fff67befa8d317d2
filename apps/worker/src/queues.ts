import { FlowProducer, Queue } from 'bullmq';
import type { Redis as IORedis } from 'ioredis';

export const RUN_SCHEDULE_QUEUE = 'run.schedule';
export const PARTITION_BUILD_QUEUE = 'partition.build';
export const LATEST_SNAPSHOT_QUEUE = 'snapshot.latest';

export interface DailyRunJobData {
  /** Overrides the run date derived from the job timestamp. */
  runDate?: string;
  sources: string[];
  traceId?: string;
}

export interface PartitionBuildJobData {
  runDate: string;
  source: string;
  traceId?: string;
}

export interface LatestSnapshotJobData {
  runDate: string;
  traceId?: string;
}

export interface Queues {
  runScheduleQueue: Queue<DailyRunJobData>;
  flowProducer: FlowProducer;
}

export function createQueues(connection: IORedis): Queues {
  return {
    runScheduleQueue: new Queue<DailyRunJobData>(RUN_SCHEDULE_QUEUE, { connection }),
    flowProducer: new FlowProducer({ connection }),
  };
}
