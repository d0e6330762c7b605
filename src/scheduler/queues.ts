import { Queue } from 'bullmq';
import { QUEUE_NAMES, type PipelineJobData, type PipelineJobName } from './constants.js';

export interface RedisConnection {
  host: string;
  port: number;
}

export type PipelineQueue = Queue<PipelineJobData, unknown, PipelineJobName>;

export function createPipelineQueue(connection: RedisConnection): PipelineQueue {
  return new Queue<PipelineJobData, unknown, PipelineJobName>(QUEUE_NAMES.PIPELINE, {
    connection,
    defaultJobOptions: {
      // The next scheduled run is the retry
      attempts: 1,
      removeOnComplete: { count: 200 },
      removeOnFail: { count: 500 },
    },
  });
}
