import { Worker, type Job } from 'bullmq';
import type { Pipeline } from '../pipeline/orchestrator.js';
import type { Notifier } from '../types/services.js';
import { QUEUE_NAMES, JOB_NAMES, type PipelineJobData, type PipelineJobName } from '../scheduler/constants.js';
import type { RedisConnection } from '../scheduler/queues.js';
import { logger } from '../utils/logger.js';

/**
 * Executes one pipeline job. Exported separately from the worker so it can
 * be driven without Redis.
 */
export async function processPipelineJob(
  name: string,
  data: PipelineJobData,
  pipeline: Pipeline,
  notifier: Notifier,
): Promise<void> {
  switch (name) {
    case JOB_NAMES.RUN_PIPELINE:
      await pipeline.runValueBetEngine(data.trigger);
      return;
    case JOB_NAMES.REFRESH_STATS: {
      const { teamsUpdated, errors } = await pipeline.refreshTeamStats();
      if (data.trigger === 'command') {
        await notifier.sendText(`\u{2705} Team stats refreshed: ${teamsUpdated} teams\\.`);
      }
      await notifier.sendErrorDigest(errors);
      return;
    }
    case JOB_NAMES.SETTLE_BETS:
      await pipeline.settlePendingBets();
      return;
    default:
      logger.warn({ name }, 'Unknown pipeline job');
  }
}

export function createPipelineWorker(connection: RedisConnection, pipeline: Pipeline, notifier: Notifier) {
  const worker = new Worker<PipelineJobData, void, PipelineJobName>(
    QUEUE_NAMES.PIPELINE,
    async (job: Job<PipelineJobData, void, PipelineJobName>) => {
      const log = logger.child({ job: job.id, name: job.name, trigger: job.data.trigger });
      log.info('Pipeline job started');
      await processPipelineJob(job.name, job.data, pipeline, notifier);
      log.info('Pipeline job finished');
    },
    // One job at a time: runs, refreshes and settlements never overlap
    { connection, concurrency: 1 },
  );

  worker.on('failed', (job, err) => {
    logger.error({ job: job?.id, err: err.message }, 'Pipeline job failed');
  });

  return worker;
}
