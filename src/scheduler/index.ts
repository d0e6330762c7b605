import type { ScheduleConfig } from '../config.js';
import { JOB_NAMES, type PipelineJobData, type PipelineJobName } from './constants.js';
import { logger } from '../utils/logger.js';

/** The slice of the BullMQ queue the scheduler drives. */
export interface SchedulerQueue {
  upsertJobScheduler(
    schedulerId: string,
    repeat: { pattern: string; tz: string },
    template: { name: PipelineJobName; data: PipelineJobData },
  ): Promise<unknown>;
  add(name: PipelineJobName, data: PipelineJobData): Promise<unknown>;
}

/** Cron pattern firing once a day at `hour`:00. */
export function dailyCron(hour: number): string {
  return `0 ${hour} * * *`;
}

/**
 * Registers the daily settle, refresh and run schedulers (UTC).
 * Uses upsertJobScheduler so restarts are idempotent.
 */
export async function startScheduler(queue: SchedulerQueue, schedule: ScheduleConfig): Promise<void> {
  const jobs = [
    { id: 'daily-settle-bets', name: JOB_NAMES.SETTLE_BETS, hour: schedule.settleHour },
    { id: 'daily-refresh-stats', name: JOB_NAMES.REFRESH_STATS, hour: schedule.refreshHour },
    { id: 'daily-value-bets', name: JOB_NAMES.RUN_PIPELINE, hour: schedule.runHour },
  ];

  for (const job of jobs) {
    const pattern = dailyCron(job.hour);
    await queue.upsertJobScheduler(
      job.id,
      { pattern, tz: 'UTC' },
      { name: job.name, data: { trigger: 'schedule' } },
    );
    logger.info({ schedulerId: job.id, pattern }, 'Registered job scheduler');
  }
}

/** Queues a one-off job on behalf of an operator command. */
export async function enqueueJob(queue: SchedulerQueue, name: PipelineJobName): Promise<void> {
  await queue.add(name, { trigger: 'command' });
  logger.info({ name }, 'Job queued by command');
}
