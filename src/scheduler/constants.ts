export const QUEUE_NAMES = {
  PIPELINE: 'pipeline-queue',
} as const;

export const JOB_NAMES = {
  RUN_PIPELINE: 'run-pipeline',
  REFRESH_STATS: 'refresh-stats',
  SETTLE_BETS: 'settle-bets',
} as const;

export type PipelineJobName = (typeof JOB_NAMES)[keyof typeof JOB_NAMES];

export interface PipelineJobData {
  trigger: 'schedule' | 'command';
}
