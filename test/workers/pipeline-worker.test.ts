import { describe, it, expect, vi } from 'vitest';
import { processPipelineJob } from '../../src/workers/pipeline-worker.js';
import { JOB_NAMES } from '../../src/scheduler/constants.js';
import type { Pipeline } from '../../src/pipeline/orchestrator.js';
import type { LeagueError } from '../../src/types/pipeline.js';
import { FakeNotifier } from '../helpers/fakes.js';

const failure: LeagueError = { leagueId: 39, league: 'Premier League', stage: 'refresh', message: 'HTTP 500' };

function fakePipeline() {
  const at = new Date('2024-09-14T08:00:00Z');
  return {
    runValueBetEngine: vi.fn<Pipeline['runValueBetEngine']>(async (trigger) => ({
      status: 'completed',
      summary: { trigger, startedAt: at, finishedAt: at, bets: [], errors: [] },
    })),
    refreshTeamStats: vi.fn<Pipeline['refreshTeamStats']>(async () => ({ teamsUpdated: 20, errors: [failure] })),
    settlePendingBets: vi.fn<Pipeline['settlePendingBets']>(async () => ({ checked: 0, settled: 0 })),
    getStatus: vi.fn<Pipeline['getStatus']>(() => ({
      startedAt: at,
      lastRun: null,
      lastRefresh: null,
      betsToday: 0,
      running: false,
    })),
    isRunning: vi.fn<Pipeline['isRunning']>(() => false),
  } satisfies Pipeline;
}

describe('processPipelineJob', () => {
  it('should run the engine with the job trigger', async () => {
    const pipeline = fakePipeline();
    await processPipelineJob(JOB_NAMES.RUN_PIPELINE, { trigger: 'command' }, pipeline, new FakeNotifier());
    expect(pipeline.runValueBetEngine).toHaveBeenCalledWith('command');
  });

  it('should confirm a command refresh and report failures', async () => {
    const pipeline = fakePipeline();
    const notifier = new FakeNotifier();

    await processPipelineJob(JOB_NAMES.REFRESH_STATS, { trigger: 'command' }, pipeline, notifier);

    expect(notifier.texts).toEqual(['\u{2705} Team stats refreshed: 20 teams\\.']);
    expect(notifier.digests).toEqual([[failure]]);
  });

  it('should refresh quietly on schedule', async () => {
    const notifier = new FakeNotifier();
    await processPipelineJob(JOB_NAMES.REFRESH_STATS, { trigger: 'schedule' }, fakePipeline(), notifier);
    expect(notifier.texts).toEqual([]);
  });

  it('should settle pending bets', async () => {
    const pipeline = fakePipeline();
    await processPipelineJob(JOB_NAMES.SETTLE_BETS, { trigger: 'schedule' }, pipeline, new FakeNotifier());
    expect(pipeline.settlePendingBets).toHaveBeenCalledTimes(1);
  });

  it('should ignore unknown jobs', async () => {
    const pipeline = fakePipeline();
    await processPipelineJob('cleanup', { trigger: 'schedule' }, pipeline, new FakeNotifier());
    expect(pipeline.runValueBetEngine).not.toHaveBeenCalled();
    expect(pipeline.settlePendingBets).not.toHaveBeenCalled();
  });
});
