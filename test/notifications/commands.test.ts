import { describe, it, expect, vi } from 'vitest';
import { createCommandHandler, parseCommand, type CommandDeps } from '../../src/notifications/commands.js';
import { HELP_TEXT, formatRecentBets, formatStatus } from '../../src/notifications/messages.js';
import type { WorkerStatus } from '../../src/types/pipeline.js';
import { FakeRepository, betRow } from '../helpers/fakes.js';

const idle: WorkerStatus = {
  startedAt: new Date('2024-09-14T06:00:00Z'),
  lastRun: null,
  lastRefresh: null,
  betsToday: 0,
  running: false,
};

function deps(overrides: Partial<CommandDeps> = {}): CommandDeps {
  return {
    repository: new FakeRepository(),
    getStatus: () => idle,
    triggerRun: vi.fn(async () => {}),
    triggerRefresh: vi.fn(async () => {}),
    ...overrides,
  };
}

describe('parseCommand', () => {
  it('should strip the slash, bot suffix and arguments', () => {
    expect(parseCommand('/Status@value_bot extra')).toBe('status');
    expect(parseCommand('  /bets  ')).toBe('bets');
    expect(parseCommand('run')).toBe('run');
  });

  it('should fall back to help', () => {
    expect(parseCommand('/start')).toBe('help');
    expect(parseCommand('')).toBe('help');
  });
});

describe('createCommandHandler', () => {
  it('should report the worker status', async () => {
    expect(await createCommandHandler(deps())('status')).toBe(formatStatus(idle));
  });

  it('should list the last ten bets', async () => {
    const repository = new FakeRepository();
    repository.rows = Array.from({ length: 12 }, (_, i) => betRow({ id: i + 1 }));

    const reply = await createCommandHandler(deps({ repository }))('bets');

    expect(reply).toBe(formatRecentBets(repository.rows.slice(0, 10)));
  });

  it('should queue a run when idle', async () => {
    const d = deps();
    expect(await createCommandHandler(d)('run')).toBe('\u{1F680} Value bet run queued\\.');
    expect(d.triggerRun).toHaveBeenCalledTimes(1);
  });

  it('should refuse a run while one is in progress', async () => {
    const d = deps({ getStatus: () => ({ ...idle, running: true }) });
    expect(await createCommandHandler(d)('run')).toBe('\u{23F3} A run is already in progress\\.');
    expect(d.triggerRun).not.toHaveBeenCalled();
  });

  it('should queue a stats refresh', async () => {
    const d = deps();
    expect(await createCommandHandler(d)('refresh')).toBe('\u{1F504} Team stats refresh queued\\.');
    expect(d.triggerRefresh).toHaveBeenCalledTimes(1);
  });

  it('should answer help', async () => {
    expect(await createCommandHandler(deps())('help')).toBe(HELP_TEXT);
  });
});
