import type { BetRepository } from '../types/services.js';
import type { WorkerStatus } from '../types/pipeline.js';
import { HELP_TEXT, formatRecentBets, formatStats, formatStatus } from './messages.js';

export const COMMANDS = ['help', 'status', 'bets', 'stats', 'run', 'refresh'] as const;
export type CommandName = (typeof COMMANDS)[number];

const RECENT_BETS_LIMIT = 10;

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((name) => name === value);
}

/** "/Status@my_bot extra" -> "status". Anything unknown is "help". */
export function parseCommand(text: string): CommandName {
  const first = text.trim().split(/\s+/)[0] ?? '';
  const name = first.replace(/^\//, '').replace(/@.*$/, '').toLowerCase();
  return isCommand(name) ? name : 'help';
}

export interface CommandDeps {
  repository: BetRepository;
  getStatus: () => WorkerStatus;
  /** Enqueue a run; must return without waiting for the run itself. */
  triggerRun: () => Promise<void>;
  triggerRefresh: () => Promise<void>;
}

export type CommandHandler = (command: CommandName) => Promise<string>;

export function createCommandHandler(deps: CommandDeps): CommandHandler {
  return async (command) => {
    switch (command) {
      case 'status':
        return formatStatus(deps.getStatus());
      case 'bets':
        return formatRecentBets(await deps.repository.listRecentBets(RECENT_BETS_LIMIT));
      case 'stats':
        return formatStats(await deps.repository.aggregateStats());
      case 'run':
        if (deps.getStatus().running) return '\u{23F3} A run is already in progress\\.';
        await deps.triggerRun();
        return '\u{1F680} Value bet run queued\\.';
      case 'refresh':
        await deps.triggerRefresh();
        return '\u{1F504} Team stats refresh queued\\.';
      case 'help':
        return HELP_TEXT;
    }
  };
}
