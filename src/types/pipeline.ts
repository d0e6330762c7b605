import type { SavedValueBet } from './value-bet.js';

export type RunTrigger = 'schedule' | 'command' | 'cli';

export type LeagueStage = 'fixtures' | 'stats' | 'refresh' | 'odds' | 'fixture';

export interface LeagueError {
  leagueId: number;
  league: string;
  stage: LeagueStage;
  message: string;
  /** Redacted URL of the provider request that failed, when there was one. */
  source?: string;
}

export interface WorkerStatus {
  startedAt: Date;
  lastRun: Date | null;
  lastRefresh: Date | null;
  betsToday: number;
  running: boolean;
}

export interface RunSummary {
  trigger: RunTrigger;
  startedAt: Date;
  finishedAt: Date;
  bets: SavedValueBet[];
  errors: LeagueError[];
}

export type RunOutcome =
  | { status: 'completed'; summary: RunSummary }
  | { status: 'rejected'; reason: 'already_running' };

export interface RefreshSummary {
  teamsUpdated: number;
  errors: LeagueError[];
}

export interface SettleSummary {
  checked: number;
  settled: number;
}
