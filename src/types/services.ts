import type { Fixture, FixtureResult } from './fixture.js';
import type { OddsEvent } from './odds.js';
import type { TeamSeasonStats } from './team.js';
import type { BetRow, ValueBet } from './value-bet.js';
import type { BetStats } from './stats.js';
import type { LeagueError, RunSummary } from './pipeline.js';

/** Upstream data for fixtures, standings, results and bookmaker prices. */
export interface FootballDataProvider {
  fetchFixtures(leagueId: number, season: number, daysAhead: number): Promise<Fixture[]>;
  fetchStandings(leagueId: number, season: number): Promise<TeamSeasonStats[]>;
  fetchOdds(leagueId: number): Promise<OddsEvent[]>;
  fetchFixtureResult(fixtureId: number): Promise<FixtureResult | null>;
}

export interface BetRepository {
  /** Returns the new row id, or null when the same fixture, market and bookmaker is already stored. */
  saveValueBet(bet: ValueBet): Promise<number | null>;
  upsertTeamStats(stats: TeamSeasonStats): Promise<void>;
  getTeamStats(leagueId: number, season: number): Promise<Map<number, TeamSeasonStats>>;
  listRecentBets(limit: number): Promise<BetRow[]>;
  listBetsForDate(date: string): Promise<BetRow[]>;
  listPendingBets(beforeDate: string): Promise<BetRow[]>;
  updateBetResult(betId: number, result: string, success: boolean): Promise<void>;
  aggregateStats(): Promise<BetStats>;
}

/** Outbound operator messages. Delivery is best effort. */
export interface Notifier {
  sendRunSummary(summary: RunSummary): Promise<void>;
  sendErrorDigest(errors: LeagueError[]): Promise<void>;
  sendText(text: string): Promise<void>;
}

/** Remembers which bets were already announced. */
export interface AlertLedger {
  isSent(key: string): Promise<boolean>;
  markSent(key: string): Promise<void>;
}
