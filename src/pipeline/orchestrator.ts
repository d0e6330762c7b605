/**
 * Value-bet pipeline.
 *
 * Per configured league, sequentially:
 *   fixtures -> team stats (auto-refresh once when missing) -> odds
 *   -> per fixture: predict -> reconcile odds -> score -> persist
 *
 * Failures are scoped to the league (or to the single bet being saved) and
 * reported in the run summary; no stage aborts the run.
 */

import type { PipelineConfig } from '../config.js';
import type { BetRepository, FootballDataProvider, Notifier } from '../types/services.js';
import type {
  LeagueError,
  LeagueStage,
  RefreshSummary,
  RunOutcome,
  RunSummary,
  RunTrigger,
  SettleSummary,
  WorkerStatus,
} from '../types/pipeline.js';
import type { Fixture, FixtureResult } from '../types/fixture.js';
import type { OddsEvent } from '../types/odds.js';
import type { MarketKey } from '../types/prediction.js';
import type { SavedValueBet } from '../types/value-bet.js';
import type { TeamSeasonStats } from '../types/team.js';
import { calcLeagueAverages, calcTeamStrengths } from '../model/strength.js';
import { predictMatch } from '../model/predictor.js';
import { buildOddsIndex, findFixtureOdds } from './odds-reconciler.js';
import { findValueBets } from './value-scorer.js';
import { RunState } from './run-state.js';
import { gradeBet } from '../results/grader.js';
import { ProviderError } from '../providers/http-client.js';
import { leagueName } from '../leagues.js';
import { todayDateString } from '../utils/date.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface PipelineDeps {
  config: PipelineConfig;
  provider: FootballDataProvider;
  repository: BetRepository;
  notifier: Notifier;
  state?: RunState;
  now?: () => Date;
}

export interface Pipeline {
  runValueBetEngine(trigger: RunTrigger): Promise<RunOutcome>;
  refreshTeamStats(): Promise<RefreshSummary>;
  settlePendingBets(): Promise<SettleSummary>;
  getStatus(): WorkerStatus;
  isRunning(): boolean;
}

export const ALREADY_RUNNING_MESSAGE = '\u{23F3} A value bet run is already in progress\\.';

const MARKET_KEYS: ReadonlySet<string> = new Set<MarketKey>([
  'home_win',
  'draw',
  'away_win',
  'over_2_5',
  'under_2_5',
]);

function isMarketKey(value: string): value is MarketKey {
  return MARKET_KEYS.has(value);
}

class StageError extends Error {
  constructor(
    readonly stage: LeagueStage,
    cause: unknown,
  ) {
    super(errorMessage(cause), { cause });
    this.name = 'StageError';
  }
}

/** Log fields for a failure, with the provider request when one failed. */
function failureContext(err: unknown): { err: string; url?: string; status?: number | null } {
  const cause = err instanceof StageError ? err.cause : err;
  if (cause instanceof ProviderError) {
    return { err: cause.message, url: cause.url, status: cause.status };
  }
  return { err: errorMessage(cause) };
}

/** Runs `fn`, re-throwing any failure tagged with the stage it happened in. */
async function stage<T>(name: LeagueStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StageError(name, err);
  }
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  const { config, provider, repository, notifier } = deps;
  const now = deps.now ?? (() => new Date());
  const state = deps.state ?? new RunState(now);

  function leagueError(leagueId: number, stageName: LeagueStage, err: unknown): LeagueError {
    const { err: message, url } = failureContext(err);
    const error: LeagueError = { leagueId, league: leagueName(leagueId), stage: stageName, message };
    if (url) error.source = url;
    return error;
  }

  /** Fetches standings for one league and stores every team. Returns the team count. */
  async function refreshLeague(leagueId: number): Promise<number> {
    const teams = await provider.fetchStandings(leagueId, config.season);
    for (const team of teams) {
      await repository.upsertTeamStats(team);
    }
    return teams.length;
  }

  async function loadTeamStats(leagueId: number): Promise<Map<number, TeamSeasonStats> | null> {
    const log = logger.child({ league: leagueName(leagueId) });

    const stats = await stage('stats', () => repository.getTeamStats(leagueId, config.season));
    if (stats.size) return stats;

    log.warn('No team stats stored, refreshing standings');
    const refreshed = await stage('refresh', () => refreshLeague(leagueId));
    if (refreshed > 0) state.markRefreshed();

    const retried = await stage('stats', () => repository.getTeamStats(leagueId, config.season));
    return retried.size ? retried : null;
  }

  async function processFixtures(
    leagueId: number,
    fixtures: Fixture[],
    stats: Map<number, TeamSeasonStats>,
    oddsEvents: OddsEvent[],
  ): Promise<SavedValueBet[]> {
    const league = leagueName(leagueId);
    const log = logger.child({ league });

    const averages = calcLeagueAverages(stats);
    const strengths = calcTeamStrengths(stats, averages);
    const index = buildOddsIndex(oddsEvents);
    log.info(
      { avgHome: averages.avgHomeGoals.toFixed(2), avgAway: averages.avgAwayGoals.toFixed(2) },
      'League averages',
    );

    const saved: SavedValueBet[] = [];

    for (const fix of fixtures) {
      const match = `${fix.homeTeamName} vs ${fix.awayTeamName}`;

      const prediction = predictMatch(fix.homeTeamId, fix.awayTeamId, strengths, averages);
      if (!prediction) {
        log.debug({ match }, 'No team stats for fixture, skipping');
        continue;
      }

      const odds = findFixtureOdds(index, fix.homeTeamName, fix.awayTeamName);
      if (!odds) {
        log.debug({ match }, 'No odds found for fixture');
        continue;
      }

      const candidates = findValueBets(prediction, odds, {
        valueThreshold: config.valueThreshold,
        minProbability: config.minProbability,
      });

      for (const candidate of candidates) {
        const bet = {
          ...candidate,
          fixtureId: fix.fixtureId,
          matchDate: fix.date,
          league,
          homeTeam: fix.homeTeamName,
          awayTeam: fix.awayTeamName,
        };
        try {
          const id = await repository.saveValueBet(bet);
          if (id === null) {
            log.debug({ match, market: bet.market, bookmaker: bet.bookmaker }, 'Value bet already stored');
            continue;
          }
          saved.push({ ...bet, id });
          log.info(
            { id, match, market: bet.market, bookmaker: bet.bookmaker, odds: bet.bkOdds, value: bet.value },
            'Value bet found',
          );
        } catch (err) {
          log.error({ err: errorMessage(err), match, market: bet.market }, 'Failed to save value bet');
        }
      }
    }

    return saved;
  }

  async function processLeague(leagueId: number, errors: LeagueError[]): Promise<SavedValueBet[]> {
    const log = logger.child({ league: leagueName(leagueId) });

    try {
      const fixtures = await stage('fixtures', () =>
        provider.fetchFixtures(leagueId, config.season, config.daysAhead),
      );
      log.info({ count: fixtures.length }, 'Fixtures fetched');
      if (!fixtures.length) return [];

      const stats = await loadTeamStats(leagueId);
      if (!stats) {
        log.warn('Still no team stats after refresh, skipping league');
        return [];
      }

      let oddsEvents: OddsEvent[] = [];
      try {
        oddsEvents = await provider.fetchOdds(leagueId);
        log.info({ count: oddsEvents.length }, 'Odds events fetched');
      } catch (err) {
        log.error(failureContext(err), 'Odds fetch failed, continuing without odds');
        errors.push(leagueError(leagueId, 'odds', err));
      }

      return await stage('fixture', () => processFixtures(leagueId, fixtures, stats, oddsEvents));
    } catch (err) {
      const stageName = err instanceof StageError ? err.stage : 'fixture';
      log.error({ ...failureContext(err), stage: stageName }, 'League failed');
      errors.push(leagueError(leagueId, stageName, err));
      return [];
    }
  }

  async function notify(summary: RunSummary): Promise<void> {
    try {
      await notifier.sendRunSummary(summary);
      await notifier.sendErrorDigest(summary.errors);
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Run notification failed');
    }
  }

  return {
    async runValueBetEngine(trigger: RunTrigger): Promise<RunOutcome> {
      if (!state.tryBeginRun()) {
        logger.warn({ trigger }, 'Run requested while another is in progress');
        try {
          await notifier.sendText(ALREADY_RUNNING_MESSAGE);
        } catch (err) {
          logger.error({ err: errorMessage(err) }, 'Failed to send busy notice');
        }
        return { status: 'rejected', reason: 'already_running' };
      }

      try {
        const startedAt = now();
        logger.info({ trigger, leagues: config.leagues }, 'Value bet run started');

        const bets: SavedValueBet[] = [];
        const errors: LeagueError[] = [];
        for (const leagueId of config.leagues) {
          bets.push(...(await processLeague(leagueId, errors)));
        }

        bets.sort((a, b) => b.value - a.value);
        state.completeRun(bets.length);

        const summary: RunSummary = { trigger, startedAt, finishedAt: now(), bets, errors };
        logger.info({ bets: bets.length, errors: errors.length }, 'Value bet run complete');

        await notify(summary);
        return { status: 'completed', summary };
      } finally {
        state.endRun();
      }
    },

    async refreshTeamStats(): Promise<RefreshSummary> {
      let teamsUpdated = 0;
      let refreshedLeagues = 0;
      const errors: LeagueError[] = [];

      for (const leagueId of config.leagues) {
        const log = logger.child({ league: leagueName(leagueId) });
        try {
          const count = await refreshLeague(leagueId);
          teamsUpdated += count;
          refreshedLeagues++;
          log.info({ teams: count }, 'Team stats refreshed');
        } catch (err) {
          log.error(failureContext(err), 'Standings refresh failed');
          errors.push(leagueError(leagueId, 'refresh', err));
        }
      }

      if (refreshedLeagues > 0) state.markRefreshed();
      return { teamsUpdated, errors };
    },

    async settlePendingBets(): Promise<SettleSummary> {
      const pending = await repository.listPendingBets(todayDateString(now()));
      const log = logger.child({ job: 'settle' });
      log.info({ count: pending.length }, 'Pending bets to check');

      // Several bets usually share a fixture
      const results = new Map<number, FixtureResult | null>();
      let settled = 0;

      for (const bet of pending) {
        const fixtureId = bet.fixture_id;
        const marketKey = bet.market_key;
        if (fixtureId === null || !isMarketKey(marketKey)) continue;
        try {
          let result = results.get(fixtureId);
          if (result === undefined) {
            result = await provider.fetchFixtureResult(fixtureId);
            results.set(fixtureId, result);
          }
          if (!result) continue;

          const success = gradeBet(marketKey, result);
          await repository.updateBetResult(bet.id, result.score, success);
          settled++;
        } catch (err) {
          log.error({ err: errorMessage(err), betId: bet.id }, 'Failed to settle bet');
        }
      }

      log.info({ settled }, 'Settlement complete');
      return { checked: pending.length, settled };
    },

    getStatus(): WorkerStatus {
      return state.snapshot();
    },

    isRunning(): boolean {
      return state.isRunning();
    },
  };
}
