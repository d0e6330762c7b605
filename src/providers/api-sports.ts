/**
 * API-Sports (API-Football v3): fixtures, standings and finished results.
 */

import { z } from 'zod';
import type { Fixture, FixtureResult, FinishedStatus } from '../types/fixture.js';
import type { TeamSeasonStats } from '../types/team.js';
import { addDays, todayDateString } from '../utils/date.js';
import { getJson } from './http-client.js';

export const APISPORTS_BASE = 'https://v3.football.api-sports.io';

const FINISHED: ReadonlySet<string> = new Set<FinishedStatus>(['FT', 'AET', 'PEN']);

const teamRef = z.object({ id: z.number(), name: z.string() });
const count = z.number().nullable().optional();

const fixtureItem = z.object({
  fixture: z.object({
    id: z.number(),
    date: z.string(),
    status: z.object({ short: z.string() }).optional(),
  }),
  teams: z.object({ home: teamRef, away: teamRef }),
  goals: z.object({ home: count, away: count }).optional(),
});

const fixturesPayload = z.object({ response: z.array(fixtureItem) });

const venueRecord = z
  .object({
    win: count,
    draw: count,
    lose: count,
    goals: z.object({ for: count, against: count }).optional(),
  })
  .optional();

const standingEntry = z.object({
  team: teamRef,
  home: venueRecord,
  away: venueRecord,
});

const standingsPayload = z.object({
  response: z.array(
    z.object({
      league: z.object({ standings: z.array(z.array(standingEntry)) }),
    }),
  ),
});

type VenueRecord = z.infer<typeof venueRecord>;

function gamesPlayed(v: VenueRecord): number {
  return (v?.win ?? 0) + (v?.draw ?? 0) + (v?.lose ?? 0);
}

export function parseFixtures(payload: unknown, leagueId: number): Fixture[] {
  const data = fixturesPayload.parse(payload);
  return data.response.map((item) => ({
    fixtureId: item.fixture.id,
    date: item.fixture.date.slice(0, 10),
    leagueId,
    homeTeamId: item.teams.home.id,
    homeTeamName: item.teams.home.name,
    awayTeamId: item.teams.away.id,
    awayTeamName: item.teams.away.name,
  }));
}

export function parseStandings(payload: unknown, leagueId: number, season: number): TeamSeasonStats[] {
  const data = standingsPayload.parse(payload);
  const teams: TeamSeasonStats[] = [];

  for (const group of data.response) {
    // Leagues with split phases list the same team in several tables
    for (const table of group.league.standings) {
      for (const entry of table) {
        teams.push({
          leagueId,
          season,
          teamId: entry.team.id,
          teamName: entry.team.name,
          homeGoalsScored: entry.home?.goals?.for ?? 0,
          homeGoalsConceded: entry.home?.goals?.against ?? 0,
          awayGoalsScored: entry.away?.goals?.for ?? 0,
          awayGoalsConceded: entry.away?.goals?.against ?? 0,
          homeGames: gamesPlayed(entry.home),
          awayGames: gamesPlayed(entry.away),
        });
      }
    }
  }

  return teams;
}

/** Returns null until the fixture has a final score. */
export function parseFixtureResult(payload: unknown, fixtureId: number): FixtureResult | null {
  const item = fixturesPayload.parse(payload).response[0];
  if (!item) return null;

  const status = item.fixture.status?.short ?? '';
  const home = item.goals?.home;
  const away = item.goals?.away;
  if (!isFinished(status) || home == null || away == null) return null;

  return { fixtureId, homeGoals: home, awayGoals: away, status, score: `${home}-${away}` };
}

function isFinished(status: string): status is FinishedStatus {
  return FINISHED.has(status);
}

export interface ApiSportsClientOptions {
  apiKey: string;
  timeoutMs: number;
  now?: () => Date;
}

export function createApiSportsClient(opts: ApiSportsClientOptions) {
  const headers = { 'x-apisports-key': opts.apiKey };
  const now = opts.now ?? (() => new Date());

  const get = (path: string, query: Record<string, string | number>) =>
    getJson(`${APISPORTS_BASE}${path}`, { headers, query, timeoutMs: opts.timeoutMs });

  return {
    async fetchFixtures(leagueId: number, season: number, daysAhead: number): Promise<Fixture[]> {
      const from = todayDateString(now());
      const payload = await get('/fixtures', {
        league: leagueId,
        season,
        from,
        to: addDays(from, daysAhead),
        status: 'NS',
        timezone: 'UTC',
      });
      return parseFixtures(payload, leagueId);
    },

    async fetchStandings(leagueId: number, season: number): Promise<TeamSeasonStats[]> {
      const payload = await get('/standings', { league: leagueId, season });
      return parseStandings(payload, leagueId, season);
    },

    async fetchFixtureResult(fixtureId: number): Promise<FixtureResult | null> {
      const payload = await get('/fixtures', { id: fixtureId });
      return parseFixtureResult(payload, fixtureId);
    },
  };
}

export type ApiSportsClient = ReturnType<typeof createApiSportsClient>;
