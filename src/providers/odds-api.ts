/**
 * The Odds API v4: decimal 1X2 (h2h) and 2.5-goal totals prices per bookmaker.
 */

import { z } from 'zod';
import type { BookmakerOdds, OddsEvent, OutcomeOdds } from '../types/odds.js';
import { oddsSportKey } from '../leagues.js';
import { getJson } from './http-client.js';

export const ODDS_API_BASE = 'https://api.the-odds-api.com/v4';

export const TARGET_BOOKMAKERS = ['winamax_fr', 'betclic', 'williamhill', 'unibet_eu', 'pinnacle'];

const outcome = z.object({
  name: z.string(),
  price: z.number(),
  point: z.number().optional(),
});

const oddsEvent = z.object({
  id: z.string(),
  commence_time: z.string(),
  home_team: z.string(),
  away_team: z.string(),
  bookmakers: z
    .array(
      z.object({
        key: z.string(),
        title: z.string().optional(),
        markets: z.array(z.object({ key: z.string(), outcomes: z.array(outcome) })),
      }),
    )
    .default([]),
});

const oddsPayload = z.array(oddsEvent);

type OddsApiEvent = z.infer<typeof oddsEvent>;
type Outcome = z.infer<typeof outcome>;

function priceOf(outcomes: Outcome[], name: string, point?: number): number | undefined {
  return outcomes.find((o) => o.name === name && (point === undefined || o.point === point))?.price;
}

function bookmakerPrices(event: OddsApiEvent, markets: OddsApiEvent['bookmakers'][number]['markets']): OutcomeOdds {
  const prices: OutcomeOdds = {};

  for (const market of markets) {
    if (market.key === 'h2h') {
      const home = priceOf(market.outcomes, event.home_team);
      const draw = priceOf(market.outcomes, 'Draw');
      const away = priceOf(market.outcomes, event.away_team);
      if (home !== undefined) prices.home_win = home;
      if (draw !== undefined) prices.draw = draw;
      if (away !== undefined) prices.away_win = away;
    } else if (market.key === 'totals') {
      const over = priceOf(market.outcomes, 'Over', 2.5);
      const under = priceOf(market.outcomes, 'Under', 2.5);
      if (over !== undefined) prices.over_2_5 = over;
      if (under !== undefined) prices.under_2_5 = under;
    }
  }

  return prices;
}

export function parseOddsEvents(payload: unknown, leagueId: number): OddsEvent[] {
  return oddsPayload.parse(payload).map((event) => {
    const odds: BookmakerOdds = {};
    for (const bk of event.bookmakers) {
      const prices = bookmakerPrices(event, bk.markets);
      if (Object.keys(prices).length) odds[bk.title ?? bk.key] = prices;
    }
    return {
      eventId: event.id,
      leagueId,
      homeTeam: event.home_team,
      awayTeam: event.away_team,
      date: event.commence_time.slice(0, 10),
      odds,
    };
  });
}

export interface OddsApiClientOptions {
  apiKey: string;
  timeoutMs: number;
}

export function createOddsApiClient(opts: OddsApiClientOptions) {
  return {
    /** Leagues without a known sport key have no odds feed and yield []. */
    async fetchOdds(leagueId: number): Promise<OddsEvent[]> {
      const sportKey = oddsSportKey(leagueId);
      if (!sportKey) return [];

      const payload = await getJson(`${ODDS_API_BASE}/sports/${sportKey}/odds`, {
        timeoutMs: opts.timeoutMs,
        query: {
          apiKey: opts.apiKey,
          regions: 'eu',
          markets: 'h2h,totals',
          oddsFormat: 'decimal',
          bookmakers: TARGET_BOOKMAKERS.join(','),
        },
      });
      return parseOddsEvents(payload, leagueId);
    },
  };
}

export type OddsApiClient = ReturnType<typeof createOddsApiClient>;
