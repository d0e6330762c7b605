import type { MarketKey } from './prediction.js';

/** Decimal prices for one bookmaker. Missing markets are absent. */
export type OutcomeOdds = Partial<Record<MarketKey, number>>;

/** Bookmaker title -> prices. */
export type BookmakerOdds = Record<string, OutcomeOdds>;

export interface OddsEvent {
  eventId: string;
  leagueId: number;
  homeTeam: string;
  awayTeam: string;
  /** ISO date of kick-off */
  date: string;
  odds: BookmakerOdds;
}
