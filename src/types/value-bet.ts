import type { MarketKey } from './prediction.js';

export type MarketLabel = 'Home Win' | 'Draw' | 'Away Win' | 'Over 2.5' | 'Under 2.5';

export interface ValueBetCandidate {
  market: MarketLabel;
  marketKey: MarketKey;
  bookmaker: string;
  bkOdds: number;
  modelOdds: number;
  probability: number;
  /** bkOdds * probability - 1 */
  value: number;
}

export interface ValueBet extends ValueBetCandidate {
  fixtureId: number;
  matchDate: string;
  league: string;
  homeTeam: string;
  awayTeam: string;
}

export interface SavedValueBet extends ValueBet {
  id: number;
}

/** Row shape of `value_bets`, as served by the dashboard API. */
export interface BetRow {
  id: number;
  created_at: Date;
  fixture_id: number | null;
  match_date: string;
  league: string;
  home_team: string;
  away_team: string;
  market: string;
  /** Unvalidated; checked before grading */
  market_key: string;
  bookmaker: string;
  bk_odds: number;
  model_odds: number;
  probability: number;
  value: number;
  result: string | null;
  success: boolean | null;
}
