import type { BookmakerOdds } from '../types/odds.js';
import type { MarketKey, Prediction } from '../types/prediction.js';
import type { MarketLabel, ValueBetCandidate } from '../types/value-bet.js';

export interface ValueThresholds {
  /** A candidate needs value strictly greater than this. */
  valueThreshold: number;
  /** Markets the model rates below this probability are ignored. */
  minProbability: number;
}

/** Markets priced against bookmaker odds. BTTS is modelled but not listed by bookmakers here. */
export const MARKETS: ReadonlyArray<{ key: MarketKey; label: MarketLabel; prob: (p: Prediction) => number }> = [
  { key: 'home_win', label: 'Home Win', prob: (p) => p.homeWin },
  { key: 'draw', label: 'Draw', prob: (p) => p.draw },
  { key: 'away_win', label: 'Away Win', prob: (p) => p.awayWin },
  { key: 'over_2_5', label: 'Over 2.5', prob: (p) => p.over25 },
  { key: 'under_2_5', label: 'Under 2.5', prob: (p) => p.under25 },
];

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Edge of a decimal price over a model probability. */
export function computeValue(price: number, probability: number): number {
  return price * probability - 1;
}

/**
 * Compares every bookmaker price with the model probability for the same
 * market and returns the qualifying bets, best value first. Ties keep the
 * order in which they were found.
 */
export function findValueBets(
  prediction: Prediction,
  odds: BookmakerOdds,
  thresholds: ValueThresholds,
): ValueBetCandidate[] {
  const candidates: ValueBetCandidate[] = [];

  for (const [bookmaker, prices] of Object.entries(odds)) {
    for (const market of MARKETS) {
      const probability = market.prob(prediction);
      const price = prices[market.key];

      if (price === undefined || !Number.isFinite(price) || price <= 0) continue;
      if (!(probability > 0) || probability < thresholds.minProbability) continue;

      const value = computeValue(price, probability);
      if (value <= thresholds.valueThreshold) continue;

      candidates.push({
        market: market.label,
        marketKey: market.key,
        bookmaker,
        bkOdds: round(price, 3),
        modelOdds: round(1 / probability, 3),
        probability: round(probability, 4),
        value: round(value, 4),
      });
    }
  }

  // Array.prototype.sort is stable
  return candidates.sort((a, b) => b.value - a.value);
}
