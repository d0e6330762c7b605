import type { MarketKey } from '../types/prediction.js';

interface FinalScore {
  homeGoals: number;
  awayGoals: number;
}

/**
 * Pure grading: did a bet on `market` win given the final score?
 */
export function gradeBet(market: MarketKey, score: FinalScore): boolean {
  const { homeGoals, awayGoals } = score;
  switch (market) {
    case 'home_win': return homeGoals > awayGoals;
    case 'draw': return homeGoals === awayGoals;
    case 'away_win': return homeGoals < awayGoals;
    case 'over_2_5': return homeGoals + awayGoals > 2.5;
    case 'under_2_5': return homeGoals + awayGoals < 2.5;
  }
}
