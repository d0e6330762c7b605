import { describe, it, expect } from 'vitest';
import { computeValue, findValueBets } from '../../src/pipeline/value-scorer.js';
import type { Prediction } from '../../src/types/prediction.js';

function prediction(overrides: Partial<Prediction> = {}): Prediction {
  return {
    lambdaHome: 1.5,
    lambdaAway: 1.1,
    homeWin: 0.55,
    draw: 0.25,
    awayWin: 0.2,
    over25: 0.6,
    under25: 0.4,
    bttsYes: 0.5,
    bttsNo: 0.5,
    ...overrides,
  };
}

const loose = { valueThreshold: 0.05, minProbability: 0.5 };

describe('computeValue', () => {
  it('should be price times probability minus one', () => {
    expect(computeValue(2.1, 0.55)).toBeCloseTo(0.155, 10);
  });
});

describe('findValueBets', () => {
  it('should flag a price above the model fair odds', () => {
    const bets = findValueBets(prediction(), { Winamax: { home_win: 2.1 } }, loose);
    expect(bets).toEqual([
      {
        market: 'Home Win',
        marketKey: 'home_win',
        bookmaker: 'Winamax',
        bkOdds: 2.1,
        modelOdds: 1.818,
        probability: 0.55,
        value: 0.155,
      },
    ]);
  });

  it('should not flag it under a stricter threshold', () => {
    const bets = findValueBets(prediction(), { Winamax: { home_win: 2.1 } }, { ...loose, valueThreshold: 0.2 });
    expect(bets).toEqual([]);
  });

  it('should exclude a value equal to the threshold', () => {
    const bets = findValueBets(
      prediction({ homeWin: 0.625 }),
      { Winamax: { home_win: 2 } },
      { valueThreshold: 0.25, minProbability: 0.5 },
    );
    expect(bets).toEqual([]);
  });

  it('should keep a probability equal to the minimum', () => {
    const bets = findValueBets(
      prediction(),
      { Winamax: { home_win: 2.1 } },
      { valueThreshold: 0.05, minProbability: 0.55 },
    );
    expect(bets.map((b) => [b.marketKey, b.probability])).toEqual([['home_win', 0.55]]);
  });

  it('should skip markets below the minimum probability', () => {
    const bets = findValueBets(prediction(), { Winamax: { draw: 10, away_win: 20 } }, loose);
    expect(bets).toEqual([]);
  });

  it('should skip missing and invalid prices', () => {
    const bets = findValueBets(prediction(), { Winamax: { home_win: 0, over_2_5: Number.NaN } }, loose);
    expect(bets).toEqual([]);
  });

  it('should order bets by value across bookmakers', () => {
    const bets = findValueBets(
      prediction(),
      {
        Winamax: { home_win: 2.1 },
        Pinnacle: { home_win: 2.3, over_2_5: 1.9 },
      },
      loose,
    );
    expect(bets.map((b) => [b.bookmaker, b.marketKey, b.value])).toEqual([
      ['Pinnacle', 'home_win', 0.265],
      ['Winamax', 'home_win', 0.155],
      ['Pinnacle', 'over_2_5', 0.14],
    ]);
  });
});
