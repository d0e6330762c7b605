export type MarketKey = 'home_win' | 'draw' | 'away_win' | 'over_2_5' | 'under_2_5';

/** P(home = i, away = j) indexed as matrix[i][j]. */
export type ScoreMatrix = readonly (readonly number[])[];

export interface Prediction {
  readonly lambdaHome: number;
  readonly lambdaAway: number;
  readonly homeWin: number;
  readonly draw: number;
  readonly awayWin: number;
  readonly over25: number;
  readonly under25: number;
  readonly bttsYes: number;
  readonly bttsNo: number;
}
