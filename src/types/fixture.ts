export interface Fixture {
  fixtureId: number;
  /** ISO date, e.g. '2024-09-14' */
  date: string;
  leagueId: number;
  homeTeamId: number;
  homeTeamName: string;
  awayTeamId: number;
  awayTeamName: string;
}

export type FinishedStatus = 'FT' | 'AET' | 'PEN';

export interface FixtureResult {
  fixtureId: number;
  homeGoals: number;
  awayGoals: number;
  status: FinishedStatus;
  /** e.g. '2-1' */
  score: string;
}
