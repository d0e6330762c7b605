/** Season goal record for one team, as stored in `team_stats`. */
export interface TeamSeasonStats {
  leagueId: number;
  season: number;
  teamId: number;
  teamName: string;
  homeGoalsScored: number;
  homeGoalsConceded: number;
  awayGoalsScored: number;
  awayGoalsConceded: number;
  homeGames: number;
  awayGames: number;
}

export type TeamStatsMap = ReadonlyMap<number, TeamSeasonStats>;

/** Season-wide goals per game, home and away. */
export interface LeagueAverages {
  readonly avgHomeGoals: number;
  readonly avgAwayGoals: number;
}

/** Scoring and conceding rates relative to the league average for the same venue. */
export interface TeamStrength {
  readonly teamId: number;
  readonly name: string;
  readonly attHome: number;
  readonly defHome: number;
  readonly attAway: number;
  readonly defAway: number;
}

export type StrengthMap = ReadonlyMap<number, TeamStrength>;
