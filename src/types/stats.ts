export interface OverallStats {
  total: number;
  wins: number;
  losses: number;
  pending: number;
  avgValuePct: number;
  avgProbabilityPct: number;
  roi: number;
  winRate: number;
}

export interface LeagueStats {
  league: string;
  total: number;
  wins: number;
  avgValuePct: number;
}

export interface BetStats {
  overall: OverallStats;
  byLeague: LeagueStats[];
}
