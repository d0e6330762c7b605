import type { LeagueStats, OverallStats } from '../types/stats.js';

export interface OverallRow {
  total: number;
  wins: number;
  losses: number;
  pending: number;
  avg_value: number | null;
  avg_probability: number | null;
  /** Flat 1-unit stakes: a win returns bk_odds - 1, a loss -1. */
  net_units: number | null;
}

export interface LeagueRow {
  league: string;
  total: number;
  wins: number;
  avg_value: number | null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function computeRoi(netUnits: number, resolved: number): number {
  if (resolved <= 0) return 0;
  return round2((netUnits / resolved) * 100);
}

export function computeWinRate(wins: number, losses: number): number {
  const decided = wins + losses;
  if (decided <= 0) return 0;
  return round2((wins / decided) * 100);
}

export function summarizeOverall(row: OverallRow): OverallStats {
  return {
    total: row.total,
    wins: row.wins,
    losses: row.losses,
    pending: row.pending,
    avgValuePct: round2((row.avg_value ?? 0) * 100),
    avgProbabilityPct: round2((row.avg_probability ?? 0) * 100),
    roi: computeRoi(row.net_units ?? 0, row.wins + row.losses),
    winRate: computeWinRate(row.wins, row.losses),
  };
}

export function summarizeLeague(row: LeagueRow): LeagueStats {
  return {
    league: row.league,
    total: row.total,
    wins: row.wins,
    avgValuePct: round2((row.avg_value ?? 0) * 100),
  };
}
