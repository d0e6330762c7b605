import type { Prediction } from '../types/prediction.js';
import type { LeagueAverages, StrengthMap } from '../types/team.js';
import { buildScoreMatrix, calc1x2, calcBtts, calcOverUnder } from './poisson.js';

export const LAMBDA_MIN = 0.3;
export const LAMBDA_MAX = 6.0;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function expectedGoals(
  homeTeamId: number,
  awayTeamId: number,
  strengths: StrengthMap,
  averages: LeagueAverages,
): { lambdaHome: number; lambdaAway: number } | null {
  const home = strengths.get(homeTeamId);
  const away = strengths.get(awayTeamId);
  if (!home || !away) return null;

  return {
    lambdaHome: clamp(home.attHome * away.defAway * averages.avgHomeGoals, LAMBDA_MIN, LAMBDA_MAX),
    lambdaAway: clamp(away.attAway * home.defHome * averages.avgAwayGoals, LAMBDA_MIN, LAMBDA_MAX),
  };
}

/**
 * Prices a fixture from both teams' strengths. Returns null when either team
 * has no strength entry, which happens whenever the fixture and standings
 * feeds disagree on a roster.
 */
export function predictMatch(
  homeTeamId: number,
  awayTeamId: number,
  strengths: StrengthMap,
  averages: LeagueAverages,
): Prediction | null {
  const goals = expectedGoals(homeTeamId, awayTeamId, strengths, averages);
  if (!goals) return null;

  const matrix = buildScoreMatrix(goals.lambdaHome, goals.lambdaAway);
  const outcome = calc1x2(matrix);
  const totals = calcOverUnder(matrix, 2.5);
  const btts = calcBtts(matrix);

  return {
    lambdaHome: round(goals.lambdaHome, 3),
    lambdaAway: round(goals.lambdaAway, 3),
    homeWin: round(outcome.homeWin, 4),
    draw: round(outcome.draw, 4),
    awayWin: round(outcome.awayWin, 4),
    over25: round(totals.over, 4),
    under25: round(totals.under, 4),
    bttsYes: round(btts.yes, 4),
    bttsNo: round(btts.no, 4),
  };
}
