/**
 * Independent-Poisson scoreline model.
 *
 * Goals for each side are drawn from separate Poisson distributions; there is
 * no correlation term between the two scores.
 */

import type { ScoreMatrix } from '../types/prediction.js';

export const MAX_GOALS = 8;

function factorial(n: number): number {
  let result = 1;
  for (let i = 2; i <= n; i++) result *= i;
  return result;
}

/** P(X = k) for X ~ Poisson(lambda). A non-positive rate is a point mass at 0. */
export function poissonProbability(lambda: number, k: number): number {
  if (lambda <= 0) return k === 0 ? 1 : 0;
  if (k < 0) return 0;
  return (lambda ** k * Math.exp(-lambda)) / factorial(k);
}

/**
 * Builds the (maxGoals + 1)² grid of P(home = i, away = j).
 * Cells are rescaled by the grid's total mass so the tail beyond `maxGoals`
 * is spread over the grid and the cells sum to 1.
 */
export function buildScoreMatrix(
  lambdaHome: number,
  lambdaAway: number,
  maxGoals: number = MAX_GOALS,
): ScoreMatrix {
  const home: number[] = [];
  const away: number[] = [];
  for (let k = 0; k <= maxGoals; k++) {
    home.push(poissonProbability(lambdaHome, k));
    away.push(poissonProbability(lambdaAway, k));
  }

  const matrix = home.map((ph) => away.map((pa) => ph * pa));

  let total = 0;
  for (const row of matrix) for (const cell of row) total += cell;
  if (total <= 0) return matrix;

  return matrix.map((row) => row.map((cell) => cell / total));
}

function sumWhere(matrix: ScoreMatrix, include: (home: number, away: number) => boolean): number {
  let total = 0;
  matrix.forEach((row, i) => {
    row.forEach((cell, j) => {
      if (include(i, j)) total += cell;
    });
  });
  return total;
}

export function calc1x2(matrix: ScoreMatrix): { homeWin: number; draw: number; awayWin: number } {
  return {
    homeWin: sumWhere(matrix, (i, j) => i > j),
    draw: sumWhere(matrix, (i, j) => i === j),
    awayWin: sumWhere(matrix, (i, j) => i < j),
  };
}

export function calcOverUnder(matrix: ScoreMatrix, line = 2.5): { over: number; under: number } {
  const over = sumWhere(matrix, (i, j) => i + j > line);
  return { over, under: 1 - over };
}

export function calcBtts(matrix: ScoreMatrix): { yes: number; no: number } {
  const yes = sumWhere(matrix, (i, j) => i >= 1 && j >= 1);
  return { yes, no: 1 - yes };
}
