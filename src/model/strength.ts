import type { LeagueAverages, StrengthMap, TeamStatsMap, TeamStrength } from '../types/team.js';

// Floors keep ratios finite for teams or leagues with no recorded games.
const MIN_GAMES = 1;
const MIN_LEAGUE_AVG = 0.01;

export function calcLeagueAverages(stats: TeamStatsMap): LeagueAverages {
  let homeScored = 0;
  let awayScored = 0;
  let homeGames = 0;
  let awayGames = 0;

  for (const s of stats.values()) {
    homeScored += s.homeGoalsScored;
    awayScored += s.awayGoalsScored;
    homeGames += s.homeGames;
    awayGames += s.awayGames;
  }

  return {
    avgHomeGoals: homeScored / Math.max(homeGames, MIN_GAMES),
    avgAwayGoals: awayScored / Math.max(awayGames, MIN_GAMES),
  };
}

/**
 * Attack/defence multipliers per team. A home attack is measured against the
 * league's home scoring rate and a home defence against the away scoring rate,
 * and the other way round for away games.
 */
export function calcTeamStrengths(stats: TeamStatsMap, averages: LeagueAverages): StrengthMap {
  const avgHome = Math.max(averages.avgHomeGoals, MIN_LEAGUE_AVG);
  const avgAway = Math.max(averages.avgAwayGoals, MIN_LEAGUE_AVG);
  const strengths = new Map<number, TeamStrength>();

  for (const [teamId, s] of stats) {
    const homeGames = Math.max(s.homeGames, MIN_GAMES);
    const awayGames = Math.max(s.awayGames, MIN_GAMES);

    strengths.set(teamId, {
      teamId,
      name: s.teamName,
      attHome: s.homeGoalsScored / homeGames / avgHome,
      defHome: s.homeGoalsConceded / homeGames / avgAway,
      attAway: s.awayGoalsScored / awayGames / avgAway,
      defAway: s.awayGoalsConceded / awayGames / avgHome,
    });
  }

  return strengths;
}
