import type { Sql } from './pool.js';
import type { BetRepository } from '../types/services.js';
import type { TeamSeasonStats } from '../types/team.js';
import type { BetRow, ValueBet } from '../types/value-bet.js';
import type { BetStats } from '../types/stats.js';
import { summarizeLeague, summarizeOverall, type LeagueRow, type OverallRow } from '../results/performance.js';

const BET_COLUMNS = (sql: Sql) => sql`
  id, created_at, fixture_id, to_char(match_date, 'YYYY-MM-DD') as match_date,
  league, home_team, away_team, market, market_key, bookmaker,
  bk_odds, model_odds, probability, value, result, success
`;

export function createBetRepository(sql: Sql): BetRepository {
  return {
    async saveValueBet(bet: ValueBet): Promise<number | null> {
      const [row] = await sql<{ id: number }[]>`
        INSERT INTO value_bets (
          fixture_id, match_date, league, home_team, away_team,
          market, market_key, bookmaker, bk_odds, model_odds, probability, value
        )
        VALUES (
          ${bet.fixtureId}, ${bet.matchDate}, ${bet.league}, ${bet.homeTeam}, ${bet.awayTeam},
          ${bet.market}, ${bet.marketKey}, ${bet.bookmaker},
          ${bet.bkOdds}, ${bet.modelOdds}, ${bet.probability}, ${bet.value}
        )
        ON CONFLICT (fixture_id, market_key, bookmaker) DO NOTHING
        RETURNING id
      `;
      return row?.id ?? null;
    },

    async upsertTeamStats(s: TeamSeasonStats): Promise<void> {
      await sql`
        INSERT INTO team_stats (
          league_id, season, team_id, team_name,
          home_goals_scored, home_goals_conceded, away_goals_scored, away_goals_conceded,
          home_games, away_games
        )
        VALUES (
          ${s.leagueId}, ${s.season}, ${s.teamId}, ${s.teamName},
          ${s.homeGoalsScored}, ${s.homeGoalsConceded}, ${s.awayGoalsScored}, ${s.awayGoalsConceded},
          ${s.homeGames}, ${s.awayGames}
        )
        ON CONFLICT (league_id, season, team_id) DO UPDATE SET
          team_name = EXCLUDED.team_name,
          home_goals_scored = EXCLUDED.home_goals_scored,
          home_goals_conceded = EXCLUDED.home_goals_conceded,
          away_goals_scored = EXCLUDED.away_goals_scored,
          away_goals_conceded = EXCLUDED.away_goals_conceded,
          home_games = EXCLUDED.home_games,
          away_games = EXCLUDED.away_games,
          updated_at = NOW()
      `;
    },

    async getTeamStats(leagueId: number, season: number): Promise<Map<number, TeamSeasonStats>> {
      const rows = await sql<TeamSeasonStats[]>`
        SELECT
          league_id as "leagueId",
          season,
          team_id as "teamId",
          team_name as "teamName",
          home_goals_scored as "homeGoalsScored",
          home_goals_conceded as "homeGoalsConceded",
          away_goals_scored as "awayGoalsScored",
          away_goals_conceded as "awayGoalsConceded",
          home_games as "homeGames",
          away_games as "awayGames"
        FROM team_stats
        WHERE league_id = ${leagueId} AND season = ${season}
      `;
      return new Map(rows.map((r) => [r.teamId, r]));
    },

    async listRecentBets(limit: number): Promise<BetRow[]> {
      return sql<BetRow[]>`
        SELECT ${BET_COLUMNS(sql)} FROM value_bets
        ORDER BY match_date DESC, created_at DESC
        LIMIT ${limit}
      `;
    },

    async listBetsForDate(date: string): Promise<BetRow[]> {
      return sql<BetRow[]>`
        SELECT ${BET_COLUMNS(sql)} FROM value_bets
        WHERE match_date = ${date}
        ORDER BY value DESC
      `;
    },

    async listPendingBets(beforeDate: string): Promise<BetRow[]> {
      return sql<BetRow[]>`
        SELECT ${BET_COLUMNS(sql)} FROM value_bets
        WHERE success IS NULL AND match_date < ${beforeDate}
        ORDER BY match_date ASC, id ASC
      `;
    },

    async updateBetResult(betId: number, result: string, success: boolean): Promise<void> {
      await sql`
        UPDATE value_bets SET result = ${result}, success = ${success}, settled_at = NOW()
        WHERE id = ${betId}
      `;
    },

    async aggregateStats(): Promise<BetStats> {
      const [overall] = await sql<OverallRow[]>`
        SELECT
          count(*)::int as total,
          count(*) FILTER (WHERE success = true)::int as wins,
          count(*) FILTER (WHERE success = false)::int as losses,
          count(*) FILTER (WHERE success IS NULL)::int as pending,
          avg(value) as avg_value,
          avg(probability) as avg_probability,
          sum(CASE WHEN success = true THEN bk_odds - 1 WHEN success = false THEN -1 ELSE 0 END) as net_units
        FROM value_bets
      `;
      const byLeague = await sql<LeagueRow[]>`
        SELECT
          league,
          count(*)::int as total,
          count(*) FILTER (WHERE success = true)::int as wins,
          avg(value) as avg_value
        FROM value_bets
        GROUP BY league
        ORDER BY league
      `;

      return {
        overall: summarizeOverall(
          overall ?? { total: 0, wins: 0, losses: 0, pending: 0, avg_value: null, avg_probability: null, net_units: null },
        ),
        byLeague: byLeague.map(summarizeLeague),
      };
    },
  };
}
