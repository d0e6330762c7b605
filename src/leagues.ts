export interface LeagueInfo {
  name: string;
  /** Sport key on The Odds API */
  oddsSportKey: string;
}

/** API-Sports league id -> display name and odds feed key. */
export const LEAGUES: Readonly<Record<number, LeagueInfo>> = {
  39: { name: 'Premier League', oddsSportKey: 'soccer_epl' },
  40: { name: 'Championship', oddsSportKey: 'soccer_efl_champ' },
  61: { name: 'Ligue 1', oddsSportKey: 'soccer_france_ligue_one' },
  62: { name: 'Ligue 2', oddsSportKey: 'soccer_france_ligue_two' },
  78: { name: 'Bundesliga', oddsSportKey: 'soccer_germany_bundesliga' },
  88: { name: 'Eredivisie', oddsSportKey: 'soccer_netherlands_eredivisie' },
  94: { name: 'Primeira Liga', oddsSportKey: 'soccer_portugal_primeira_liga' },
  135: { name: 'Serie A', oddsSportKey: 'soccer_italy_serie_a' },
  140: { name: 'La Liga', oddsSportKey: 'soccer_spain_la_liga' },
};

export function leagueName(leagueId: number): string {
  return LEAGUES[leagueId]?.name ?? String(leagueId);
}

export function oddsSportKey(leagueId: number): string | null {
  return LEAGUES[leagueId]?.oddsSportKey ?? null;
}
