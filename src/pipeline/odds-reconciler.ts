import type { BookmakerOdds, OddsEvent } from '../types/odds.js';

interface IndexEntry {
  home: string;
  away: string;
  odds: BookmakerOdds;
}

/** Odds keyed by lower-cased "home|away", in feed order. */
export type OddsIndex = ReadonlyMap<string, IndexEntry>;

const STOP_WORDS = new Set(['fc', 'cf', 'sc', 'afc', 'ac', 'as', 'ss', 'cd', 'ud', 'the']);

function pairKey(home: string, away: string): string {
  return `${home.trim().toLowerCase()}|${away.trim().toLowerCase()}`;
}

export function buildOddsIndex(events: readonly OddsEvent[]): OddsIndex {
  const index = new Map<string, IndexEntry>();
  for (const ev of events) {
    const home = ev.homeTeam.trim().toLowerCase();
    const away = ev.awayTeam.trim().toLowerCase();
    index.set(pairKey(home, away), { home, away, odds: ev.odds });
  }
  return index;
}

export function nameTokens(raw: string): string[] {
  return raw
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((part) => part && !STOP_WORDS.has(part));
}

/**
 * Every token of `short` must be found, in order, in `long`: either as the
 * same word or as the initials of consecutive words ("sg" for "saint
 * germain"). At least one token has to be a whole word, so a bare acronym
 * like "psg" is never enough.
 */
function tokensAbbreviate(short: string[], long: string[]): boolean {
  if (!short.length) return false;
  let pos = 0;
  let wholeWords = 0;

  for (const token of short) {
    let found = false;
    for (let i = pos; i < long.length && !found; i++) {
      if (long[i] === token) {
        wholeWords++;
        pos = i + 1;
        found = true;
        continue;
      }
      if (token.length >= 2 && i + token.length <= long.length) {
        const initials = long.slice(i, i + token.length).map((w) => w[0]).join('');
        if (initials === token) {
          pos = i + token.length;
          found = true;
        }
      }
    }
    if (!found) return false;
  }

  return wholeWords > 0;
}

/** Loose name equivalence used when the exact pair key misses. */
export function namesMatch(a: string, b: string): boolean {
  const x = a.trim().toLowerCase();
  const y = b.trim().toLowerCase();
  if (!x || !y) return false;
  if (x.includes(y) || y.includes(x)) return true;

  const tx = nameTokens(x);
  const ty = nameTokens(y);
  return tokensAbbreviate(tx, ty) || tokensAbbreviate(ty, tx);
}

/**
 * Bookmaker odds for a fixture. The exact pair key always wins; otherwise the
 * first indexed event whose home AND away names both match is used.
 * Returns null when no event matches.
 */
export function findFixtureOdds(
  index: OddsIndex,
  homeName: string,
  awayName: string,
): BookmakerOdds | null {
  const exact = index.get(pairKey(homeName, awayName));
  if (exact) return exact.odds;

  for (const entry of index.values()) {
    if (namesMatch(entry.home, homeName) && namesMatch(entry.away, awayName)) {
      return entry.odds;
    }
  }
  return null;
}
