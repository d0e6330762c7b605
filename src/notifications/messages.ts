import type { LeagueError, WorkerStatus } from '../types/pipeline.js';
import type { BetStats } from '../types/stats.js';
import type { BetRow, ValueBet } from '../types/value-bet.js';

export function escapeMarkdownV2(text: string): string {
  return text.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, '\\$1');
}

const esc = (value: string | number) => escapeMarkdownV2(String(value));

/** 0.155 -> "15.5" */
export function percent(fraction: number): string {
  return String(Math.round(fraction * 1000) / 10);
}

function timestamp(date: Date | null): string {
  return date ? date.toISOString().slice(0, 16).replace('T', ' ') + ' UTC' : 'never';
}

export function formatValueBet(bet: ValueBet): string {
  const emoji = bet.value >= 0.1 ? '\u{1F7E2}' : '\u{1F7E1}';
  return [
    `${emoji} *VALUE BET*`,
    `\u{26BD} *${esc(bet.homeTeam)} vs ${esc(bet.awayTeam)}*`,
    `\u{1F4C5} ${esc(bet.matchDate)} \\- ${esc(bet.league)}`,
    '',
    `Market: *${esc(bet.market)}*`,
    `Bookmaker: ${esc(bet.bookmaker)}`,
    `Odds: *${esc(bet.bkOdds)}* \\(model ${esc(bet.modelOdds)}\\)`,
    `Probability: ${esc(percent(bet.probability))}%`,
    `Value: *\\+${esc(percent(bet.value))}%*`,
  ].join('\n');
}

export function formatRunHeader(total: number, shown: number): string {
  return `\u{1F3AF} *Value bets* \\- ${total} found, top ${shown} below`;
}

export const NO_BETS_MESSAGE = '\u{1F4ED} *No value bets found today\\.*';

export const DISCLAIMER =
  '_Generated automatically by a statistical model\\. Past performance does not guarantee future results\\._';

export function formatErrorDigest(errors: LeagueError[]): string {
  const lines = errors.map((e) => {
    const line = `\u{2022} ${esc(e.league)} \\(${esc(e.stage)}\\): ${esc(e.message)}`;
    return e.source ? `${line} \\(${esc(e.source)}\\)` : line;
  });
  return [`\u{26A0}\u{FE0F} *${errors.length} error\\(s\\) during the run*`, ...lines].join('\n');
}

export function formatStatus(status: WorkerStatus): string {
  return [
    '\u{1F916} *Status*',
    `Running: ${status.running ? 'yes' : 'no'}`,
    `Up since: ${esc(timestamp(status.startedAt))}`,
    `Last run: ${esc(timestamp(status.lastRun))}`,
    `Last refresh: ${esc(timestamp(status.lastRefresh))}`,
    `Bets in last run: ${status.betsToday}`,
  ].join('\n');
}

export function formatRecentBets(rows: BetRow[]): string {
  if (!rows.length) return '\u{1F4ED} No bets recorded yet\\.';
  const lines = rows.map((b) => {
    const state = b.success === null ? '\u{23F3}' : b.success ? '\u{2705}' : '\u{274C}';
    return `${state} ${esc(b.match_date)} ${esc(b.home_team)} vs ${esc(b.away_team)} \\- ${esc(b.market)} @ ${esc(b.bk_odds)}`;
  });
  return ['\u{1F4CB} *Recent bets*', ...lines].join('\n');
}

export function formatStats(stats: BetStats): string {
  const o = stats.overall;
  const lines = [
    '\u{1F4CA} *Performance*',
    `Bets: ${o.total} \\(${o.wins}W / ${o.losses}L / ${o.pending} pending\\)`,
    `Win rate: ${esc(o.winRate)}%`,
    `ROI: ${esc(o.roi)}%`,
    `Avg value: ${esc(o.avgValuePct)}%`,
  ];
  for (const l of stats.byLeague) {
    lines.push(`\u{2022} ${esc(l.league)}: ${l.total} bets, ${l.wins} won`);
  }
  return lines.join('\n');
}

export const HELP_TEXT = [
  '*Commands*',
  '/status \\- worker status',
  '/bets \\- last 10 bets',
  '/stats \\- performance summary',
  '/run \\- scan for value bets now',
  '/refresh \\- refresh team statistics',
  '/help \\- this message',
].join('\n');
