import { describe, it, expect } from 'vitest';
import {
  escapeMarkdownV2,
  formatErrorDigest,
  formatRecentBets,
  formatStats,
  formatStatus,
  formatValueBet,
  percent,
} from '../../src/notifications/messages.js';
import type { ValueBet } from '../../src/types/value-bet.js';
import { betRow } from '../helpers/fakes.js';

const bet: ValueBet = {
  fixtureId: 1001,
  matchDate: '2024-09-14',
  league: 'Ligue 1',
  homeTeam: 'Paris SG',
  awayTeam: 'Marseille',
  market: 'Home Win',
  marketKey: 'home_win',
  bookmaker: 'Winamax',
  bkOdds: 2.1,
  modelOdds: 1.818,
  probability: 0.55,
  value: 0.155,
};

describe('escapeMarkdownV2', () => {
  it('should escape reserved characters', () => {
    expect(escapeMarkdownV2('St. Etienne (1-0)!')).toBe('St\\. Etienne \\(1\\-0\\)\\!');
  });
});

describe('percent', () => {
  it('should keep one decimal', () => {
    expect(percent(0.155)).toBe('15.5');
    expect(percent(0.6)).toBe('60');
  });
});

describe('formatValueBet', () => {
  it('should render the bet card', () => {
    expect(formatValueBet(bet)).toBe(
      [
        '\u{1F7E2} *VALUE BET*',
        '\u{26BD} *Paris SG vs Marseille*',
        '\u{1F4C5} 2024\\-09\\-14 \\- Ligue 1',
        '',
        'Market: *Home Win*',
        'Bookmaker: Winamax',
        'Odds: *2\\.1* \\(model 1\\.818\\)',
        'Probability: 55%',
        'Value: *\\+15\\.5%*',
      ].join('\n'),
    );
  });

  it('should mark small edges yellow', () => {
    expect(formatValueBet({ ...bet, value: 0.08 }).startsWith('\u{1F7E1}')).toBe(true);
  });
});

describe('formatErrorDigest', () => {
  it('should list one line per league error', () => {
    expect(
      formatErrorDigest([{ leagueId: 39, league: 'Premier League', stage: 'odds', message: 'HTTP 429' }]),
    ).toBe('\u{26A0}\u{FE0F} *1 error\\(s\\) during the run*\n\u{2022} Premier League \\(odds\\): HTTP 429');
  });

  it('should append the failing request when known', () => {
    const digest = formatErrorDigest([
      {
        leagueId: 61,
        league: 'Ligue 1',
        stage: 'fixtures',
        message: 'HTTP 500',
        source: 'https://football.example.test/fixtures?league=61',
      },
    ]);
    expect(digest.split('\n')[1]).toBe(
      '\u{2022} Ligue 1 \\(fixtures\\): HTTP 500 \\(https://football\\.example\\.test/fixtures?league\\=61\\)',
    );
  });
});

describe('formatStatus', () => {
  it('should print never for missing timestamps', () => {
    const text = formatStatus({
      startedAt: new Date('2024-09-14T06:00:00Z'),
      lastRun: null,
      lastRefresh: null,
      betsToday: 0,
      running: false,
    });
    expect(text.split('\n')).toEqual([
      '\u{1F916} *Status*',
      'Running: no',
      'Up since: 2024\\-09\\-14 06:00 UTC',
      'Last run: never',
      'Last refresh: never',
      'Bets in last run: 0',
    ]);
  });
});

describe('formatRecentBets', () => {
  it('should say when nothing is recorded', () => {
    expect(formatRecentBets([])).toBe('\u{1F4ED} No bets recorded yet\\.');
  });

  it('should show the outcome of each bet', () => {
    const text = formatRecentBets([betRow({ success: true }), betRow({ id: 2, success: null })]);
    expect(text.split('\n')).toEqual([
      '\u{1F4CB} *Recent bets*',
      '\u{2705} 2024\\-09\\-13 Team 1 vs Team 2 \\- Home Win @ 2\\.5',
      '\u{23F3} 2024\\-09\\-13 Team 1 vs Team 2 \\- Home Win @ 2\\.5',
    ]);
  });
});

describe('formatStats', () => {
  it('should summarise overall and per league figures', () => {
    const text = formatStats({
      overall: { total: 10, wins: 3, losses: 2, pending: 5, avgValuePct: 12.34, avgProbabilityPct: 60, roi: -5.5, winRate: 60 },
      byLeague: [{ league: 'Ligue 1', total: 10, wins: 3, avgValuePct: 12.34 }],
    });
    expect(text.split('\n')).toEqual([
      '\u{1F4CA} *Performance*',
      'Bets: 10 \\(3W / 2L / 5 pending\\)',
      'Win rate: 60%',
      'ROI: \\-5\\.5%',
      'Avg value: 12\\.34%',
      '\u{2022} Ligue 1: 10 bets, 3 won',
    ]);
  });
});
