import { describe, it, expect, beforeEach } from 'vitest';
import { createTelegramNotifier } from '../../src/notifications/notifier.js';
import { alertKey } from '../../src/notifications/alert-dedup.js';
import {
  DISCLAIMER,
  NO_BETS_MESSAGE,
  formatRunHeader,
  formatValueBet,
} from '../../src/notifications/messages.js';
import type { TelegramClient, TelegramUpdate } from '../../src/notifications/telegram-client.js';
import type { AlertLedger } from '../../src/types/services.js';
import type { RunSummary } from '../../src/types/pipeline.js';
import type { SavedValueBet } from '../../src/types/value-bet.js';
import { MemoryLedger } from '../helpers/fakes.js';

class RecordingClient implements TelegramClient {
  readonly enabled = true;
  sent: string[] = [];
  deliver = true;

  async sendMessage(text: string): Promise<boolean> {
    this.sent.push(text);
    return this.deliver;
  }

  async getUpdates(): Promise<TelegramUpdate[]> {
    return [];
  }
}

function saved(id: number, bookmaker: string, value: number): SavedValueBet {
  return {
    id,
    fixtureId: 1000 + id,
    matchDate: '2024-09-14',
    league: 'Ligue 1',
    homeTeam: `Home ${id}`,
    awayTeam: `Away ${id}`,
    market: 'Home Win',
    marketKey: 'home_win',
    bookmaker,
    bkOdds: 2.5,
    modelOdds: 2,
    probability: 0.5,
    value,
  };
}

function summary(bets: SavedValueBet[]): RunSummary {
  const at = new Date('2024-09-14T08:00:00Z');
  return { trigger: 'schedule', startedAt: at, finishedAt: at, bets, errors: [] };
}

describe('createTelegramNotifier', () => {
  let client: RecordingClient;
  let ledger: MemoryLedger;
  const pinnacle = saved(1, 'Pinnacle', 0.3);
  const winamax = saved(2, 'Winamax', 0.2);
  const betclic = saved(3, 'Betclic', 0.1);
  const bets = [pinnacle, winamax, betclic];

  beforeEach(() => {
    client = new RecordingClient();
    ledger = new MemoryLedger();
  });

  it('should say so when a run finds nothing', async () => {
    await createTelegramNotifier({ client, ledger, topBetsCount: 2 }).sendRunSummary(summary([]));
    expect(client.sent).toEqual([NO_BETS_MESSAGE]);
  });

  it('should announce the top bets and remember them', async () => {
    await createTelegramNotifier({ client, ledger, topBetsCount: 2 }).sendRunSummary(summary(bets));

    expect(client.sent).toEqual([
      formatRunHeader(3, 2),
      formatValueBet(pinnacle),
      formatValueBet(winamax),
      DISCLAIMER,
    ]);
    expect([...ledger.keys]).toEqual(['1001:home_win:pinnacle', '1002:home_win:winamax']);
  });

  it('should skip bets already announced', async () => {
    ledger.keys.add('1001:home_win:pinnacle');

    await createTelegramNotifier({ client, ledger, topBetsCount: 2 }).sendRunSummary(summary(bets));

    expect(client.sent.slice(1, 3)).toEqual([
      formatValueBet(winamax),
      formatValueBet(betclic),
    ]);
  });

  it('should not remember undelivered bets', async () => {
    client.deliver = false;
    await createTelegramNotifier({ client, ledger, topBetsCount: 2 }).sendRunSummary(summary(bets));
    expect(ledger.keys.size).toBe(0);
  });

  it('should still deliver when the ledger is down', async () => {
    const broken: AlertLedger = {
      isSent: async () => {
        throw new Error('redis down');
      },
      markSent: async () => {
        throw new Error('redis down');
      },
    };

    await createTelegramNotifier({ client, ledger: broken, topBetsCount: 1 }).sendRunSummary(summary(bets));

    expect(client.sent).toHaveLength(3);
  });

  it('should stay silent when there are no errors', async () => {
    await createTelegramNotifier({ client, ledger, topBetsCount: 2 }).sendErrorDigest([]);
    expect(client.sent).toEqual([]);
  });
});

describe('alertKey', () => {
  it('should identify a bet by fixture, market and bookmaker', () => {
    expect(alertKey(saved(5, 'Unibet', 0.1))).toBe('1005:home_win:unibet');
  });
});
