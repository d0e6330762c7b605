import type { AlertLedger, Notifier } from '../types/services.js';
import type { LeagueError, RunSummary } from '../types/pipeline.js';
import type { ValueBet } from '../types/value-bet.js';
import type { TelegramClient } from './telegram-client.js';
import { alertKey } from './alert-dedup.js';
import {
  DISCLAIMER,
  NO_BETS_MESSAGE,
  formatErrorDigest,
  formatRunHeader,
  formatValueBet,
} from './messages.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface TelegramNotifierOptions {
  client: TelegramClient;
  ledger: AlertLedger;
  /** Number of individual bet messages per run */
  topBetsCount: number;
}

export function createTelegramNotifier(opts: TelegramNotifierOptions): Notifier {
  const { client, ledger, topBetsCount } = opts;
  const log = logger.child({ component: 'notifier' });

  // Ledger failures must not block delivery: an unreadable ledger means "not sent yet"
  async function alreadySent(bet: ValueBet): Promise<boolean> {
    try {
      return await ledger.isSent(alertKey(bet));
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Alert ledger read failed');
      return false;
    }
  }

  async function remember(bet: ValueBet): Promise<void> {
    try {
      await ledger.markSent(alertKey(bet));
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Alert ledger write failed');
    }
  }

  return {
    async sendRunSummary(summary: RunSummary): Promise<void> {
      if (!summary.bets.length) {
        await client.sendMessage(NO_BETS_MESSAGE);
        return;
      }

      const fresh: ValueBet[] = [];
      for (const bet of summary.bets) {
        if (fresh.length >= topBetsCount) break;
        if (!(await alreadySent(bet))) fresh.push(bet);
      }

      await client.sendMessage(formatRunHeader(summary.bets.length, fresh.length));
      for (const bet of fresh) {
        if (await client.sendMessage(formatValueBet(bet))) await remember(bet);
      }
      await client.sendMessage(DISCLAIMER);

      log.info({ total: summary.bets.length, announced: fresh.length }, 'Run summary sent');
    },

    async sendErrorDigest(errors: LeagueError[]): Promise<void> {
      if (!errors.length) return;
      await client.sendMessage(formatErrorDigest(errors));
    },

    async sendText(text: string): Promise<void> {
      await client.sendMessage(text);
    },
  };
}
