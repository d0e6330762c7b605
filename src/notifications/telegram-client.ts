import { request } from 'undici';
import { z } from 'zod';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const TELEGRAM_API = 'https://api.telegram.org';

const updateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      chat: z.object({ id: z.number() }),
      text: z.string().optional(),
    })
    .optional(),
});

const updatesResponse = z.object({
  ok: z.boolean(),
  result: z.array(updateSchema).default([]),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

export interface TelegramClient {
  readonly enabled: boolean;
  /** Returns false when the message could not be delivered. Never throws. */
  sendMessage(text: string): Promise<boolean>;
  /** Long-polls for new updates. Aborting `signal` cancels the pending request. */
  getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
}

export function createTelegramClient(opts: { botToken: string | null; chatId: string | null }): TelegramClient {
  const { botToken, chatId } = opts;
  const enabled = Boolean(botToken && chatId);

  async function call(
    method: string,
    payload: Record<string, unknown>,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const { statusCode, body } = await request(`${TELEGRAM_API}/bot${botToken ?? ''}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      signal,
    });
    const json: unknown = await body.json();
    if (statusCode >= 400) throw new Error(`Telegram ${method} failed with HTTP ${statusCode}`);
    return json;
  }

  return {
    enabled,

    async sendMessage(text: string): Promise<boolean> {
      if (!enabled) {
        logger.debug('Telegram not configured, skipping message');
        return false;
      }
      try {
        await call('sendMessage', { chat_id: chatId, text, parse_mode: 'MarkdownV2' }, 10_000);
        return true;
      } catch (err) {
        logger.error({ err: errorMessage(err) }, 'Failed to send Telegram message');
        return false;
      }
    },

    async getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
      if (!enabled) return [];
      const json = await call(
        'getUpdates',
        { offset, timeout: timeoutSec, allowed_updates: ['message'] },
        (timeoutSec + 10) * 1000,
        signal,
      );
      return updatesResponse.parse(json).result;
    },
  };
}
