import { describe, it, expect, vi, beforeEach } from 'vitest';
import { handleUpdate, startCommandListener } from '../../src/notifications/command-listener.js';
import type { CommandHandler } from '../../src/notifications/commands.js';
import type { TelegramClient, TelegramUpdate } from '../../src/notifications/telegram-client.js';

function update(chatId: number, text?: string): TelegramUpdate {
  return { update_id: 1, message: { chat: { id: chatId }, text } };
}

describe('handleUpdate', () => {
  let sent: string[];
  let client: TelegramClient;

  beforeEach(() => {
    sent = [];
    client = {
      enabled: true,
      sendMessage: async (text) => {
        sent.push(text);
        return true;
      },
      getUpdates: async () => [],
    };
  });

  it('should answer the authorized chat', async () => {
    const handle = vi.fn<CommandHandler>(async (command) => `ok ${command}`);

    const answered = await handleUpdate(update(42, '/stats'), { client, handle, authorizedChatId: '42' });

    expect(answered).toBe(true);
    expect(handle).toHaveBeenCalledWith('stats');
    expect(sent).toEqual(['ok stats']);
  });

  it('should ignore other chats', async () => {
    const handle = vi.fn<CommandHandler>(async () => 'ok');

    const answered = await handleUpdate(update(7, '/run'), { client, handle, authorizedChatId: '42' });

    expect(answered).toBe(false);
    expect(handle).not.toHaveBeenCalled();
    expect(sent).toEqual([]);
  });

  it('should ignore updates without text', async () => {
    const handle = vi.fn<CommandHandler>(async () => 'ok');
    expect(await handleUpdate(update(42), { client, handle, authorizedChatId: '42' })).toBe(false);
    expect(await handleUpdate({ update_id: 2 }, { client, handle, authorizedChatId: '42' })).toBe(false);
  });

  it('should reply with a failure notice when the handler throws', async () => {
    const handle = vi.fn<CommandHandler>(async () => {
      throw new Error('db down');
    });

    await handleUpdate(update(42, '/bets'), { client, handle, authorizedChatId: '42' });

    expect(sent).toEqual(['\u{274C} Command failed, see logs\\.']);
  });
});

type PollStep = TelegramUpdate[] | Error;

/** Serves scripted polls, then holds the next poll open until it is aborted. */
function scriptedClient(steps: PollStep[]) {
  const offsets: number[] = [];
  const sent: string[] = [];
  const client: TelegramClient = {
    enabled: true,
    sendMessage: async (text) => {
      sent.push(text);
      return true;
    },
    getUpdates: (offset, _timeoutSec, signal) => {
      offsets.push(offset);
      const step = steps.shift();
      if (step instanceof Error) return Promise.reject(step);
      if (step) return Promise.resolve(step);
      return new Promise<TelegramUpdate[]>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    },
  };
  return { client, offsets, sent };
}

function command(updateId: number, text: string): TelegramUpdate {
  return { update_id: updateId, message: { chat: { id: 42 }, text } };
}

describe('startCommandListener', () => {
  const listenerOptions = { authorizedChatId: '42', pollTimeoutSec: 30, retryDelayMs: 0 };

  it('should advance the offset past every handled update', async () => {
    const { client, offsets, sent } = scriptedClient([
      [command(5, '/status'), command(6, '/bets')],
      [command(9, '/stats')],
    ]);
    const handle = vi.fn<CommandHandler>(async (name) => `ok ${name}`);

    const listener = startCommandListener({ ...listenerOptions, client, handle });
    await vi.waitFor(() => expect(offsets).toHaveLength(3));
    await listener.stop();

    expect(offsets).toEqual([0, 7, 10]);
    expect(handle.mock.calls.map(([name]) => name)).toEqual(['status', 'bets', 'stats']);
    expect(sent).toEqual(['ok status', 'ok bets', 'ok stats']);
  });

  it('should poll again with the same offset after a failed poll', async () => {
    const { client, offsets } = scriptedClient([
      [command(3, '/status')],
      new Error('network down'),
      [command(4, '/help')],
    ]);
    const handle = vi.fn<CommandHandler>(async () => 'ok');

    const listener = startCommandListener({ ...listenerOptions, client, handle });
    await vi.waitFor(() => expect(offsets).toHaveLength(4));
    await listener.stop();

    expect(offsets).toEqual([0, 4, 4, 5]);
    expect(handle).toHaveBeenCalledTimes(2);
  });

  it('should abort the pending poll when stopped', async () => {
    const { client, offsets } = scriptedClient([]);
    const handle = vi.fn<CommandHandler>(async () => 'ok');

    const listener = startCommandListener({ ...listenerOptions, client, handle, retryDelayMs: 60_000 });
    await vi.waitFor(() => expect(offsets).toHaveLength(1));
    await listener.stop();

    expect(offsets).toEqual([0]);
    expect(handle).not.toHaveBeenCalled();
  });
});
