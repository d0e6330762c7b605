import type { TelegramClient, TelegramUpdate } from './telegram-client.js';
import { parseCommand, type CommandHandler } from './commands.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface CommandListenerOptions {
  client: TelegramClient;
  handle: CommandHandler;
  /** Only messages from this chat are answered. */
  authorizedChatId: string;
  pollTimeoutSec: number;
  /** Pause after a failed poll */
  retryDelayMs?: number;
}

export interface CommandListener {
  stop(): Promise<void>;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Answers one update. Returns true when a reply was attempted.
 */
export async function handleUpdate(
  update: TelegramUpdate,
  opts: Pick<CommandListenerOptions, 'client' | 'handle' | 'authorizedChatId'>,
): Promise<boolean> {
  const message = update.message;
  if (!message?.text) return false;

  if (String(message.chat.id) !== opts.authorizedChatId) {
    logger.warn({ chatId: message.chat.id }, 'Ignoring command from unauthorized chat');
    return false;
  }

  const command = parseCommand(message.text);
  logger.info({ command }, 'Command received');

  let reply: string;
  try {
    reply = await opts.handle(command);
  } catch (err) {
    logger.error({ err: errorMessage(err), command }, 'Command failed');
    reply = '\u{274C} Command failed, see logs\\.';
  }
  await opts.client.sendMessage(reply);
  return true;
}

/**
 * Long-polls getUpdates until stopped. Commands are handled inline, so
 * handlers must hand long work to the job queue. `stop()` aborts the
 * pending poll instead of waiting for it to time out.
 */
export function startCommandListener(opts: CommandListenerOptions): CommandListener {
  const retryDelayMs = opts.retryDelayMs ?? 5000;
  const controller = new AbortController();
  let offset = 0;

  async function loop(): Promise<void> {
    logger.info('Command listener started');
    while (!controller.signal.aborted) {
      try {
        const updates = await opts.client.getUpdates(offset, opts.pollTimeoutSec, controller.signal);
        for (const update of updates) {
          offset = update.update_id + 1;
          await handleUpdate(update, opts);
        }
      } catch (err) {
        if (controller.signal.aborted) break;
        logger.error({ err: errorMessage(err), offset }, 'Polling Telegram failed');
        await sleep(retryDelayMs, controller.signal);
      }
    }
    logger.info('Command listener stopped');
  }

  const running = loop();

  return {
    async stop() {
      controller.abort();
      await running;
    },
  };
}
