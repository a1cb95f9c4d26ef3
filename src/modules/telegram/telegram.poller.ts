/**
 * TELEGRAM POLLER
 *
 * getUpdates long-polling loop that routes `/command` messages to handlers.
 * Handlers run detached from the loop so a slow chart never delays the next
 * update; in-flight handlers are drained on stop().
 */

import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { TelegramApi, TelegramMessage } from './telegram.types.js';

export type CommandHandler = (message: TelegramMessage, args: string) => Promise<void>;

export interface ParsedCommand {
  command: string;
  mention?: string;
  args: string;
}

export interface TelegramPollerOptions {
  api: Pick<TelegramApi, 'getUpdates'>;
  handlers: Readonly<Record<string, CommandHandler>>;
  logger: Logger;
  timeoutSec: number;
  errorBackoffMs: number;
  botUsername?: string;
}

/** "/feargreed@MyBot extra" -> { command: 'feargreed', mention: 'MyBot', args: 'extra' } */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([A-Za-z0-9_]{1,32})(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;
  return {
    command: match[1].toLowerCase(),
    ...(match[2] ? { mention: match[2] } : {}),
    args: (match[3] ?? '').trim(),
  };
}

export class TelegramPoller {
  private running = false;
  private offset: number | undefined;
  private loop: Promise<void> | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private wake: (() => void) | null = null;

  constructor(private readonly options: TelegramPollerOptions) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
    this.options.logger.info({ commands: Object.keys(this.options.handlers) }, '[Poller] Polling started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.wake?.();
    await this.loop;
    await Promise.allSettled([...this.inFlight]);
    this.options.logger.info({}, '[Poller] Polling stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** One getUpdates round; exposed for tests */
  async pollOnce(): Promise<number> {
    const updates = await this.options.api.getUpdates(this.offset, this.options.timeoutSec);
    for (const update of updates) {
      this.offset = update.update_id + 1;
      if (update.message) this.route(update.message);
    }
    return updates.length;
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (err) {
        this.options.logger.error({ err: errorMessage(err), backoffMs: this.options.errorBackoffMs }, '[Poller] getUpdates failed');
        await this.sleep(this.options.errorBackoffMs);
      }
    }
  }

  private route(message: TelegramMessage): void {
    if (!message.text) return;
    const parsed = parseCommand(message.text);
    if (!parsed) return;

    const { botUsername, handlers, logger } = this.options;
    if (parsed.mention && botUsername && parsed.mention.toLowerCase() !== botUsername.toLowerCase()) return;

    const handler = Object.hasOwn(handlers, parsed.command) ? handlers[parsed.command] : undefined;
    if (!handler) {
      logger.debug({ command: parsed.command, chatId: message.chat.id }, '[Poller] Ignoring unknown command');
      return;
    }

    logger.info({ command: parsed.command, chatId: message.chat.id }, '[Poller] Command received');
    const task = handler(message, parsed.args)
      .catch((err: unknown) => {
        logger.error({ command: parsed.command, chatId: message.chat.id, err: errorMessage(err) }, '[Poller] Command handler failed');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
