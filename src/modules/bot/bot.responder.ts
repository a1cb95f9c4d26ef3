/**
 * BOT: Responder
 *
 * One delivery target per invocation. In command mode a "processing" status
 * message is posted first and later edited or deleted; in scheduled mode every
 * delivery is a fresh message to the configured chat.
 */

import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { chunk } from '../telegram/media.batching.js';
import type { ChatId, ParseMode, TelegramApi } from '../telegram/telegram.types.js';
import type { DeliveryMode } from './bot.messages.js';

export interface Responder {
  readonly mode: DeliveryMode;
  readonly chatId: ChatId;
  status(text: string): Promise<void>;
  /** Replaces the pending status message when there is one */
  text(text: string, parseMode?: ParseMode): Promise<void>;
  clearStatus(): Promise<void>;
  photo(file: string): Promise<void>;
  album(files: readonly string[]): Promise<void>;
  /** Best-effort failure notice; never throws */
  failure(): Promise<void>;
}

export interface ChatResponderOptions {
  api: TelegramApi;
  chatId: ChatId;
  mode: DeliveryMode;
  logger: Logger;
  failureText: string;
  replyToMessageId?: number;
}

export class ChatResponder implements Responder {
  readonly mode: DeliveryMode;
  readonly chatId: ChatId;
  private statusMessageId: number | null = null;

  constructor(private readonly options: ChatResponderOptions) {
    this.mode = options.mode;
    this.chatId = options.chatId;
  }

  async status(text: string): Promise<void> {
    if (this.mode === 'scheduled') return;
    const message = await this.options.api.sendMessage(this.chatId, text, {
      replyToMessageId: this.options.replyToMessageId,
    });
    this.statusMessageId = message.message_id;
  }

  async text(text: string, parseMode?: ParseMode): Promise<void> {
    const pending = this.takeStatus();
    if (pending !== null) {
      await this.options.api.editMessageText(this.chatId, pending, text, { parseMode });
      return;
    }
    await this.options.api.sendMessage(this.chatId, text, { parseMode });
  }

  async clearStatus(): Promise<void> {
    const pending = this.takeStatus();
    if (pending !== null) {
      await this.options.api.deleteMessage(this.chatId, pending);
    }
  }

  async photo(file: string): Promise<void> {
    await this.options.api.sendPhoto(this.chatId, file);
  }

  async album(files: readonly string[]): Promise<void> {
    for (const batch of chunk(files)) {
      // the Bot API rejects single-item albums
      if (batch.length === 1) {
        await this.options.api.sendPhoto(this.chatId, batch[0]);
      } else {
        await this.options.api.sendMediaGroup(this.chatId, batch);
      }
    }
  }

  async failure(): Promise<void> {
    try {
      await this.text(this.options.failureText);
    } catch (err) {
      this.options.logger.error({ chatId: this.chatId, err: errorMessage(err) }, '[Bot] Could not deliver failure notice');
    }
  }

  private takeStatus(): number | null {
    const id = this.statusMessageId;
    this.statusMessageId = null;
    return id;
  }
}
