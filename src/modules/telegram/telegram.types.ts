/**
 * TELEGRAM: Bot API shapes used by the bot (subset)
 */

import { z } from 'zod';

export type ParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export const MEDIA_GROUP_LIMIT = 10;

export const chatSchema = z.object({ id: z.number() }).passthrough();

export const messageSchema = z
  .object({
    message_id: z.number(),
    chat: chatSchema,
    text: z.string().optional(),
    from: z.object({ id: z.number(), username: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const userSchema = z
  .object({ id: z.number(), is_bot: z.boolean(), username: z.string().optional() })
  .passthrough();

export const updateSchema = z
  .object({
    update_id: z.number(),
    message: messageSchema.optional(),
  })
  .passthrough();

export const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;
export type TelegramUser = z.infer<typeof userSchema>;

export type ChatId = string | number;

export interface SendTextOptions {
  parseMode?: ParseMode;
  replyToMessageId?: number;
}

/** What pipelines and the poller need from the Bot API */
export interface TelegramApi {
  sendMessage(chatId: ChatId, text: string, options?: SendTextOptions): Promise<TelegramMessage>;
  editMessageText(chatId: ChatId, messageId: number, text: string, options?: SendTextOptions): Promise<void>;
  deleteMessage(chatId: ChatId, messageId: number): Promise<void>;
  sendPhoto(chatId: ChatId, file: string, caption?: string): Promise<TelegramMessage>;
  sendMediaGroup(chatId: ChatId, files: readonly string[]): Promise<TelegramMessage[]>;
  getUpdates(offset: number | undefined, timeoutSec: number): Promise<TelegramUpdate[]>;
}
