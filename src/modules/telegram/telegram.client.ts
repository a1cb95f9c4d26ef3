/**
 * TELEGRAM CLIENT
 * ===============
 *
 * Thin Bot API client over axios: text, edits, photo uploads, albums and
 * long-polling. Every non-ok reply becomes a TelegramApiError.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { errorMessage, TelegramApiError } from '../../common/errors.js';
import {
  envelopeSchema,
  MEDIA_GROUP_LIMIT,
  messageSchema,
  updateSchema,
  userSchema,
  type ChatId,
  type SendTextOptions,
  type TelegramApi,
  type TelegramMessage,
  type TelegramUpdate,
  type TelegramUser,
} from './telegram.types.js';

const TELEGRAM_API = 'https://api.telegram.org';
const REQUEST_TIMEOUT_MS = 30_000;

export interface TelegramClientOptions {
  token: string;
  baseUrl?: string;
  http?: AxiosInstance;
}

export class TelegramBotClient implements TelegramApi {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;

  constructor(private readonly options: TelegramClientOptions) {
    this.http = options.http ?? axios.create();
    this.baseUrl = options.baseUrl ?? TELEGRAM_API;
  }

  /** The bot's own account; its username filters `/command@OtherBot` */
  async getMe(): Promise<TelegramUser> {
    return this.call('getMe', {}, userSchema);
  }

  async sendMessage(chatId: ChatId, text: string, options: SendTextOptions = {}): Promise<TelegramMessage> {
    return this.call('sendMessage', {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
      ...(options.parseMode ? { parse_mode: options.parseMode } : {}),
      ...(options.replyToMessageId ? { reply_to_message_id: options.replyToMessageId } : {}),
    }, messageSchema);
  }

  async editMessageText(chatId: ChatId, messageId: number, text: string, options: SendTextOptions = {}): Promise<void> {
    await this.call('editMessageText', {
      chat_id: chatId,
      message_id: messageId,
      text,
      disable_web_page_preview: true,
      ...(options.parseMode ? { parse_mode: options.parseMode } : {}),
    }, z.unknown());
  }

  async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
    await this.call('deleteMessage', { chat_id: chatId, message_id: messageId }, z.unknown());
  }

  async sendPhoto(chatId: ChatId, file: string, caption?: string): Promise<TelegramMessage> {
    const form = new FormData();
    form.append('chat_id', String(chatId));
    if (caption) form.append('caption', caption);
    form.append('photo', await this.fileBlob(file), path.basename(file));
    return this.call('sendPhoto', form, messageSchema);
  }

  /** 2..10 photos as one album */
  async sendMediaGroup(chatId: ChatId, files: readonly string[]): Promise<TelegramMessage[]> {
    if (files.length < 2 || files.length > MEDIA_GROUP_LIMIT) {
      throw new TelegramApiError('sendMediaGroup', 0, `album must hold 2-${MEDIA_GROUP_LIMIT} photos, got ${files.length}`);
    }

    const form = new FormData();
    form.append('chat_id', String(chatId));
    form.append(
      'media',
      JSON.stringify(files.map((_, i) => ({ type: 'photo', media: `attach://photo${i}` })))
    );
    for (const [i, file] of files.entries()) {
      form.append(`photo${i}`, await this.fileBlob(file), path.basename(file));
    }
    return this.call('sendMediaGroup', form, z.array(messageSchema));
  }

  async getUpdates(offset: number | undefined, timeoutSec: number): Promise<TelegramUpdate[]> {
    return this.call(
      'getUpdates',
      {
        timeout: timeoutSec,
        allowed_updates: ['message'],
        ...(offset !== undefined ? { offset } : {}),
      },
      z.array(updateSchema),
      (timeoutSec + 10) * 1000
    );
  }

  private async fileBlob(file: string): Promise<Blob> {
    const bytes = await readFile(file);
    return new Blob([new Uint8Array(bytes)], { type: 'image/png' });
  }

  private async call<T>(
    method: string,
    payload: object | FormData,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs = REQUEST_TIMEOUT_MS
  ): Promise<T> {
    const url = `${this.baseUrl}/bot${this.options.token}/${method}`;

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(url, payload, {
        timeout: timeoutMs,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (err) {
      throw new TelegramApiError(method, 0, errorMessage(err));
    }

    const envelope = envelopeSchema.safeParse(data);
    if (!envelope.success) {
      throw new TelegramApiError(method, status, 'malformed Bot API response');
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(method, envelope.data.error_code ?? status, envelope.data.description ?? `HTTP ${status}`);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TelegramApiError(method, status, `unexpected result shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
