import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NetworkError, type FetchError, type ReadError } from '../../../common/errors.js';
import { fail, type Result } from '../../../common/result.js';
import type { ComponentOutcome, Overview } from '../../feargreed/services/feargreed.service.js';
import type { TelegramMessage } from '../../telegram/telegram.types.js';
import { createCommandHandlers } from '../bot.commands.js';
import { buildStartMessage, MESSAGES } from '../bot.messages.js';
import { createFakeTelegram } from './fake.telegram.js';

describe('createCommandHandlers', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  const getOverview = vi.fn(
    async (): Promise<Result<Overview, FetchError | ReadError>> => fail(new NetworkError('offline'))
  );
  const getComponents = vi.fn(
    async (): Promise<Result<ComponentOutcome[], FetchError>> => fail(new NetworkError('offline'))
  );
  const render = vi.fn();

  const message: TelegramMessage = { message_id: 31, chat: { id: 777 }, text: '/feargreed' };

  let dir: string;
  let fake: ReturnType<typeof createFakeTelegram>;

  beforeEach(async () => {
    vi.clearAllMocks();
    fake = createFakeTelegram();
    dir = await mkdtemp(path.join(os.tmpdir(), 'fg-commands-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function handlers() {
    return createCommandHandlers({
      api: fake.api,
      pipeline: { service: { getOverview, getComponents }, renderer: { render }, chartDir: dir, logger },
      logger,
    });
  }

  it('should expose start, feargreed and components', () => {
    expect(Object.keys(handlers()).sort()).toEqual(['components', 'feargreed', 'start']);
  });

  it('should answer /start with the help text', async () => {
    await handlers().start(message, '');

    expect(fake.api.sendMessage).toHaveBeenCalledWith(777, buildStartMessage());
  });

  it('should reply to the command message and report the outcome for /feargreed', async () => {
    await handlers().feargreed(message, '');

    expect(fake.api.sendMessage).toHaveBeenCalledWith(777, MESSAGES.processingOverview, { replyToMessageId: 31 });
    expect(fake.api.editMessageText).toHaveBeenCalledWith(777, 100, MESSAGES.currentUnavailable, {
      parseMode: undefined,
    });
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ chatId: 777, pipeline: 'overview', status: 'NO_DATA' }),
      '[Bot] /feargreed done'
    );
  });

  it('should run the components pipeline for /components', async () => {
    await handlers().components(message, '');

    expect(getComponents).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ chatId: 777, pipeline: 'components', status: 'NO_DATA' }),
      '[Bot] /components done'
    );
  });
});
