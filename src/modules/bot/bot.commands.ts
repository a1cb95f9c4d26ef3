/**
 * BOT: Command Handlers
 *
 * /start       help text
 * /feargreed   current index + 12-month chart
 * /components  one chart per component
 */

import type { Logger } from '../../common/logger.js';
import type { CommandHandler } from '../telegram/telegram.poller.js';
import type { TelegramApi } from '../telegram/telegram.types.js';
import { buildStartMessage, MESSAGES } from './bot.messages.js';
import { runComponentsPipeline, runOverviewPipeline, type PipelineDeps } from './bot.pipelines.js';
import { ChatResponder } from './bot.responder.js';

export interface CommandDeps {
  api: TelegramApi;
  pipeline: PipelineDeps;
  logger: Logger;
}

export function createCommandHandlers(deps: CommandDeps): Record<string, CommandHandler> {
  const { api, logger } = deps;

  const responderFor = (chatId: number, messageId: number) =>
    new ChatResponder({
      api,
      chatId,
      mode: 'command',
      logger,
      failureText: MESSAGES.internalError,
      replyToMessageId: messageId,
    });

  return {
    start: async (message) => {
      await api.sendMessage(message.chat.id, buildStartMessage());
    },

    feargreed: async (message) => {
      const report = await runOverviewPipeline(deps.pipeline, responderFor(message.chat.id, message.message_id));
      logger.info({ chatId: message.chat.id, ...report }, '[Bot] /feargreed done');
    },

    components: async (message) => {
      const report = await runComponentsPipeline(deps.pipeline, responderFor(message.chat.id, message.message_id));
      logger.info({ chatId: message.chat.id, ...report }, '[Bot] /components done');
    },
  };
}
