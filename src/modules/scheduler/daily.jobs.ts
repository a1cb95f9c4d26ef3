/**
 * Daily broadcast jobs
 *
 * Same pipelines as the chat commands, delivered to the configured chat.
 */

import type { Logger } from '../../common/logger.js';
import { buildScheduledFailure } from '../bot/bot.messages.js';
import { runComponentsPipeline, runOverviewPipeline, type PipelineDeps, type PipelineReport } from '../bot/bot.pipelines.js';
import { ChatResponder } from '../bot/bot.responder.js';
import type { ChatId, TelegramApi } from '../telegram/telegram.types.js';

export const JOB_NAMES = ['daily-feargreed', 'daily-components'] as const;
export type JobName = (typeof JOB_NAMES)[number];

export interface DailyJobDeps {
  api: TelegramApi;
  chatId: ChatId;
  pipeline: PipelineDeps;
  logger: Logger;
}

export interface DailyJobDefinition {
  name: JobName;
  cron: string;
  run: () => Promise<PipelineReport>;
}

export function isJobName(value: string): value is JobName {
  return (JOB_NAMES as readonly string[]).includes(value);
}

export function createDailyJobs(
  deps: DailyJobDeps,
  crons: Record<JobName, string>
): Record<JobName, DailyJobDefinition> {
  const responderFor = (name: JobName) =>
    new ChatResponder({
      api: deps.api,
      chatId: deps.chatId,
      mode: 'scheduled',
      logger: deps.logger,
      failureText: buildScheduledFailure(name),
    });

  // A pipeline that hit an unexpected error already notified the chat;
  // rethrow so the runner records the run as failed.
  const settle = (report: PipelineReport): PipelineReport => {
    if (report.status === 'ERROR') {
      throw new Error(report.error ?? `${report.pipeline} pipeline failed`);
    }
    return report;
  };

  return {
    'daily-feargreed': {
      name: 'daily-feargreed',
      cron: crons['daily-feargreed'],
      run: async () => settle(await runOverviewPipeline(deps.pipeline, responderFor('daily-feargreed'))),
    },
    'daily-components': {
      name: 'daily-components',
      cron: crons['daily-components'],
      run: async () => settle(await runComponentsPipeline(deps.pipeline, responderFor('daily-components'))),
    },
  };
}
