/**
 * Fear & Greed Bot: entrypoint
 *
 * Boot order: config (fatal on error) -> logger/app -> services ->
 * command polling -> cron schedule -> ops HTTP listener.
 *
 * Run: npm run build && npm start
 */

import 'dotenv/config';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { ConfigError, errorMessage } from './common/errors.js';
import { loadEnv, type Env } from './config/env.js';
import { createCommandHandlers } from './modules/bot/bot.commands.js';
import type { PipelineDeps } from './modules/bot/bot.pipelines.js';
import { SharpChartRenderer } from './modules/charts/chart.renderer.js';
import { CnnFearGreedProvider } from './modules/feargreed/providers/cnn.provider.js';
import { FearGreedService } from './modules/feargreed/services/feargreed.service.js';
import { registerOpsRoutes } from './modules/ops/ops.routes.js';
import { createDailyJobs } from './modules/scheduler/daily.jobs.js';
import { JobRunner } from './modules/scheduler/job.runner.js';
import { SchedulerService } from './modules/scheduler/scheduler.service.js';
import { TelegramBotClient } from './modules/telegram/telegram.client.js';
import { TelegramPoller } from './modules/telegram/telegram.poller.js';

export interface BotRuntime {
  app: FastifyInstance;
  poller: TelegramPoller;
  scheduler: SchedulerService;
  shutdown: () => Promise<void>;
}

export async function startBot(env: Env): Promise<BotRuntime> {
  const app = buildApp(env);
  const log = app.log;

  const provider = new CnnFearGreedProvider({
    url: env.FEARGREED_API_URL,
    timeoutMs: env.FEARGREED_HTTP_TIMEOUT_MS,
    logger: log.child({ module: 'provider' }),
  });
  const service = new FearGreedService({
    provider,
    windowDays: env.HISTORY_WINDOW_DAYS,
    logger: log.child({ module: 'feargreed' }),
  });
  const api = new TelegramBotClient({ token: env.TELEGRAM_BOT_TOKEN });
  const me = await api.getMe();
  log.info({ username: me.username }, '[BOOT] Telegram bot identified');

  const pipeline: PipelineDeps = {
    service,
    renderer: new SharpChartRenderer(log.child({ module: 'charts' })),
    chartDir: env.CHART_DIR,
    logger: log.child({ module: 'pipeline' }),
  };

  const poller = new TelegramPoller({
    api,
    handlers: createCommandHandlers({ api, pipeline, logger: log.child({ module: 'bot' }) }),
    logger: log.child({ module: 'poller' }),
    timeoutSec: env.POLL_TIMEOUT_SEC,
    errorBackoffMs: env.POLL_ERROR_BACKOFF_MS,
    ...(me.username ? { botUsername: me.username } : {}),
  });

  const runner = new JobRunner({ logger: log.child({ module: 'jobs' }) });
  const scheduler = new SchedulerService({
    jobs: createDailyJobs(
      { api, chatId: env.TELEGRAM_CHAT_ID, pipeline, logger: log.child({ module: 'scheduled' }) },
      { 'daily-feargreed': env.FEARGREED_CRON, 'daily-components': env.COMPONENTS_CRON }
    ),
    runner,
    timezone: env.SCHEDULE_TIMEZONE,
    logger: log.child({ module: 'scheduler' }),
  });

  await registerOpsRoutes(app, { scheduler, runner, secret: env.OPS_CRON_SECRET });

  log.info({ chatId: env.TELEGRAM_CHAT_ID, timezone: env.SCHEDULE_TIMEZONE }, '[BOOT] Scheduled jobs will post to chat');
  scheduler.start();
  poller.start();

  if (env.HTTP_ENABLED) {
    await app.listen({ host: env.HOST, port: env.PORT });
  } else {
    await app.ready();
  }

  const shutdown = async (): Promise<void> => {
    log.info({}, '[BOOT] Shutting down');
    scheduler.stop();
    await poller.stop();
    await app.close();
  };

  return { app, poller, scheduler, shutdown };
}

async function main(): Promise<void> {
  let env: Env;
  try {
    env = loadEnv();
  } catch (err) {
    console.error(`[BOOT] ${err instanceof ConfigError ? err.message : errorMessage(err)}`);
    process.exit(1);
  }

  const runtime = await startBot(env);

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    runtime.app.log.info({ signal }, '[BOOT] Signal received');
    runtime.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        runtime.app.log.error({ err: errorMessage(err) }, '[BOOT] Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  console.error('[BOOT] Fatal error:', err);
  process.exit(1);
});
