/**
 * BOT: Delivery Pipelines
 *
 * Shared by the chat commands and the scheduled jobs:
 *   overview:   fetch -> current + history -> index chart -> caption + photo
 *   components: fetch -> per-component series -> charts -> header + albums
 *
 * An empty series never fails a response; it only drops that one chart.
 * Every invocation runs in its own artifact scope so chart files are removed
 * on every exit path.
 */

import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { withArtifactScope } from '../charts/chart.artifacts.js';
import type { ChartRenderer } from '../charts/chart.renderer.js';
import { componentChartSpec, indexChartSpec } from '../charts/feargreed.charts.js';
import { COMPONENT_KEYS, type ComponentKey } from '../feargreed/contracts/feargreed.types.js';
import type { FearGreedService } from '../feargreed/services/feargreed.service.js';
import { buildOverviewCaption, MESSAGES } from './bot.messages.js';
import type { Responder } from './bot.responder.js';

export interface PipelineDeps {
  service: Pick<FearGreedService, 'getOverview' | 'getComponents'>;
  renderer: ChartRenderer;
  chartDir: string;
  logger: Logger;
}

export type PipelineStatus = 'DELIVERED' | 'PARTIAL' | 'TEXT_ONLY' | 'NO_DATA' | 'ERROR';

export interface PipelineReport {
  pipeline: 'overview' | 'components';
  status: PipelineStatus;
  charts: number;
  failed: Array<{ key: string; code: string }>;
  error?: string;
}

// ═══════════════════════════════════════════════════════════════
// OVERVIEW
// ═══════════════════════════════════════════════════════════════

export async function runOverviewPipeline(deps: PipelineDeps, responder: Responder): Promise<PipelineReport> {
  const { logger } = deps;
  const report: PipelineReport = { pipeline: 'overview', status: 'ERROR', charts: 0, failed: [] };

  try {
    await responder.status(MESSAGES.processingOverview);

    return await withArtifactScope<PipelineReport>({ dir: deps.chartDir, prefix: `${responder.mode}_feargreed`, logger }, async (scope) => {
      const overview = await deps.service.getOverview();
      if (!overview.ok) {
        logger.error({ chatId: responder.chatId, code: overview.error.code, err: overview.error.message }, '[Overview] Current data unavailable');
        await responder.text(MESSAGES.currentUnavailable);
        return { ...report, status: 'NO_DATA', failed: [{ key: 'fear_and_greed', code: overview.error.code }] };
      }

      const { current, history } = overview.value;
      let caption = buildOverviewCaption(current, responder.mode);

      if (!history.ok || history.value.length === 0) {
        const code = history.ok ? 'EMPTY_SERIES' : history.error.code;
        logger.warn({ code }, '[Overview] No history for chart, sending text only');
        caption += MESSAGES.historyUnavailable;
        await responder.text(caption, 'Markdown');
        return { ...report, status: 'TEXT_ONLY', failed: [{ key: 'fear_and_greed_historical', code }] };
      }

      const chart = await deps.renderer.render(indexChartSpec(history.value), scope, 'feargreed');
      if (!chart.ok) {
        caption += MESSAGES.chartFailed;
        await responder.text(caption, 'Markdown');
        return { ...report, status: 'TEXT_ONLY', failed: [{ key: 'fear_and_greed_historical', code: chart.error.code }] };
      }

      caption += MESSAGES.chartFollows;
      await responder.text(caption, 'Markdown');
      await responder.photo(chart.value.path);
      return { ...report, status: 'DELIVERED', charts: 1 };
    });
  } catch (err) {
    logger.error({ chatId: responder.chatId, err: errorMessage(err) }, '[Overview] Pipeline failed');
    await responder.failure();
    return { ...report, error: errorMessage(err) };
  }
}

// ═══════════════════════════════════════════════════════════════
// COMPONENTS
// ═══════════════════════════════════════════════════════════════

export async function runComponentsPipeline(
  deps: PipelineDeps,
  responder: Responder,
  keys: readonly ComponentKey[] = COMPONENT_KEYS
): Promise<PipelineReport> {
  const { logger } = deps;
  const report: PipelineReport = { pipeline: 'components', status: 'ERROR', charts: 0, failed: [] };

  try {
    if (keys.length === 0) {
      await responder.text(MESSAGES.componentsNotConfigured);
      return { ...report, status: 'NO_DATA' };
    }

    await responder.status(MESSAGES.processingComponents);

    return await withArtifactScope<PipelineReport>({ dir: deps.chartDir, prefix: `${responder.mode}_component`, logger }, async (scope) => {
      const outcomes = await deps.service.getComponents(keys);
      if (!outcomes.ok) {
        logger.error({ chatId: responder.chatId, code: outcomes.error.code, err: outcomes.error.message }, '[Components] Fetch failed');
        await responder.text(MESSAGES.currentUnavailable);
        return { ...report, status: 'NO_DATA', failed: keys.map((key) => ({ key, code: outcomes.error.code })) };
      }

      const files: string[] = [];
      const failed: PipelineReport['failed'] = [];

      for (const { key, result } of outcomes.value) {
        if (!result.ok) {
          logger.error({ key, code: result.error.code, err: result.error.message }, '[Components] No data for component');
          failed.push({ key, code: result.error.code });
          continue;
        }
        if (result.value.series.length === 0) {
          logger.warn({ key }, '[Components] Series empty after retention window');
          failed.push({ key, code: 'EMPTY_SERIES' });
          continue;
        }

        logger.info({ key, title: result.value.info.title }, '[Components] Rendering chart');
        const chart = await deps.renderer.render(componentChartSpec(result.value), scope, key);
        if (!chart.ok) {
          failed.push({ key, code: chart.error.code });
          continue;
        }
        files.push(chart.value.path);
      }

      if (files.length === 0) {
        await responder.text(MESSAGES.componentsNone);
        return { ...report, status: 'NO_DATA', failed };
      }

      await responder.clearStatus();
      await responder.text(responder.mode === 'scheduled' ? MESSAGES.componentsHeaderScheduled : MESSAGES.componentsHeader);
      await responder.album(files);
      if (failed.length > 0) {
        await responder.text(MESSAGES.componentsPartial);
      }

      return { ...report, status: failed.length > 0 ? 'PARTIAL' : 'DELIVERED', charts: files.length, failed };
    });
  } catch (err) {
    logger.error({ chatId: responder.chatId, err: errorMessage(err) }, '[Components] Pipeline failed');
    await responder.failure();
    return { ...report, error: errorMessage(err) };
  }
}
