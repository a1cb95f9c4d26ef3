/**
 * Fear & Greed Service
 *
 * Fetches the graphdata document once per invocation and derives everything
 * the pipelines need from that single snapshot.
 */

import type { ExtractError, FetchError, ReadError } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { fail, ok, type Result } from '../../../common/result.js';
import {
  COMPONENT_KEYS,
  HISTORICAL_KEY,
  type ComponentKey,
  type ComponentSeries,
  type CurrentReading,
  type Series,
} from '../contracts/feargreed.types.js';
import { COMPONENTS_INFO } from '../feargreed.config.js';
import type { CnnFearGreedProvider } from '../providers/cnn.provider.js';
import { readCurrent } from './current.reader.js';
import { extractSeries } from './series.extractor.js';
import { normalizeSeries } from './series.normalizer.js';

export interface FearGreedServiceOptions {
  provider: Pick<CnnFearGreedProvider, 'fetchGraphData'>;
  windowDays: number;
  logger: Logger;
  clock?: () => Date;
}

/** Result of one series lookup inside a fetched snapshot */
export type SeriesResult = Result<Series, ExtractError>;

export interface Snapshot {
  readonly document: unknown;
  readonly fetchedAt: Date;
}

export interface Overview {
  current: CurrentReading;
  history: SeriesResult;
}

export interface ComponentOutcome {
  key: ComponentKey;
  result: Result<ComponentSeries, ExtractError>;
}

export class FearGreedService {
  private readonly clock: () => Date;

  constructor(private readonly options: FearGreedServiceOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async fetchSnapshot(): Promise<Result<Snapshot, FetchError>> {
    const fetched = await this.options.provider.fetchGraphData();
    if (!fetched.ok) return fetched;
    return ok({ document: fetched.value, fetchedAt: this.clock() });
  }

  readCurrent(snapshot: Snapshot): Result<CurrentReading, ReadError> {
    return readCurrent(snapshot.document, this.options.logger);
  }

  series(snapshot: Snapshot, key: string): SeriesResult {
    const { logger, windowDays } = this.options;
    const raw = extractSeries(snapshot.document, key, logger);
    if (!raw.ok) return raw;

    const series = normalizeSeries(raw.value, { windowDays, now: snapshot.fetchedAt }, logger);
    logger.info({ key, points: series.length }, '[FearGreed] Series ready');
    return ok(series);
  }

  /** Current reading plus composite history; a history failure is carried, not raised */
  async getOverview(): Promise<Result<Overview, FetchError | ReadError>> {
    const snapshot = await this.fetchSnapshot();
    if (!snapshot.ok) return snapshot;

    const current = this.readCurrent(snapshot.value);
    if (!current.ok) return current;

    return ok({ current: current.value, history: this.series(snapshot.value, HISTORICAL_KEY) });
  }

  async getComponents(keys: readonly ComponentKey[] = COMPONENT_KEYS): Promise<Result<ComponentOutcome[], FetchError>> {
    const snapshot = await this.fetchSnapshot();
    if (!snapshot.ok) return fail(snapshot.error);

    return ok(
      keys.map((key) => {
        const series = this.series(snapshot.value, key);
        return {
          key,
          result: series.ok ? ok({ key, info: COMPONENTS_INFO[key], series: series.value }) : series,
        };
      })
    );
  }
}
