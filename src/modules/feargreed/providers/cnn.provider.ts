/**
 * CNN Fear & Greed Provider
 * Source: CNN dataviz graphdata endpoint (public, no key required)
 *
 * One GET per call, no retry. The body is decoded here rather than by axios so
 * that invalid JSON surfaces as a DecodeError instead of a silent string.
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { DecodeError, HttpError, NetworkError, type FetchError } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import { fail, ok, type Result } from '../../../common/result.js';
import { REQUEST_HEADERS } from '../feargreed.config.js';

export interface CnnProviderOptions {
  url: string;
  timeoutMs: number;
  logger: Logger;
  http?: AxiosInstance;
}

export class CnnFearGreedProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly options: CnnProviderOptions) {
    this.http = options.http ?? axios.create();
  }

  async fetchGraphData(): Promise<Result<unknown, FetchError>> {
    const { url, timeoutMs, logger } = this.options;
    const startMs = Date.now();

    let body: unknown;
    let status: number;
    try {
      const response = await this.http.get<unknown>(url, {
        timeout: timeoutMs,
        headers: { ...REQUEST_HEADERS },
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
      });
      body = response.data;
      status = response.status;
    } catch (error) {
      const mapped = this.mapTransportError(error);
      logger.error({ url, code: mapped.code, err: mapped.message }, '[FearGreed] Fetch failed');
      return fail(mapped);
    }

    const latencyMs = Date.now() - startMs;
    const text = typeof body === 'string' ? body : String(body ?? '');

    try {
      const document: unknown = JSON.parse(text);
      logger.info({ status, latencyMs, bytes: text.length }, '[FearGreed] Fetched graphdata');
      return ok(document);
    } catch (error) {
      const preview = text.slice(0, 200);
      logger.error({ status, latencyMs, preview }, '[FearGreed] Response is not valid JSON');
      return fail(new DecodeError(error instanceof Error ? error.message : 'invalid JSON', preview));
    }
  }

  private mapTransportError(error: unknown): NetworkError | HttpError {
    if (error instanceof AxiosError) {
      if (error.response) {
        return new HttpError(error.response.status);
      }
      return new NetworkError(error.message, error.code);
    }
    return new NetworkError(error instanceof Error ? error.message : String(error));
  }
}
