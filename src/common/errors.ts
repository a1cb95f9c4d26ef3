/**
 * Error taxonomy
 *
 * Every failure the bot can hit carries a stable `code` (logged and returned by
 * the ops API) and an HTTP status used by the Fastify error handler.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// FETCH
// ═══════════════════════════════════════════════════════════════

export class NetworkError extends AppError {
  constructor(message: string, readonly causeCode?: string) {
    super('NETWORK_ERROR', message, 502);
  }
}

export class HttpError extends AppError {
  constructor(readonly status: number, message = `Upstream responded with HTTP ${status}`) {
    super('HTTP_ERROR', message, 502);
  }
}

export class DecodeError extends AppError {
  constructor(message: string, readonly bodyPreview: string) {
    super('DECODE_ERROR', message, 502);
  }
}

export type FetchError = NetworkError | HttpError | DecodeError;

// ═══════════════════════════════════════════════════════════════
// PAYLOAD SHAPE
// ═══════════════════════════════════════════════════════════════

export class MissingKeyError extends AppError {
  constructor(readonly key: string) {
    super('MISSING_KEY', `Payload is missing top-level key '${key}'`, 502);
  }
}

export class ShapeError extends AppError {
  constructor(readonly key: string, detail: string, readonly received?: string) {
    super('SHAPE_ERROR', `Unexpected shape under '${key}': ${detail}`, 502);
  }
}

export class EmptyError extends AppError {
  constructor(readonly key: string, detail = 'no data points') {
    super('EMPTY_SERIES', `Series '${key}' is empty: ${detail}`, 502);
  }
}

export class MissingFieldError extends AppError {
  constructor(readonly key: string, readonly field: string, detail = 'missing or null') {
    super('MISSING_FIELD', `Field '${key}.${field}' is ${detail}`, 502);
  }
}

export type ExtractError = MissingKeyError | ShapeError | EmptyError;
export type ReadError = MissingKeyError | MissingFieldError;

// ═══════════════════════════════════════════════════════════════
// RENDER / DELIVERY / BOOT
// ═══════════════════════════════════════════════════════════════

export class RenderError extends AppError {
  constructor(message: string) {
    super('RENDER_ERROR', message, 500);
  }
}

export class TelegramApiError extends AppError {
  constructor(readonly method: string, readonly status: number, readonly description: string) {
    super('TELEGRAM_API_ERROR', `Telegram ${method} failed (${status}): ${description}`, 502);
  }
}

export class ConfigError extends AppError {
  constructor(readonly issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
