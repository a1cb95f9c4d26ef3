/**
 * Narrow logger contract.
 *
 * Fastify's pino instance (`app.log`) satisfies it; tests pass `vi.fn()` stubs.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug: (obj: object, msg?: string) => void;
}
