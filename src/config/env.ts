/**
 * Environment configuration
 *
 * Parsed once at boot and handed to every component explicitly.
 * A missing bot token or destination chat is fatal before anything starts.
 */

import { z } from 'zod';
import cron from 'node-cron';
import { ConfigError } from '../common/errors.js';

export const DEFAULT_FEARGREED_API_URL = 'https://production.dataviz.cnn.io/index/fearandgreed/graphdata';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const cronExpression = z
  .string()
  .refine((expr) => cron.validate(expr), { message: 'invalid cron expression' });

const timezone = z.string().refine(
  (tz) => {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: tz });
      return true;
    } catch {
      return false;
    }
  },
  { message: 'unknown IANA timezone' }
);

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_CHAT_ID: z.string().min(1, 'TELEGRAM_CHAT_ID is required'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HTTP_ENABLED: booleanString.default('true'),
  OPS_CRON_SECRET: z.string().min(1).optional(),

  FEARGREED_API_URL: z.string().url().default(DEFAULT_FEARGREED_API_URL),
  FEARGREED_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HISTORY_WINDOW_DAYS: z.coerce.number().int().positive().default(365),

  SCHEDULE_TIMEZONE: timezone.default('Asia/Taipei'),
  FEARGREED_CRON: cronExpression.default('0 8 * * *'),
  COMPONENTS_CRON: cronExpression.default('1 8 * * *'),

  CHART_DIR: z.string().min(1).default('.'),

  POLL_TIMEOUT_SEC: z.coerce.number().int().min(0).max(50).default(30),
  POLL_ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(5_000),
});

export type Env = Readonly<z.infer<typeof envSchema>>;

/**
 * Validate raw variables into a typed config.
 * @throws ConfigError listing every offending variable
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Empty strings in .env files mean "unset"
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.') || '(root)';
      return issue.code === 'invalid_type' && issue.received === 'undefined'
        ? `${path} is required`
        : `${path}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  return Object.freeze(parsed.data);
}
