import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../common/errors.js';
import { DEFAULT_FEARGREED_API_URL, loadEnv } from '../env.js';

const REQUIRED = { TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '12345' };

function configIssues(source: NodeJS.ProcessEnv): string[] {
  try {
    loadEnv(source);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('loadEnv', () => {
  it('should apply defaults around the required variables', () => {
    const env = loadEnv(REQUIRED);

    expect(env).toMatchObject({
      TELEGRAM_BOT_TOKEN: 'test-token',
      TELEGRAM_CHAT_ID: '12345',
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      PORT: 8080,
      HTTP_ENABLED: true,
      FEARGREED_API_URL: DEFAULT_FEARGREED_API_URL,
      FEARGREED_HTTP_TIMEOUT_MS: 15000,
      HISTORY_WINDOW_DAYS: 365,
      SCHEDULE_TIMEZONE: 'Asia/Taipei',
      FEARGREED_CRON: '0 8 * * *',
      COMPONENTS_CRON: '1 8 * * *',
      CHART_DIR: '.',
      POLL_TIMEOUT_SEC: 30,
    });
    expect(env.OPS_CRON_SECRET).toBeUndefined();
    expect(Object.isFrozen(env)).toBe(true);
  });

  it('should fail when the bot token and chat are missing', () => {
    expect(() => loadEnv({})).toThrow(ConfigError);
    expect(configIssues({})).toEqual(['TELEGRAM_BOT_TOKEN is required', 'TELEGRAM_CHAT_ID is required']);
  });

  it('should treat blank values as unset', () => {
    expect(configIssues({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '   ' })).toEqual([
      'TELEGRAM_CHAT_ID is required',
    ]);
  });

  it('should coerce numbers and booleans', () => {
    const env = loadEnv({ ...REQUIRED, PORT: '9090', HTTP_ENABLED: '0', HISTORY_WINDOW_DAYS: '30' });

    expect(env.PORT).toBe(9090);
    expect(env.HTTP_ENABLED).toBe(false);
    expect(env.HISTORY_WINDOW_DAYS).toBe(30);
  });

  it('should reject an invalid cron expression and timezone', () => {
    expect(configIssues({ ...REQUIRED, FEARGREED_CRON: 'every morning', SCHEDULE_TIMEZONE: 'Mars/Olympus' })).toEqual([
      'SCHEDULE_TIMEZONE: unknown IANA timezone',
      'FEARGREED_CRON: invalid cron expression',
    ]);
  });

  it('should list every problem in one error message', () => {
    expect(() => loadEnv({ TELEGRAM_CHAT_ID: '1', PORT: 'http' })).toThrow(
      'Invalid configuration:\n  - TELEGRAM_BOT_TOKEN is required\n  - PORT: Expected number, received nan'
    );
  });
});
