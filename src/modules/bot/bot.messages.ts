/**
 * BOT: Message Templates
 *
 * Legacy Telegram Markdown (`*bold*`). Ratings arrive as snake_case labels.
 */

import type { CurrentReading } from '../feargreed/contracts/feargreed.types.js';

export type DeliveryMode = 'command' | 'scheduled';

/** "extreme_fear" -> "Extreme Fear" */
export function formatRating(rating: string): string {
  return rating
    .replace(/_/g, ' ')
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

function fmt(n: number): string {
  return n.toFixed(2);
}

export function buildStartMessage(): string {
  return [
    'Hi! I am the Fear & Greed Index bot.',
    'Use /feargreed to get the latest index value and its 12-month chart.',
    'Use /components to get charts for each of the index components.',
  ].join('\n');
}

export function buildOverviewCaption(reading: CurrentReading, mode: DeliveryMode): string {
  const header = mode === 'scheduled'
    ? '📊 *CNN Fear & Greed Index (Scheduled Update)*'
    : '📊 *CNN Fear & Greed Index Update*';

  let msg = `${header}\n\n`;
  msg += `Current index: *${fmt(reading.score)}*\n`;
  msg += `Sentiment: *${formatRating(reading.rating)}*\n\n`;

  const p = reading.previous;
  const previous = [
    p.previousClose !== undefined ? `Previous close: ${fmt(p.previousClose)}` : null,
    p.previous1Week !== undefined ? `1 week ago: ${fmt(p.previous1Week)}` : null,
    p.previous1Month !== undefined ? `1 month ago: ${fmt(p.previous1Month)}` : null,
    p.previous1Year !== undefined ? `1 year ago: ${fmt(p.previous1Year)}` : null,
  ].filter((line): line is string => line !== null);

  if (previous.length > 0) {
    msg += `${previous.join('\n')}\n\n`;
  }
  return msg;
}

export const MESSAGES = {
  processingOverview: 'Fetching data and generating the chart, please wait...',
  processingComponents: 'Fetching component data and generating charts, please wait...',
  chartFollows: 'The chart shows the trend over the past 12 months:',
  historyUnavailable: 'Historical data is unavailable, chart skipped.',
  chartFailed: 'Could not generate the index chart.',
  currentUnavailable: 'Sorry, could not fetch the current Fear & Greed Index data.',
  componentsHeader: 'Component trends over the past 12 months:',
  componentsHeaderScheduled: 'Scheduled update: component trends over the past 12 months:',
  componentsPartial: '(Some component charts could not be generated)',
  componentsNone: 'Sorry, could not fetch or generate any component chart. Please check the logs.',
  componentsNotConfigured: 'No component indicators are configured.',
  internalError: 'Sorry, an internal error occurred while handling the request.',
} as const;

export function buildScheduledFailure(jobName: string): string {
  return `Scheduled job ${jobName} failed.`;
}
