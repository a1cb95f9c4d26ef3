import { describe, expect, it } from 'vitest';
import { buildOverviewCaption, buildScheduledFailure, buildStartMessage, formatRating } from '../bot.messages.js';

describe('formatRating', () => {
  it.each([
    ['extreme_fear', 'Extreme Fear'],
    ['fear', 'Fear'],
    ['neutral', 'Neutral'],
    ['EXTREME_GREED', 'Extreme Greed'],
  ])('should turn %j into %j', (input, expected) => {
    expect(formatRating(input)).toBe(expected);
  });
});

describe('buildOverviewCaption', () => {
  it('should render score to two decimals and the formatted rating', () => {
    const caption = buildOverviewCaption({ score: 42.5, rating: 'fear', previous: {} }, 'command');

    expect(caption).toBe('📊 *CNN Fear & Greed Index Update*\n\nCurrent index: *42.50*\nSentiment: *Fear*\n\n');
  });

  it('should use the scheduled header and list the previous readings present', () => {
    const caption = buildOverviewCaption(
      { score: 71, rating: 'greed', previous: { previousClose: 69.25, previous1Year: 35 } },
      'scheduled'
    );

    expect(caption).toBe(
      '📊 *CNN Fear & Greed Index (Scheduled Update)*\n\n' +
        'Current index: *71.00*\n' +
        'Sentiment: *Greed*\n\n' +
        'Previous close: 69.25\n' +
        '1 year ago: 35.00\n\n'
    );
  });
});

describe('static messages', () => {
  it('should mention both commands in the start message', () => {
    const text = buildStartMessage();
    expect(text).toContain('/feargreed');
    expect(text).toContain('/components');
  });

  it('should name the job in the scheduled failure notice', () => {
    expect(buildScheduledFailure('daily-components')).toBe('Scheduled job daily-components failed.');
  });
});
