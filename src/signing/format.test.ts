import { describe, it, expect } from 'vitest';
import { formatAmzDate, formatDateStamp, formatTimeStamp, parseAmzDate, toAmzTimestamp } from './format.js';

describe('timestamp formatting', () => {
  const date = new Date(Date.UTC(2015, 7, 30, 12, 36, 0, 987));

  it('should format the date stamp', () => {
    expect(formatDateStamp(date)).toBe('20150830');
  });

  it('should format the time stamp with a Z suffix and no milliseconds', () => {
    expect(formatTimeStamp(date)).toBe('123600Z');
  });

  it('should format x-amz-date', () => {
    expect(formatAmzDate(date)).toBe('20150830T123600Z');
    expect(toAmzTimestamp(date)).toEqual({ dateStamp: '20150830', timeStamp: '123600Z' });
  });

  it('should pad single-digit fields', () => {
    expect(formatAmzDate(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('20240102T030405Z');
  });

  it('should parse x-amz-date back to whole seconds', () => {
    expect(parseAmzDate('20150830T123600Z').getTime()).toBe(Date.UTC(2015, 7, 30, 12, 36, 0));
  });
});
