import { describe, it, expect } from 'vitest';
import { formatSrtTimeRange, formatSrtTimestamp, parseSrtTimeLine, parseSrtTimestamp } from '../src/index';

describe('parseSrtTimestamp', () => {
  it('parses fixed-width fields into milliseconds', () => {
    expect(parseSrtTimestamp('01:02:03,004')).toBe(3_723_004);
    expect(parseSrtTimestamp('00:00:00,000')).toBe(0);
  });

  it('rejects malformed values', () => {
    expect(parseSrtTimestamp('1:02:03,004')).toBeNull();
    expect(parseSrtTimestamp('00:00:03.004')).toBeNull();
    expect(parseSrtTimestamp('00:00:60,000')).toBeNull();
  });
});

describe('parseSrtTimeLine', () => {
  it('accepts optional spaces around the arrow', () => {
    expect(parseSrtTimeLine('00:00:01,000-->00:00:02,500')).toEqual({ startMs: 1000, endMs: 2500 });
    expect(parseSrtTimeLine(' 00:00:01,000  -->  00:00:02,500 ')).toEqual({ startMs: 1000, endMs: 2500 });
  });

  it('rejects lines with trailing positioning data', () => {
    expect(parseSrtTimeLine('00:00:01,000 --> 00:00:02,500 X1:10')).toBeNull();
  });
});

describe('formatSrtTimestamp', () => {
  it('zero-pads each field', () => {
    expect(formatSrtTimestamp(3_723_004)).toBe('01:02:03,004');
    expect(formatSrtTimestamp(59_999)).toBe('00:00:59,999');
  });

  it('clamps negatives and widens hours past 99', () => {
    expect(formatSrtTimestamp(-5)).toBe('00:00:00,000');
    expect(formatSrtTimestamp(100 * 3_600_000)).toBe('100:00:00,000');
  });

  it('formats a range for display', () => {
    expect(formatSrtTimeRange({ startMs: 1000, endMs: 4000 })).toBe('00:00:01,000 --> 00:00:04,000');
  });
});
