import { describe, expect, it } from 'vitest';
import { FormatError } from './errors';
import { clamp, formatTimeOffset, msToSec, parseMinutesSeconds, parseTimeOffset, secToMs } from './time';

describe('formatTimeOffset', () => {
  it('renders zero as an empty string', () => {
    expect(formatTimeOffset(0)).toBe('');
  });

  it('renders H:MM:SS.mmm', () => {
    expect(formatTimeOffset(3_723_045)).toBe('1:02:03.045');
    expect(formatTimeOffset(1)).toBe('0:00:00.001');
    expect(formatTimeOffset(59_999)).toBe('0:00:59.999');
  });

  it('does not wrap hours', () => {
    expect(formatTimeOffset(30 * 3_600_000)).toBe('30:00:00.000');
  });
});

describe('parseTimeOffset', () => {
  it('parses canonical text', () => {
    expect(parseTimeOffset('1:02:03.045')).toBe(3_723_045);
    expect(parseTimeOffset('0:00:00.000')).toBe(0);
  });

  it('treats empty and blank text as zero', () => {
    expect(parseTimeOffset('')).toBe(0);
    expect(parseTimeOffset('   ')).toBe(0);
  });

  it('reads the millisecond field as a count of milliseconds', () => {
    expect(parseTimeOffset('0:00:01.5')).toBe(1005);
    expect(parseTimeOffset('0:00:01.05')).toBe(1005);
    expect(parseTimeOffset('0:00:00.0100')).toBe(100);
  });

  it('round-trips through format', () => {
    for (const ms of [0, 1, 999, 1000, 61_001, 3_599_999, 3_723_045, 45_296_789, 86_399_999]) {
      expect(parseTimeOffset(formatTimeOffset(ms))).toBe(ms);
    }
  });

  it.each(['1:60:00.000', '1:00:60.000', '1:00:00.1000', '-1:00:00.000', '1:00:00', 'abc', '1:00:00.'])(
    'rejects %s',
    (input) => {
      expect(() => parseTimeOffset(input)).toThrow(FormatError);
    },
  );

  it('keeps the offending text on the error', () => {
    try {
      parseTimeOffset('1:60:00.000');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(FormatError);
      expect(e instanceof FormatError && e.input).toBe('1:60:00.000');
    }
  });
});

describe('parseMinutesSeconds', () => {
  it('parses MM:SS', () => {
    expect(parseMinutesSeconds('01:05')).toBe(65_000);
    expect(parseMinutesSeconds(' 2:10 ')).toBe(130_000);
  });

  it('rejects other shapes', () => {
    expect(() => parseMinutesSeconds('1:02:03')).toThrow(FormatError);
    expect(() => parseMinutesSeconds('')).toThrow(FormatError);
  });
});

describe('conversions', () => {
  it('converts between seconds and milliseconds', () => {
    expect(msToSec(1500)).toBe(1.5);
    expect(secToMs(2.25)).toBe(2250);
  });

  it('clamps', () => {
    expect(clamp(50, 0, 40)).toBe(40);
    expect(clamp(-1, 0, 40)).toBe(0);
    expect(clamp(12, 0, 40)).toBe(12);
  });
});
