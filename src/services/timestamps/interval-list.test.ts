import { describe, expect, it } from 'vitest';
import type { Interval } from '../../types/timestamp';
import { FormatError } from '../../utils/errors';
import { parseIntervalList, serializeIntervalList, sortIntervals, toRecord } from './interval-list';

const FILE = JSON.stringify([
  { start_time: '0:00:05.000', end_time: '0:00:09.500', description: 'Verse' },
  { start_time: '', end_time: '0:01:00.000', description: 'Intro' },
]);

describe('parseIntervalList', () => {
  it('parses records into millisecond intervals', () => {
    expect(parseIntervalList(FILE)).toEqual([
      { startMs: 5000, endMs: 9500, description: 'Verse' },
      { startMs: 0, endMs: 60000, description: 'Intro' },
    ]);
  });

  it('reads a missing or null description as empty text', () => {
    const json = JSON.stringify([
      { start_time: '0:00:01.000', end_time: '0:00:02.000' },
      { start_time: '0:00:03.000', end_time: '0:00:04.000', description: null },
    ]);
    expect(parseIntervalList(json).map((i) => i.description)).toEqual(['', '']);
  });

  it('ignores unknown fields', () => {
    const json = JSON.stringify([{ start_time: '', end_time: '', description: 'x', color: 'red' }]);
    expect(parseIntervalList(json)).toEqual([{ startMs: 0, endMs: 0, description: 'x' }]);
  });

  it('rejects the whole list when one time is out of range', () => {
    const json = JSON.stringify([
      { start_time: '0:00:01.000', end_time: '0:00:02.000', description: 'ok' },
      { start_time: '0:61:00.000', end_time: '0:00:02.000', description: 'bad' },
    ]);
    expect(() => parseIntervalList(json)).toThrow('Record 2: Minutes out of range in "0:61:00.000"');
  });

  it('rejects malformed JSON and wrong shapes', () => {
    expect(() => parseIntervalList('not json')).toThrow(FormatError);
    expect(() => parseIntervalList('{"start_time": ""}')).toThrow(FormatError);
    expect(() => parseIntervalList('[{"start_time": 5, "end_time": ""}]')).toThrow('Timestamp file is invalid at 0.start_time');
  });
});

describe('serializeIntervalList', () => {
  it('writes canonical records', () => {
    const intervals: Interval[] = [{ startMs: 3_723_045, endMs: 0, description: 'Chorus' }];
    expect(JSON.parse(serializeIntervalList(intervals))).toEqual([
      { start_time: '1:02:03.045', end_time: '', description: 'Chorus' },
    ]);
  });

  it('reads back what it writes', () => {
    const intervals = parseIntervalList(FILE);
    expect(parseIntervalList(serializeIntervalList(intervals))).toEqual(intervals);
  });

  it('maps one interval to one record', () => {
    expect(toRecord({ startMs: 1000, endMs: 2000, description: 'a' })).toEqual({
      start_time: '0:00:01.000',
      end_time: '0:00:02.000',
      description: 'a',
    });
  });
});

describe('sortIntervals', () => {
  const named = (startMs: number, description: string): Interval => ({ startMs, endMs: startMs + 1, description });
  const list = [named(5, 'A'), named(3, 'B'), named(5, 'C'), named(1, 'D')];

  it('sorts ascending and keeps equal starts in order', () => {
    expect(sortIntervals(list, 'ascending').map((i) => i.description)).toEqual(['D', 'B', 'A', 'C']);
  });

  it('sorts descending and keeps equal starts in order', () => {
    expect(sortIntervals(list, 'descending').map((i) => i.description)).toEqual(['A', 'C', 'B', 'D']);
  });

  it('does not reorder the input', () => {
    sortIntervals(list, 'ascending');
    expect(list.map((i) => i.description)).toEqual(['A', 'B', 'C', 'D']);
  });
});
