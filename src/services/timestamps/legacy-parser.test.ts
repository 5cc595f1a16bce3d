import { describe, expect, it } from 'vitest';
import { FormatError } from '../../utils/errors';
import { parseLegacyFile, parseLegacyLine, parseLegacyLineAt } from './legacy-parser';

describe('parseLegacyLine', () => {
  it('parses MM:SS-MM:SS-description', () => {
    expect(parseLegacyLine('01:05-02:10-Intro scene')).toEqual({
      startMs: 65_000,
      endMs: 130_000,
      description: 'Intro scene',
    });
  });

  it('only splits on the first two dashes', () => {
    expect(parseLegacyLine('00:10-00:20-Call - and response\n').description).toBe('Call - and response');
  });

  it('rejects a line without two dashes', () => {
    expect(() => parseLegacyLine('00:10 00:20 nothing')).toThrow(FormatError);
    expect(() => parseLegacyLine('00:10-00:20')).toThrow(FormatError);
  });

  it('rejects times that are not MM:SS', () => {
    expect(() => parseLegacyLine('1:00:10-00:20-x')).toThrow(FormatError);
  });
});

describe('parseLegacyFile', () => {
  it('parses every non-blank line', () => {
    const content = '00:01-00:02-one\n\n00:03-00:04-two\r\n';
    expect(parseLegacyFile(content)).toEqual([
      { startMs: 1000, endMs: 2000, description: 'one' },
      { startMs: 3000, endMs: 4000, description: 'two' },
    ]);
  });

  it('names the failing line', () => {
    expect(() => parseLegacyFile('00:01-00:02-one\nbad line')).toThrow(/^Line 2: /);
  });
});

describe('parseLegacyLineAt', () => {
  const content = '00:01-00:02-one\n00:03-00:04-two\n';

  it('picks a line by its 1-based number', () => {
    expect(parseLegacyLineAt(content, 2)).toEqual({ startMs: 3000, endMs: 4000, description: 'two' });
  });

  it.each([0, 3, 1.5, NaN])('rejects timestamp number %s', (n) => {
    expect(() => parseLegacyLineAt(content, n)).toThrow(RangeError);
  });
});
