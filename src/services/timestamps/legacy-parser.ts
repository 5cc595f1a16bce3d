import type { Interval } from '../../types/timestamp';
import { FormatError } from '../../utils/errors';
import { parseMinutesSeconds } from '../../utils/time';

/**
 * Parse one `MM:SS-MM:SS-description` line. Only the first two dashes
 * delimit; the description may contain more.
 */
export function parseLegacyLine(line: string): Interval {
  const first = line.indexOf('-');
  const second = first === -1 ? -1 : line.indexOf('-', first + 1);
  if (second === -1) {
    throw new FormatError(line, `Expected MM:SS-MM:SS-description, got "${line}"`);
  }
  return {
    startMs: parseMinutesSeconds(line.slice(0, first)),
    endMs: parseMinutesSeconds(line.slice(first + 1, second)),
    description: line.slice(second + 1).trim(),
  };
}

/** Parse a whole legacy file. Blank lines are skipped. */
export function parseLegacyFile(content: string): Interval[] {
  const intervals: Interval[] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((line, i) => {
    if (line.trim() === '') return;
    try {
      intervals.push(parseLegacyLine(line));
    } catch (e) {
      if (e instanceof FormatError) {
        throw new FormatError(e.input, `Line ${i + 1}: ${e.message}`, { cause: e });
      }
      throw e;
    }
  });
  return intervals;
}

/** Pick the n-th line (1-based, counting every line as the file has it). */
export function parseLegacyLineAt(content: string, lineNumber: number): Interval {
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  if (!Number.isInteger(lineNumber) || lineNumber < 1 || lineNumber > lines.length) {
    throw new RangeError(`Timestamp number ${lineNumber} is not valid`);
  }
  return parseLegacyLine(lines[lineNumber - 1]);
}
