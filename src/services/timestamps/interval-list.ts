import { z } from 'zod';
import type { Interval, SortDirection, TimestampRecord } from '../../types/timestamp';
import { FormatError } from '../../utils/errors';
import { formatTimeOffset, parseTimeOffset } from '../../utils/time';

const recordSchema = z.object({
  start_time: z.string(),
  end_time: z.string(),
  description: z.string().nullish(),
});

const listSchema = z.array(recordSchema);

/** Parse one persisted record. Shares the time parser with direct text entry. */
export function parseRecord(record: z.infer<typeof recordSchema>): Interval {
  return {
    startMs: parseTimeOffset(record.start_time),
    endMs: parseTimeOffset(record.end_time),
    description: record.description ?? '',
  };
}

/**
 * Parse a persisted list (JSON text). All-or-nothing: the first bad record
 * throws FormatError and no partial list is returned.
 */
export function parseIntervalList(json: string): Interval[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new FormatError(json, 'Timestamp file is not valid JSON', { cause: e });
  }

  const parsed = listSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new FormatError(json, `Timestamp file is invalid${where ? ` at ${where}` : ''}`);
  }

  return parsed.data.map((record, i) => {
    try {
      return parseRecord(record);
    } catch (e) {
      if (e instanceof FormatError) {
        throw new FormatError(e.input, `Record ${i + 1}: ${e.message}`, { cause: e });
      }
      throw e;
    }
  });
}

export function toRecord(interval: Interval): TimestampRecord {
  return {
    start_time: formatTimeOffset(interval.startMs),
    end_time: formatTimeOffset(interval.endMs),
    description: interval.description,
  };
}

export function serializeIntervalList(intervals: Interval[]): string {
  return JSON.stringify(intervals.map(toRecord), null, 2);
}

/** Stable sort by start time. Equal starts keep their relative order in both directions. */
export function sortIntervals(intervals: Interval[], direction: SortDirection): Interval[] {
  const sign = direction === 'ascending' ? 1 : -1;
  return [...intervals].sort((a, b) => sign * (a.startMs - b.startMs));
}
