/** One loopable interval over the media. Times are milliseconds from media start. */
export interface Interval {
  startMs: number;
  endMs: number;
  description: string;
}

/** Persisted form of an Interval, times in canonical H:MM:SS.mmm text */
export interface TimestampRecord {
  start_time: string;
  end_time: string;
  description: string;
}

/** 0 = start, 1 = end, 2 = description */
export type IntervalColumn = 0 | 1 | 2;

export type SortDirection = 'ascending' | 'descending';
