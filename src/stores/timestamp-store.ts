import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { Interval, IntervalColumn } from '../types/timestamp';
import type { TimestampSource } from '../services/file-system/timestamp-source';
import { parseIntervalList, serializeIntervalList, sortIntervals } from '../services/timestamps/interval-list';
import { parseLegacyFile } from '../services/timestamps/legacy-parser';
import { TIMESTAMP_HEADERS } from '../constants/playback';
import { FormatError, LooperError, err, ok } from '../utils/errors';
import type { Result } from '../utils/errors';
import { formatTimeOffset, parseTimeOffset } from '../utils/time';

export interface TimestampStoreOptions {
  source?: TimestampSource | null;
  /** Write the list back after sort(). Off by default. */
  persistOnSort?: boolean;
}

export interface TimestampState {
  intervals: Interval[];
  /** Where edits are written through to. Null for in-memory or legacy lists. */
  source: TimestampSource | null;
  persistOnSort: boolean;
  /** Payload of the most recent failed load or edit, cleared by the next success */
  lastError: LooperError | null;

  load: (source: TimestampSource) => Result<Interval[]>;
  /** Load the read-only MM:SS-MM:SS-description format. Edits are not written back. */
  loadLegacy: (source: TimestampSource) => Result<Interval[]>;

  rowCount: () => number;
  columnCount: () => number;
  headerAt: (column: number) => string;
  /** Milliseconds for columns 0/1, description text for column 2 */
  valueAt: (row: number, column: number) => number | string;
  displayAt: (row: number, column: number) => string;

  setValue: (row: number, column: number, text: string) => Result<void>;
  append: (interval: Interval) => Result<void>;
  sort: (descending: boolean) => Result<void>;
  setPersistOnSort: (persist: boolean) => void;
}

export type TimestampStore = StoreApi<TimestampState>;

function isColumn(column: number): column is IntervalColumn {
  return column === 0 || column === 1 || column === 2;
}

function isTimeOffset(ms: number): boolean {
  return Number.isInteger(ms) && ms >= 0;
}

function checkCell(intervals: Interval[], row: number, column: number): IntervalColumn {
  if (!Number.isInteger(row) || row < 0 || row >= intervals.length) {
    throw new RangeError(`Row ${row} out of range (0-${intervals.length - 1})`);
  }
  if (!isColumn(column)) {
    throw new RangeError(`Column ${column} out of range (0-2)`);
  }
  return column;
}

function withField(interval: Interval, column: IntervalColumn, text: string): Interval {
  switch (column) {
    case 0:
      return { ...interval, startMs: parseTimeOffset(text) };
    case 1:
      return { ...interval, endMs: parseTimeOffset(text) };
    case 2:
      return { ...interval, description: text };
  }
}

function toLooperError(e: unknown): LooperError {
  if (e instanceof LooperError) return e;
  return new LooperError(e instanceof Error ? e.message : String(e), { cause: e });
}

export function createTimestampStore(options: TimestampStoreOptions = {}): TimestampStore {
  return createStore<TimestampState>()((set, get) => {
    /** Write `next` through to the source (if any), then commit it. Nothing changes on failure. */
    const commit = (next: Interval[], persist: boolean): Result<void> => {
      const { source } = get();
      if (persist && source) {
        try {
          source.write(serializeIntervalList(next));
        } catch (e) {
          const error = toLooperError(e);
          console.error('[Looper] Write-through failed:', error.message);
          set({ lastError: error });
          return err(error);
        }
      }
      set({ intervals: next, lastError: null });
      return ok(undefined);
    };

    const loadWith = (
      source: TimestampSource,
      parse: (content: string) => Interval[],
      writable: boolean,
    ): Result<Interval[]> => {
      try {
        const intervals = parse(source.read());
        set({ intervals, source: writable ? source : null, lastError: null });
        return ok(intervals);
      } catch (e) {
        const error = toLooperError(e);
        set({ lastError: error });
        return err(error);
      }
    };

    return {
      intervals: [],
      source: options.source ?? null,
      persistOnSort: options.persistOnSort ?? false,
      lastError: null,

      load: (source) => loadWith(source, parseIntervalList, true),
      loadLegacy: (source) => loadWith(source, parseLegacyFile, false),

      rowCount: () => get().intervals.length,
      columnCount: () => TIMESTAMP_HEADERS.length,
      headerAt: (column) => {
        if (!isColumn(column)) throw new RangeError(`Column ${column} out of range (0-2)`);
        return TIMESTAMP_HEADERS[column];
      },

      valueAt: (row, column) => {
        const { intervals } = get();
        const col = checkCell(intervals, row, column);
        const interval = intervals[row];
        return col === 0 ? interval.startMs : col === 1 ? interval.endMs : interval.description;
      },

      displayAt: (row, column) => {
        const value = get().valueAt(row, column);
        return typeof value === 'number' ? formatTimeOffset(value) : value;
      },

      setValue: (row, column, text) => {
        const { intervals } = get();
        const col = checkCell(intervals, row, column);
        let updated: Interval;
        try {
          updated = withField(intervals[row], col, text);
        } catch (e) {
          const error = e instanceof FormatError ? new FormatError(text, `Time invalid: ${text}`, { cause: e }) : toLooperError(e);
          set({ lastError: error });
          return err(error);
        }
        return commit(
          intervals.map((interval, i) => (i === row ? updated : interval)),
          true,
        );
      },

      append: (interval) => {
        const bad = [interval.startMs, interval.endMs].find((ms) => !isTimeOffset(ms));
        if (bad !== undefined) {
          const error = new FormatError(String(bad));
          set({ lastError: error });
          return err(error);
        }
        return commit([...get().intervals, { ...interval }], true);
      },

      sort: (descending) => {
        const { intervals, persistOnSort } = get();
        return commit(sortIntervals(intervals, descending ? 'descending' : 'ascending'), persistOnSort);
      },

      setPersistOnSort: (persist) => set({ persistOnSort: persist }),
    };
  });
}

export interface EditListeners {
  /** Called after every successful load, edit, append or sort */
  onChange?: (intervals: Interval[]) => void;
  /** Called with the payload of every failed load or edit */
  onError?: (error: LooperError) => void;
}

/** Subscribe to list changes and failures only (not option toggles). */
export function subscribeToEdits(store: TimestampStore, listeners: EditListeners): () => void {
  return store.subscribe((state, prev) => {
    if (state.intervals !== prev.intervals) listeners.onChange?.(state.intervals);
    if (state.lastError && state.lastError !== prev.lastError) listeners.onError?.(state.lastError);
  });
}
