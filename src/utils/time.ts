import { FormatError } from './errors';

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/** Format milliseconds to H:MM:SS.mmm. Zero renders as an empty string. */
export function formatTimeOffset(ms: number): string {
  if (ms === 0) return '';
  const hours = Math.floor(ms / MS_PER_HOUR);
  const mins = Math.floor((ms % MS_PER_HOUR) / MS_PER_MINUTE);
  const secs = Math.floor((ms % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = ms % MS_PER_SECOND;
  return `${hours}:${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}.${millis.toString().padStart(3, '0')}`;
}

/**
 * Parse H:MM:SS.mmm to milliseconds. Empty input is zero.
 * The millisecond field is a plain count (".5" is 5 ms) and must be below 1000.
 * Throws FormatError on malformed text or an out-of-range component.
 */
export function parseTimeOffset(input: string): number {
  const trimmed = input.trim();
  if (trimmed === '') return 0;

  const match = trimmed.match(/^(\d+):(\d+):(\d+)\.(\d+)$/);
  if (!match) throw new FormatError(input, `Expected H:MM:SS.mmm, got "${input}"`);

  const hours = parseInt(match[1], 10);
  const mins = parseInt(match[2], 10);
  const secs = parseInt(match[3], 10);
  if (mins >= 60) throw new FormatError(input, `Minutes out of range in "${input}"`);
  if (secs >= 60) throw new FormatError(input, `Seconds out of range in "${input}"`);
  const millis = parseInt(match[4], 10);
  if (millis >= MS_PER_SECOND) throw new FormatError(input, `Milliseconds out of range in "${input}"`);

  return hours * MS_PER_HOUR + mins * MS_PER_MINUTE + secs * MS_PER_SECOND + millis;
}

/** Parse the legacy MM:SS form (no hours, no milliseconds) to milliseconds. */
export function parseMinutesSeconds(input: string): number {
  const match = input.trim().match(/^(\d+):(\d+)$/);
  if (!match) throw new FormatError(input, `Expected MM:SS, got "${input}"`);
  return parseInt(match[1], 10) * MS_PER_MINUTE + parseInt(match[2], 10) * MS_PER_SECOND;
}

/** Convert milliseconds to seconds */
export function msToSec(ms: number): number {
  return ms / 1000;
}

/** Convert seconds to milliseconds */
export function secToMs(sec: number): number {
  return Math.round(sec * 1000);
}

/** Clamp a value between min and max */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
