/** Base class for every recoverable failure the looper reports to callers. */
export class LooperError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed time text or an out-of-range time component. */
export class FormatError extends LooperError {
  /** The text that failed to parse */
  readonly input: string;

  constructor(input: string, message = `Time invalid: ${input}`, options?: ErrorOptions) {
    super(message, options);
    this.input = input;
  }
}

/** An interval was armed before the media duration was known. */
export class InvalidIntervalError extends LooperError {}

/** A player command was requested before media or its duration was available. */
export class NotReadyError extends LooperError {}

/** Reading or writing the persisted timestamp list failed. */
export class IOError extends LooperError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
  }
}

export type Result<T, E extends Error = LooperError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}
