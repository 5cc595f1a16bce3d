/**
 * What the loop controller needs from the media engine. Times are absolute
 * milliseconds. Commands are fire-and-forget; the engine reports its own errors.
 */
export interface MediaPlayer {
  load: (path: string) => void;
  /** Milliseconds, 0 until the media has been parsed */
  getDuration: () => number;
  getTime: () => number;
  seek: (ms: number) => void;
  play: () => void;
  pause: () => void;
  isPlaying: () => boolean;
  getRate: () => number;
  setRate: (rate: number) => void;
  /** 0-40 */
  getVolume: () => number;
  setVolume: (volume: number) => void;
  isMuted: () => boolean;
  setMuted: (muted: boolean) => void;
  /** May fire from the engine's own event source at high frequency. Returns an unsubscribe. */
  onPositionChanged: (listener: (currentMs: number) => void) => () => void;
}

/** End bound of the armed interval; unbounded runs to the natural end. */
export type EndBound = { kind: 'bounded'; ms: number } | { kind: 'unbounded' };

export type LoopPhase =
  | { phase: 'idle' }
  | { phase: 'armed'; startMs: number; end: EndBound }
  | { phase: 'restart-pending'; startMs: number; end: EndBound };

/** Highlighted region of the progress control, as fractions of the duration */
export interface Highlight {
  start: number;
  end: number;
}
