import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { Highlight, LoopPhase, MediaPlayer } from '../types/player';
import type { Interval } from '../types/timestamp';
import { DEFAULT_VOLUME, RATE_MAX, RATE_MIN, RATE_STEP, VOLUME_CEILING, VOLUME_MIN } from '../constants/playback';
import { InvalidIntervalError, NotReadyError, err, ok } from '../utils/errors';
import type { Result } from '../utils/errors';
import { clamp } from '../utils/time';

export interface LoopControllerOptions {
  volume?: number;
  rate?: number;
}

export interface LoopState {
  loop: LoopPhase;
  mediaPath: string | null;
  /** Playback has been started for the current media (play/pause toggles from here on) */
  started: boolean;
  playing: boolean;
  positionMs: number;
  durationMs: number;
  /** Position as a fraction of the duration, published on every tick */
  progress: number;
  highlight: Highlight | null;
  volume: number;
  rate: number;
  muted: boolean;

  loadMedia: (path: string) => void;
  arm: (interval: Interval, mediaDurationMs: number) => Result<void>;
  /** Arm the selection (or go unbounded for null), seek to its start and play */
  start: (selection: Interval | null) => Result<void>;
  playPause: (selection: Interval | null) => Result<void>;
  /** Position notification hook. Only flags a restart; never talks to the player. */
  onPositionChanged: (currentMs: number) => void;
  /** Periodic step: performs a pending restart and publishes position */
  tick: () => void;
  /** Jump to a fraction of the duration. Drops the armed end bound. */
  scrub: (fraction: number) => Result<void>;
  setVolume: (volume: number) => void;
  modifyVolume: (delta: number) => void;
  modifyRate: (delta: number) => void;
  speedUp: () => void;
  slowDown: () => void;
  toggleMute: () => void;
  /** Detach from the player's position notifications */
  dispose: () => void;
}

export type LoopController = StoreApi<LoopState>;

const IDLE: LoopPhase = { phase: 'idle' };

function computeHighlight(startMs: number, endMs: number, durationMs: number): Highlight | null {
  if (!startMs || !endMs || startMs >= endMs) return null;
  return { start: startMs / durationMs, end: endMs / durationMs };
}

export function createLoopController(player: MediaPlayer, options: LoopControllerOptions = {}): LoopController {
  let unsubscribe: (() => void) | null = null;

  const store = createStore<LoopState>()((set, get) => ({
    loop: IDLE,
    mediaPath: null,
    started: false,
    playing: false,
    positionMs: 0,
    durationMs: 0,
    progress: 0,
    highlight: null,
    volume: clamp(options.volume ?? DEFAULT_VOLUME, VOLUME_MIN, VOLUME_CEILING),
    rate: options.rate ?? 1,
    muted: false,

    loadMedia: (path) => {
      player.load(path);
      player.setVolume(get().volume);
      player.setRate(get().rate);
      set({
        mediaPath: path,
        started: false,
        playing: false,
        loop: IDLE,
        highlight: null,
        positionMs: 0,
        durationMs: player.getDuration(),
        progress: 0,
      });
    },

    arm: (interval, mediaDurationMs) => {
      if (!Number.isFinite(mediaDurationMs) || mediaDurationMs <= 0) {
        return err(new InvalidIntervalError('Media duration is not known yet'));
      }
      // end <= start is armed as-is: it restarts on every tick once the position passes end
      set({
        loop: { phase: 'armed', startMs: interval.startMs, end: { kind: 'bounded', ms: interval.endMs } },
        highlight: computeHighlight(interval.startMs, interval.endMs, mediaDurationMs),
      });
      return ok(undefined);
    },

    start: (selection) => {
      if (!get().mediaPath) return err(new NotReadyError('No video file chosen'));
      if (selection) {
        const armed = get().arm(selection, player.getDuration());
        if (!armed.ok) return armed;
      } else {
        set({ loop: IDLE, highlight: null });
      }
      player.seek(selection ? selection.startMs : 0);
      player.play();
      set({ started: true, playing: true });
      return ok(undefined);
    },

    playPause: (selection) => {
      const { mediaPath, started, playing } = get();
      if (!mediaPath) return err(new NotReadyError('No video file chosen'));
      if (!started) return get().start(selection);
      if (playing) player.pause();
      else player.play();
      set({ playing: !playing });
      return ok(undefined);
    },

    onPositionChanged: (currentMs) => {
      const { loop } = get();
      if (loop.phase !== 'armed' || loop.end.kind !== 'bounded') return;
      if (currentMs > loop.end.ms) {
        set({ loop: { phase: 'restart-pending', startMs: loop.startMs, end: loop.end } });
      }
    },

    tick: () => {
      const { loop } = get();
      if (loop.phase === 'restart-pending') {
        // Seeking from inside the position callback stalls some engines, so it happens here
        player.seek(loop.startMs);
        set({ loop: { phase: 'armed', startMs: loop.startMs, end: loop.end } });
      }

      const durationMs = player.getDuration();
      const positionMs = player.getTime();
      const progress = durationMs > 0 ? clamp(positionMs / durationMs, 0, 1) : 0;
      const { started, playing } = get();
      if (started && playing && !player.isPlaying()) {
        // Reached the natural end (or the engine stopped on its own)
        set({ positionMs, durationMs, progress, started: false, playing: false, loop: IDLE });
        return;
      }
      set({ positionMs, durationMs, progress });
    },

    scrub: (fraction) => {
      const durationMs = player.getDuration();
      if (!get().mediaPath || durationMs <= 0) return err(new NotReadyError('Media is not ready'));
      player.seek(Math.round(clamp(fraction, 0, 1) * durationMs));
      const { loop } = get();
      if (loop.phase !== 'idle') {
        set({ loop: { phase: 'armed', startMs: loop.startMs, end: { kind: 'unbounded' } } });
      }
      return ok(undefined);
    },

    setVolume: (volume) => {
      const next = clamp(Math.round(volume), VOLUME_MIN, VOLUME_CEILING);
      player.setVolume(next);
      set({ volume: next });
    },

    modifyVolume: (delta) => get().setVolume(get().volume + delta),

    modifyRate: (delta) => {
      const next = Math.round((get().rate + delta) * 10) / 10;
      if (next < RATE_MIN || next > RATE_MAX) return;
      player.setRate(next);
      set({ rate: next });
    },

    speedUp: () => get().modifyRate(RATE_STEP),
    slowDown: () => get().modifyRate(-RATE_STEP),

    toggleMute: () => {
      const muted = !get().muted;
      player.setMuted(muted);
      set({ muted });
    },

    dispose: () => {
      unsubscribe?.();
      unsubscribe = null;
    },
  }));

  unsubscribe = player.onPositionChanged((currentMs) => store.getState().onPositionChanged(currentMs));
  return store;
}
