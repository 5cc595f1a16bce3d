import { vi } from 'vitest';
import type { MediaPlayer } from '../types/player';

interface FakePlayerState {
  durationMs: number;
  timeMs: number;
  playing: boolean;
  rate: number;
  volume: number;
  muted: boolean;
  path: string | null;
}

/** In-process MediaPlayer double. Commands are vi.fn spies; state is plain fields. */
export function createFakePlayer(durationMs = 60000) {
  const listeners = new Set<(currentMs: number) => void>();
  const state: FakePlayerState = {
    durationMs,
    timeMs: 0,
    playing: false,
    rate: 1,
    volume: 0,
    muted: false,
    path: null,
  };

  const player = {
    state,
    load: vi.fn((path: string) => {
      state.path = path;
      state.timeMs = 0;
      state.playing = false;
    }),
    getDuration: () => state.durationMs,
    getTime: () => state.timeMs,
    seek: vi.fn((ms: number) => {
      state.timeMs = ms;
    }),
    play: vi.fn(() => {
      state.playing = true;
    }),
    pause: vi.fn(() => {
      state.playing = false;
    }),
    isPlaying: () => state.playing,
    getRate: () => state.rate,
    setRate: vi.fn((rate: number) => {
      state.rate = rate;
    }),
    getVolume: () => state.volume,
    setVolume: vi.fn((volume: number) => {
      state.volume = volume;
    }),
    isMuted: () => state.muted,
    setMuted: vi.fn((muted: boolean) => {
      state.muted = muted;
    }),
    onPositionChanged: (listener: (currentMs: number) => void) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    /** Simulate the engine reporting a new position */
    emitPosition: (ms: number) => {
      state.timeMs = ms;
      listeners.forEach((listener) => listener(ms));
    },
    listenerCount: () => listeners.size,
  } satisfies MediaPlayer & Record<string, unknown>;

  return player;
}
