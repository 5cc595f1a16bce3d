import type { MediaPlayer } from '../../types/player';
import { msToSec, secToMs } from '../../utils/time';

/** The parts of an HTMLMediaElement the adapter touches. A <video> element fits. */
export interface MediaElementLike {
  src: string;
  currentTime: number; // seconds
  duration: number; // seconds, NaN until metadata has loaded
  paused: boolean;
  ended: boolean;
  playbackRate: number;
  volume: number; // 0-1
  muted: boolean;
  play: () => Promise<void>;
  pause: () => void;
  load: () => void;
  addEventListener: (type: string, listener: () => void) => void;
  removeEventListener: (type: string, listener: () => void) => void;
}

/**
 * Adapt a media element to the MediaPlayer contract. Volume 0-40 maps onto
 * the element's 0-1 range as a percentage, so the ceiling is 40% loudness.
 */
export function createMediaElementPlayer(el: MediaElementLike): MediaPlayer {
  return {
    load: (path) => {
      el.pause();
      el.src = path;
      el.load();
    },
    getDuration: () => (Number.isFinite(el.duration) && el.duration > 0 ? secToMs(el.duration) : 0),
    getTime: () => secToMs(el.currentTime),
    seek: (ms) => {
      el.currentTime = msToSec(ms);
    },
    play: () => {
      void el.play().catch((err: unknown) => {
        // AbortError is expected when toggling play/pause quickly, so it is not logged
        if (!(err instanceof Error && err.name === 'AbortError')) {
          console.warn('[Looper] play() rejected:', err);
        }
      });
    },
    pause: () => el.pause(),
    isPlaying: () => !el.paused && !el.ended,
    getRate: () => el.playbackRate,
    setRate: (rate) => {
      el.playbackRate = rate;
    },
    getVolume: () => Math.round(el.volume * 100),
    setVolume: (volume) => {
      el.volume = volume / 100;
    },
    isMuted: () => el.muted,
    setMuted: (muted) => {
      el.muted = muted;
    },
    onPositionChanged: (listener) => {
      const onTimeUpdate = () => listener(secToMs(el.currentTime));
      el.addEventListener('timeupdate', onTimeUpdate);
      return () => el.removeEventListener('timeupdate', onTimeUpdate);
    },
  };
}
