import type { LoopController } from '../../stores/loop-store';
import { TIMER_PERIOD_MS } from '../../constants/playback';
import { NotReadyError } from '../../utils/errors';

/** Drive controller.tick() on a fixed period. Returns a stop function. */
export function startTicker(controller: LoopController, periodMs = TIMER_PERIOD_MS): () => void {
  const handle = setInterval(() => controller.getState().tick(), periodMs);
  return () => clearInterval(handle);
}

/**
 * Resolve with the media duration once a tick has published it. The player
 * reports 0 until it has parsed the media, so callers wait here before arming.
 */
export function waitForDuration(controller: LoopController, timeoutMs: number): Promise<number> {
  const current = controller.getState().durationMs;
  if (current > 0) return Promise.resolve(current);

  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      unsub();
      reject(new NotReadyError('Cannot play this media file'));
    }, timeoutMs);
    const unsub = controller.subscribe((state) => {
      if (state.durationMs > 0) {
        clearTimeout(timer);
        unsub();
        resolve(state.durationMs);
      }
    });
  });
}
