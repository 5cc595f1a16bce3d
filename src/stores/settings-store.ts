import { z } from 'zod';
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { createJSONStorage, persist } from 'zustand/middleware';
import type { StateStorage } from 'zustand/middleware';
import { DEFAULT_VOLUME, RATE_MAX, RATE_MIN, TIMER_PERIOD_MS, VOLUME_CEILING, VOLUME_MIN } from '../constants/playback';
import { FormatError, err, ok } from '../utils/errors';
import type { Result } from '../utils/errors';

export const settingsSchema = z.object({
  volume: z.number().int().min(VOLUME_MIN).max(VOLUME_CEILING),
  rate: z.number().min(RATE_MIN).max(RATE_MAX),
  timerPeriodMs: z.number().int().min(10).max(1000),
  persistOnSort: z.boolean(),
  vlcPath: z.string().min(1),
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingKey = keyof Settings;

export const DEFAULT_SETTINGS: Settings = {
  volume: DEFAULT_VOLUME,
  rate: 1,
  timerPeriodMs: TIMER_PERIOD_MS,
  persistOnSort: false,
  vlcPath: 'vlc',
};

interface SettingsState extends Settings {
  /** Parse `raw` for the given key and store it. Fails without changing anything. */
  applySetting: (key: string, raw: string) => Result<void>;
  resetSettings: () => void;
}

export type SettingsStore = StoreApi<SettingsState>;

function isSettingKey(key: string): key is SettingKey {
  return key in settingsSchema.shape;
}

function coerce(key: SettingKey, raw: string): unknown {
  switch (key) {
    case 'volume':
    case 'rate':
    case 'timerPeriodMs':
      return raw.trim() === '' ? NaN : Number(raw);
    case 'persistOnSort':
      return raw === 'true' ? true : raw === 'false' ? false : raw;
    case 'vlcPath':
      return raw;
  }
}

export function createSettingsStore(storage: StateStorage): SettingsStore {
  return createStore<SettingsState>()(
    persist(
      (set, get) => ({
        ...DEFAULT_SETTINGS,

        applySetting: (key, raw) => {
          if (!isSettingKey(key)) {
            return err(new FormatError(key, `Unknown setting "${key}"`));
          }
          const parsed = settingsSchema.safeParse({ ...pickSettings(get()), [key]: coerce(key, raw) });
          if (!parsed.success) {
            return err(new FormatError(raw, `Invalid value for ${key}: "${raw}"`));
          }
          set(parsed.data);
          return ok(undefined);
        },

        resetSettings: () => set(DEFAULT_SETTINGS),
      }),
      {
        name: 'clip-looper-settings',
        version: 1,
        storage: createJSONStorage(() => storage),
        partialize: ({ volume, rate, timerPeriodMs, persistOnSort, vlcPath }) => ({
          volume, rate, timerPeriodMs, persistOnSort, vlcPath,
        }),
        // Drop anything that does not validate instead of loading it
        merge: (persisted, current) => {
          const parsed = settingsSchema.partial().safeParse(persisted);
          return parsed.success ? { ...current, ...parsed.data } : current;
        },
      },
    ),
  );
}

export function pickSettings(state: Settings): Settings {
  const { volume, rate, timerPeriodMs, persistOnSort, vlcPath } = state;
  return { volume, rate, timerPeriodMs, persistOnSort, vlcPath };
}
