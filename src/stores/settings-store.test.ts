import { describe, expect, it } from 'vitest';
import type { StateStorage } from 'zustand/middleware';
import { FormatError } from '../utils/errors';
import { DEFAULT_SETTINGS, createSettingsStore, pickSettings } from './settings-store';

function memoryStorage(initial: Record<string, string> = {}): StateStorage & { data: Record<string, string> } {
  const data = { ...initial };
  return {
    data,
    getItem: (name) => data[name] ?? null,
    setItem: (name, value) => {
      data[name] = value;
    },
    removeItem: (name) => {
      delete data[name];
    },
  };
}

describe('settings store', () => {
  it('starts from defaults', () => {
    const store = createSettingsStore(memoryStorage());
    expect(pickSettings(store.getState())).toEqual(DEFAULT_SETTINGS);
  });

  it('parses and persists a setting', () => {
    const storage = memoryStorage();
    const store = createSettingsStore(storage);
    expect(store.getState().applySetting('volume', '35').ok).toBe(true);
    expect(store.getState().applySetting('persistOnSort', 'true').ok).toBe(true);

    const saved: unknown = JSON.parse(storage.data['clip-looper-settings']);
    expect(saved).toMatchObject({ state: { volume: 35, persistOnSort: true }, version: 1 });

    const reopened = createSettingsStore(storage);
    expect(reopened.getState().volume).toBe(35);
    expect(reopened.getState().persistOnSort).toBe(true);
  });

  it.each([
    ['volume', '41'],
    ['volume', 'loud'],
    ['rate', '3'],
    ['timerPeriodMs', ''],
    ['persistOnSort', 'yes'],
    ['colour', 'red'],
  ])('rejects %s=%s', (key, value) => {
    const store = createSettingsStore(memoryStorage());
    const result = store.getState().applySetting(key, value);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(FormatError);
    expect(pickSettings(store.getState())).toEqual(DEFAULT_SETTINGS);
  });

  it('ignores a stored file that does not validate', () => {
    const storage = memoryStorage({
      'clip-looper-settings': JSON.stringify({ state: { volume: 400, vlcPath: '' }, version: 1 }),
    });
    const store = createSettingsStore(storage);
    expect(pickSettings(store.getState())).toEqual(DEFAULT_SETTINGS);
  });

  it('resets to defaults', () => {
    const store = createSettingsStore(memoryStorage());
    store.getState().applySetting('vlcPath', '/opt/vlc/bin/vlc');
    store.getState().resetSettings();
    expect(store.getState().vlcPath).toBe('vlc');
  });
});
