import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { StateStorage } from 'zustand/middleware';

export function defaultSettingsPath(): string {
  return process.env.LOOPER_SETTINGS ?? path.join(os.homedir(), '.clip-looper.json');
}

function readAll(filePath: string): Record<string, string> {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
    const entries = Object.entries(parsed).filter((e): e is [string, string] => typeof e[1] === 'string');
    return Object.fromEntries(entries);
  } catch {
    // missing or unreadable file: start from defaults
    return {};
  }
}

/** Synchronous StateStorage over one JSON file, keyed by store name */
export function createFileStorage(filePath: string = defaultSettingsPath()): StateStorage {
  const writeAll = (data: Record<string, string>) => {
    try {
      fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
    } catch (e) {
      console.warn('[Looper] Could not save settings to', filePath, e);
    }
  };

  return {
    getItem: (name) => readAll(filePath)[name] ?? null,
    setItem: (name, value) => writeAll({ ...readAll(filePath), [name]: value }),
    removeItem: (name) => {
      const data = readAll(filePath);
      delete data[name];
      writeAll(data);
    },
  };
}
