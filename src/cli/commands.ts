import fs from 'node:fs';
import { parseArgs } from 'node:util';
import type { StateStorage } from 'zustand/middleware';
import { createSettingsStore, pickSettings } from '../stores/settings-store';
import type { Settings } from '../stores/settings-store';
import { createTimestampStore } from '../stores/timestamp-store';
import type { TimestampStore } from '../stores/timestamp-store';
import { createLoopController } from '../stores/loop-store';
import { createFileSource } from '../services/file-system/timestamp-source';
import { createFileStorage } from '../services/file-system/settings-storage';
import { findCompanionVideo } from '../services/file-system/companion-finder';
import { parseLegacyLineAt } from '../services/timestamps/legacy-parser';
import { startTicker, waitForDuration } from '../services/playback/ticker';
import { createVlcRcPlayer } from '../services/player/vlc-rc-player';
import type { VlcRcPlayer } from '../services/player/vlc-rc-player';
import { launchVlcLoop } from '../services/player/vlc-launcher';
import type { Interval } from '../types/timestamp';
import { IOError, LooperError } from '../utils/errors';
import { formatTimeOffset, parseTimeOffset } from '../utils/time';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  io: CliIo;
  settingsStorage: StateStorage;
  createPlayer: (settings: Settings) => VlcRcPlayer;
  launchLoop: (videoPath: string, interval: Interval, vlcPath: string) => Promise<number | null>;
  /** Resolves when an interactive loop should end */
  waitForStop: () => Promise<void>;
  /** How long to wait for the player to report the media duration */
  readyTimeoutMs: number;
}

export const USAGE = [
  'Usage: clip-looper <command> [options]',
  '',
  '  list <file>                          Show the timestamps in a file',
  '  set <file> <row> <column> <text>     Edit one cell (column: start, end, description)',
  '  add <file> <start> <end> [text...]   Append a timestamp',
  '  sort <file> [--desc] [--save]        Sort by start time',
  '  loop <file> <row> [--video <path>]   Loop one timestamp in VLC',
  '  legacy <video> <file> <n>            Loop line n of a MM:SS-MM:SS-description file',
  '  config [<key> <value>]               Show or change settings',
].join('\n');

const COLUMN_NAMES: Record<string, number> = { start: 0, end: 1, description: 2 };

function defaultDeps(): CliDeps {
  return {
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
    },
    settingsStorage: createFileStorage(),
    createPlayer: (settings) => createVlcRcPlayer({ vlcPath: settings.vlcPath }),
    launchLoop: (videoPath, interval, vlcPath) => launchVlcLoop(videoPath, interval, { vlcPath }),
    waitForStop: () => new Promise((resolve) => process.once('SIGINT', () => resolve())),
    readyTimeoutMs: 10000,
  };
}

class UsageError extends LooperError {}

function isParseArgsError(e: unknown): e is Error {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' && e.code.startsWith('ERR_PARSE_ARGS');
}

function parseRow(raw: string | undefined, store: TimestampStore): number {
  const row = Number(raw);
  const count = store.getState().rowCount();
  if (!Number.isInteger(row) || row < 1 || row > count) {
    throw new UsageError(`Row must be between 1 and ${count}, got "${raw ?? ''}"`);
  }
  return row - 1;
}

function parseColumn(raw: string | undefined): number {
  const column = raw === undefined ? undefined : COLUMN_NAMES[raw] ?? Number(raw);
  if (column !== 0 && column !== 1 && column !== 2) {
    throw new UsageError(`Column must be start, end or description, got "${raw ?? ''}"`);
  }
  return column;
}

function required(value: string | undefined, name: string): string {
  if (value === undefined) throw new UsageError(`Missing <${name}>\n\n${USAGE}`);
  return value;
}

function openStore(file: string, persistOnSort: boolean, createIfMissing = false): TimestampStore {
  const source = createFileSource(file);
  const store = createTimestampStore({ source, persistOnSort });
  if (createIfMissing && !fs.existsSync(file)) return store;
  const loaded = store.getState().load(source);
  if (!loaded.ok) throw loaded.error;
  return store;
}

export function formatRows(store: TimestampStore): string[] {
  const state = store.getState();
  const header = ['#', state.headerAt(0), state.headerAt(1), state.headerAt(2)].join('\t');
  const rows = state.intervals.map((_, row) =>
    [String(row + 1), state.displayAt(row, 0), state.displayAt(row, 1), state.displayAt(row, 2)].join('\t'),
  );
  return [header, ...rows];
}

export function describeInterval(interval: Interval): string {
  const start = formatTimeOffset(interval.startMs) || '0:00:00.000';
  const end = formatTimeOffset(interval.endMs) || '0:00:00.000';
  return interval.description ? `${start} - ${end} (${interval.description})` : `${start} - ${end}`;
}

async function runLoop(file: string, rowArg: string | undefined, videoArg: string | undefined, settings: Settings, deps: CliDeps): Promise<number> {
  const store = openStore(file, settings.persistOnSort);
  const row = parseRow(rowArg, store);
  const interval = store.getState().intervals[row];
  const video = videoArg ?? findCompanionVideo(file);
  if (!video) throw new UsageError('No video file chosen (pass --video)');
  if (!fs.existsSync(video)) throw new IOError(video, `Cannot access video file ${video}`);

  const player = deps.createPlayer(settings);
  const controller = createLoopController(player, { volume: settings.volume, rate: settings.rate });
  const stopTicker = startTicker(controller, settings.timerPeriodMs);
  try {
    controller.getState().loadMedia(video);
    // Playing unbounded first lets the player report the duration that arming needs
    const begun = controller.getState().playPause(null);
    if (!begun.ok) throw begun.error;
    await waitForDuration(controller, deps.readyTimeoutMs);
    const armed = controller.getState().start(interval);
    if (!armed.ok) throw armed.error;
    deps.io.out(`Looping ${describeInterval(interval)}. Press Ctrl+C to stop.`);
    await deps.waitForStop();
    return 0;
  } finally {
    stopTicker();
    controller.getState().dispose();
    player.close();
  }
}

async function dispatch(argv: string[], deps: CliDeps): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      desc: { type: 'boolean', default: false },
      save: { type: 'boolean', default: false },
      video: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  const [command, ...args] = positionals;
  if (values.help || !command) {
    deps.io.out(USAGE);
    return command || values.help ? 0 : 1;
  }

  const settingsStore = createSettingsStore(deps.settingsStorage);
  const settings = pickSettings(settingsStore.getState());

  switch (command) {
    case 'list': {
      const store = openStore(required(args[0], 'file'), settings.persistOnSort);
      formatRows(store).forEach((line) => deps.io.out(line));
      return 0;
    }

    case 'set': {
      const store = openStore(required(args[0], 'file'), settings.persistOnSort);
      const row = parseRow(args[1], store);
      const column = parseColumn(args[2]);
      const result = store.getState().setValue(row, column, required(args[3], 'text'));
      if (!result.ok) throw result.error;
      deps.io.out(formatRows(store)[row + 1]);
      return 0;
    }

    case 'add': {
      const file = required(args[0], 'file');
      const interval: Interval = {
        startMs: parseTimeOffset(required(args[1], 'start')),
        endMs: parseTimeOffset(required(args[2], 'end')),
        description: args.slice(3).join(' '),
      };
      const store = openStore(file, settings.persistOnSort, true);
      const result = store.getState().append(interval);
      if (!result.ok) throw result.error;
      deps.io.out(`Added #${store.getState().rowCount()}: ${describeInterval(interval)}`);
      return 0;
    }

    case 'sort': {
      const store = openStore(required(args[0], 'file'), values.save || settings.persistOnSort);
      const result = store.getState().sort(values.desc);
      if (!result.ok) throw result.error;
      formatRows(store).forEach((line) => deps.io.out(line));
      return 0;
    }

    case 'loop':
      return runLoop(required(args[0], 'file'), args[1], values.video, settings, deps);

    case 'legacy': {
      const video = required(args[0], 'video');
      const file = required(args[1], 'file');
      let content: string;
      try {
        content = fs.readFileSync(file, 'utf-8');
      } catch (e) {
        throw new IOError(file, `Cannot access file: ${file}`, { cause: e });
      }
      const interval = parseLegacyLineAt(content, Number(required(args[2], 'n')));
      const code = await deps.launchLoop(video, interval, settings.vlcPath);
      return code ?? 0;
    }

    case 'config': {
      if (args.length === 0) {
        for (const [key, value] of Object.entries(settings)) deps.io.out(`${key}=${String(value)}`);
        return 0;
      }
      const key = required(args[0], 'key');
      const result = settingsStore.getState().applySetting(key, required(args[1], 'value'));
      if (!result.ok) throw result.error;
      const updated = Object.entries(pickSettings(settingsStore.getState())).find(([k]) => k === key);
      deps.io.out(`${key}=${String(updated?.[1])}`);
      return 0;
    }

    default:
      throw new UsageError(`Unknown command "${command}"\n\n${USAGE}`);
  }
}

/** Run one CLI invocation. Returns the process exit code. */
export async function runCli(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps = { ...defaultDeps(), ...overrides };
  try {
    return await dispatch(argv, deps);
  } catch (e) {
    if (e instanceof LooperError || e instanceof RangeError || isParseArgsError(e)) {
      deps.io.err(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}
