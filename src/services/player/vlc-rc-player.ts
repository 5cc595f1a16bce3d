import { spawn } from 'node:child_process';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import type { MediaPlayer } from '../../types/player';
import { secToMs } from '../../utils/time';

/** The parts of a child process the adapter uses */
export interface VlcProcess {
  stdin: {
    write: (chunk: string) => unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
  };
  stdout: Readable;
  kill: () => boolean;
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnVlc = (command: string, args: string[]) => VlcProcess;

export interface VlcRcPlayerOptions {
  vlcPath?: string;
  /** How often time, length and play state are queried */
  pollMs?: number;
  spawnVlc?: SpawnVlc;
}

export interface VlcRcPlayer extends MediaPlayer {
  /** Ask VLC to quit and stop polling */
  close: () => void;
}

/** One poll: get_time, get_length, then status, whose state line closes the cycle */
type Cycle = { generation: number };

const MAX_PENDING_CYCLES = 3;

const RC_VOLUME_PER_PERCENT = 256 / 100; // rc volume 256 is 100%

const defaultSpawn: SpawnVlc = (command, args) => spawn(command, args, { stdio: ['pipe', 'pipe', 'ignore'] });

/**
 * MediaPlayer over VLC's `rc` interface. Queries go out on a timer and the
 * replies update a local cache that the synchronous getters read. Each cycle
 * ends with `status`, and its `( state ... )` line closes the cycle: the two
 * numbers before it are time and length, and a cycle missing either is
 * dropped. rc reports time in whole seconds, so position notifications
 * arrive at that granularity.
 */
export function createVlcRcPlayer(options: VlcRcPlayerOptions = {}): VlcRcPlayer {
  const spawnVlc = options.spawnVlc ?? defaultSpawn;
  const proc = spawnVlc(options.vlcPath ?? 'vlc', ['--intf', 'rc', '--no-video-title-show']);

  let timeMs = 0;
  let durationMs = 0;
  let playing = false;
  let rate = 1;
  let volume = 0;
  let muted = false;
  let closed = false;
  // Bumped on play/pause so state from an older cycle is ignored
  let generation = 0;
  const pending: Cycle[] = [];
  let numbers: number[] = [];
  const listeners = new Set<(currentMs: number) => void>();

  const send = (command: string) => {
    if (closed) return;
    proc.stdin.write(`${command}\n`);
  };

  const lines = readline.createInterface({ input: proc.stdout });
  lines.on('line', (raw) => {
    const line = raw.replace(/^[>\s]+/, '').trim();
    if (/^-?\d+(\.\d+)?$/.test(line)) {
      numbers.push(Number(line));
      return;
    }
    const state = /^\( state (\w+) \)$/.exec(line);
    if (!state) return; // status chatter
    const cycle = pending.shift();
    const [time, length] = numbers;
    const complete = numbers.length === 2;
    numbers = [];
    if (!cycle) return;
    if (complete) {
      timeMs = secToMs(time);
      durationMs = secToMs(length);
      for (const listener of listeners) listener(timeMs);
    }
    if (cycle.generation === generation) playing = state[1] === 'playing';
  });

  const poll = setInterval(() => {
    if (closed || pending.length >= MAX_PENDING_CYCLES) return;
    pending.push({ generation });
    send('get_time');
    send('get_length');
    send('status');
  }, options.pollMs ?? 250);

  const shutDown = () => {
    closed = true;
    playing = false;
    clearInterval(poll);
    lines.close();
  };

  proc.once('exit', (code) => {
    if (!closed) console.warn('[Looper] VLC exited with code', code);
    shutDown();
  });

  proc.once('error', (error) => {
    console.warn('[Looper] Cannot start VLC:', error.message);
    shutDown();
  });

  proc.stdin.on('error', (error) => {
    if (!closed) console.warn('[Looper] VLC stopped reading commands:', error.message);
    shutDown();
  });

  const applyVolume = () => send(`volume ${muted ? 0 : Math.round(volume * RC_VOLUME_PER_PERCENT)}`);

  return {
    load: (path) => {
      send('clear');
      send(`enqueue ${path}`);
      timeMs = 0;
      durationMs = 0;
      playing = false;
      generation++;
    },
    getDuration: () => durationMs,
    getTime: () => timeMs,
    seek: (ms) => {
      send(`seek ${Math.floor(ms / 1000)}`);
      timeMs = ms;
    },
    play: () => {
      send('play');
      playing = true;
      generation++;
    },
    pause: () => {
      // rc's pause toggles, so only send it while playing
      if (!playing) return;
      send('pause');
      playing = false;
      generation++;
    },
    isPlaying: () => playing,
    getRate: () => rate,
    setRate: (next) => {
      rate = next;
      send(`rate ${next}`);
    },
    getVolume: () => volume,
    setVolume: (next) => {
      volume = next;
      applyVolume();
    },
    isMuted: () => muted,
    setMuted: (next) => {
      muted = next;
      applyVolume();
    },
    onPositionChanged: (listener) => {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    close: () => {
      send('quit');
      shutDown();
      proc.kill();
    },
  };
}
