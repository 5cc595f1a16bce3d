import { spawn } from 'node:child_process';
import fs from 'node:fs';
import type { Interval } from '../../types/timestamp';
import { IOError } from '../../utils/errors';
import { msToSec } from '../../utils/time';

export interface LaunchOptions {
  vlcPath?: string;
  spawnProcess?: (command: string, args: string[]) => LaunchedProcess;
}

export interface LaunchedProcess {
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export function buildLoopArgs(videoPath: string, interval: Interval): string[] {
  return [
    videoPath,
    '--start-time', String(msToSec(interval.startMs)),
    '--stop-time', String(msToSec(interval.endMs)),
    '--repeat',
  ];
}

/**
 * Hand the whole loop to VLC: it repeats the interval itself until closed.
 * Resolves with VLC's exit code; rejects with IOError when VLC cannot be started.
 */
export function launchVlcLoop(videoPath: string, interval: Interval, options: LaunchOptions = {}): Promise<number | null> {
  if (!fs.existsSync(videoPath)) {
    return Promise.reject(new IOError(videoPath, `Cannot access file: ${videoPath}`));
  }
  const spawnProcess = options.spawnProcess ?? ((command, args) => spawn(command, args, { stdio: 'inherit' }));
  const vlcPath = options.vlcPath ?? 'vlc';
  const proc = spawnProcess(vlcPath, buildLoopArgs(videoPath, interval));
  return new Promise((resolve, reject) => {
    proc.once('exit', (code) => resolve(code));
    proc.once('error', (error) => {
      reject(new IOError(vlcPath, `Cannot start VLC at ${vlcPath}: ${error.message}`, { cause: error }));
    });
  });
}
