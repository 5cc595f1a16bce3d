import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findCompanionVideo } from './companion-finder';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'looper-companion-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const touch = (...names: string[]) => names.forEach((name) => fs.writeFileSync(path.join(dir, name), ''));

describe('findCompanionVideo', () => {
  it('finds the video with the same base name', () => {
    touch('lesson.tmsp', 'lesson.mp4', 'other.mp4');
    expect(findCompanionVideo(path.join(dir, 'lesson.tmsp'))).toBe(path.join(dir, 'lesson.mp4'));
  });

  it('picks the first match alphabetically', () => {
    touch('lesson.tmsp', 'lesson.webm', 'lesson.mkv');
    expect(findCompanionVideo(path.join(dir, 'lesson.tmsp'))).toBe(path.join(dir, 'lesson.mkv'));
  });

  it('matches extensions case-insensitively', () => {
    touch('lesson.tmsp', 'lesson.MP4');
    expect(findCompanionVideo(path.join(dir, 'lesson.tmsp'))).toBe(path.join(dir, 'lesson.MP4'));
  });

  it('ignores files that are not videos', () => {
    touch('lesson.tmsp', 'lesson.txt');
    expect(findCompanionVideo(path.join(dir, 'lesson.tmsp'))).toBeNull();
  });

  it('returns null for a missing directory', () => {
    expect(findCompanionVideo(path.join(dir, 'nope', 'lesson.tmsp'))).toBeNull();
  });
});
