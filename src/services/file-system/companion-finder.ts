import fs from 'node:fs';
import path from 'node:path';

// Containers VLC opens that can sit beside a timestamp file
const VIDEO_EXTENSIONS = new Set([
  '.mp4', '.webm', '.ogg', '.ogv', '.mov', '.avi', '.mkv', '.m4v', '.wmv', '.flv', '.mpg', '.mpeg',
]);

/**
 * Find the video that sits beside a timestamp file under the same base name,
 * e.g. `lesson.mp4` for `lesson.tmsp`. Returns null when there is none.
 */
export function findCompanionVideo(timestampPath: string): string | null {
  const { dir, base: own, name } = path.parse(timestampPath);

  let entries: string[];
  try {
    entries = fs.readdirSync(dir || '.');
  } catch {
    return null;
  }

  const match = entries
    .filter((entry) => {
      if (entry === own) return false;
      const parsed = path.parse(entry);
      return parsed.name === name && VIDEO_EXTENSIONS.has(parsed.ext.toLowerCase());
    })
    .sort((a, b) => a.localeCompare(b))[0];
  return match ? path.join(dir, match) : null;
}
