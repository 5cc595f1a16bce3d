import fs from 'node:fs';
import path from 'node:path';
import { IOError } from '../../utils/errors';

/** Backing store for one timestamp list. Reads and writes are synchronous. */
export interface TimestampSource {
  /** Shown in error messages */
  readonly location: string;
  read(): string;
  write(content: string): void;
}

/** A timestamp list on disk */
export function createFileSource(filePath: string): TimestampSource {
  return {
    location: filePath,
    read: () => {
      try {
        return fs.readFileSync(filePath, 'utf-8');
      } catch (e) {
        throw new IOError(filePath, `Cannot access timestamp file ${filePath}`, { cause: e });
      }
    },
    write: (content) => {
      try {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
        fs.writeFileSync(filePath, content, 'utf-8');
      } catch (e) {
        throw new IOError(filePath, `Cannot write timestamp file ${filePath}`, { cause: e });
      }
    },
  };
}

/** An in-process source, for tests and for lists that are not backed by a file */
export function createMemorySource(initial = '[]', location = '<memory>'): TimestampSource & { content: string } {
  const source = {
    location,
    content: initial,
    read: () => source.content,
    write: (content: string) => {
      source.content = content;
    },
  };
  return source;
}
