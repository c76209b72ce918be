import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { LogOutput } from './logger.js';

/**
 * Log destination appending to a file
 */
export type LogFile = LogOutput & {
  readonly path: string;
  /** First write error, if any */
  getError(): Error | null;
  close(): Promise<void>;
};

/**
 * Open `path` for appending, creating its directory when missing
 */
export async function openLogFile(path: string): Promise<LogFile> {
  await mkdir(dirname(path), { recursive: true });

  const stream = createWriteStream(path, { flags: 'a' });
  let failure: Error | null = null;

  // Write errors are reported by the owner once the terminal is restored
  stream.on('error', (error) => {
    failure ??= error;
  });

  const write = (line: string) => {
    if (!failure) {
      stream.write(`${line}\n`);
    }
  };

  return {
    path,
    log: write,
    error: write,
    getError: () => failure,
    close: () =>
      new Promise<void>((resolve) => {
        if (stream.closed || stream.destroyed) {
          resolve();
          return;
        }
        stream.end(() => resolve());
      }),
  };
}
