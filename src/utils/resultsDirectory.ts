import fs from 'fs-extra';
import path from 'node:path';

const pad = (n: number) => String(n).padStart(2, '0');

/** UTC `YYYY-MM-DD-HH-MM-SS`. */
export function formatRunTimestamp(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join('-');
}

/**
 * Creates `<baseDir>/<timestamp>/<suiteName>` and returns its path.
 */
export async function setupResultsDirectory(
  suiteName: string,
  baseDir: string = 'results',
  now: Date = new Date(),
): Promise<string> {
  const dir = path.join(baseDir, formatRunTimestamp(now), suiteName);
  await fs.ensureDir(dir);
  return dir;
}
