import fs from 'fs-extra';
import path from 'path';
import { debug, info } from './log';

/**
 * Delete regular files in `dir` last modified more than `maxAgeHours` ago.
 * Returns how many were removed; a missing directory counts as empty.
 */
export async function cleanupOldFiles(dir: string, maxAgeHours: number, now: Date = new Date()): Promise<number> {
  if (!(await fs.pathExists(dir))) return 0;
  const cutoff = now.getTime() - maxAgeHours * 3600 * 1000;
  let deleted = 0;
  for (const name of await fs.readdir(dir)) {
    const file = path.join(dir, name);
    const stat = await fs.stat(file);
    if (!stat.isFile()) continue;
    if (stat.mtimeMs < cutoff) {
      await fs.remove(file);
      deleted += 1;
      debug('cleanup.remove', { file });
    }
  }
  info('cleanup.complete', { dir, deleted, maxAgeHours });
  return deleted;
}
