import fs from 'fs-extra';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { cleanupOldFiles } from '../src/pipeline/cleanup';
import { tempDir } from './helpers';

describe('cleanupOldFiles', () => {
  it('removes only files older than the limit', async () => {
    const dir = await tempDir('cleanup');
    const now = new Date('2026-03-02T12:00:00Z');
    const stale = path.join(dir, 'stale.mp4');
    const fresh = path.join(dir, 'fresh.mp4');
    await fs.writeFile(stale, 'x');
    await fs.writeFile(fresh, 'y');
    await fs.utimes(stale, new Date('2026-03-01T10:00:00Z'), new Date('2026-03-01T10:00:00Z'));
    await fs.utimes(fresh, new Date('2026-03-02T11:00:00Z'), new Date('2026-03-02T11:00:00Z'));
    await fs.ensureDir(path.join(dir, 'nested'));

    expect(await cleanupOldFiles(dir, 24, now)).toBe(1);
    expect((await fs.readdir(dir)).sort()).toEqual(['fresh.mp4', 'nested']);
  });

  it('treats a missing directory as empty', async () => {
    const dir = await tempDir('cleanup');
    expect(await cleanupOldFiles(path.join(dir, 'absent'), 24)).toBe(0);
  });
});
