import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { writeJsonAtomic, readJsonSnapshot, listSnapshotIds } from '../server/persistence.js';
import { makeTempDirs, removeTempDirs, type TempDirs } from './helpers/fixtures.js';

const counterSchema = z.object({
  count: z.number().int(),
  label: z.string().default('untitled'),
});

describe('persistence', () => {
  let dirs: TempDirs;

  beforeEach(async () => {
    dirs = await makeTempDirs();
  });

  afterEach(async () => {
    await removeTempDirs(dirs);
  });

  describe('writeJsonAtomic', () => {
    it('writes the value and leaves no temp file behind', async () => {
      const path = join(dirs.dataDir, 'snap.json');
      await writeJsonAtomic(path, { count: 1 });
      await writeJsonAtomic(path, { count: 2 });
      expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({ count: 2 });
      expect(await readdir(dirs.dataDir)).toEqual(['snap.json']);
    });

    it('rejects when the directory does not exist', async () => {
      await expect(writeJsonAtomic(join(dirs.dataDir, 'missing', 'snap.json'), { count: 1 })).rejects.toMatchObject({
        code: 'ENOENT',
      });
      expect(await readdir(dirs.dataDir)).toEqual([]);
    });
  });

  describe('readJsonSnapshot', () => {
    it('returns null for a missing file', async () => {
      expect(await readJsonSnapshot(join(dirs.dataDir, 'none.json'), counterSchema, 'none')).toBeNull();
    });

    it('returns null for invalid JSON', async () => {
      const path = join(dirs.dataDir, 'bad.json');
      await writeFile(path, '{"count":', 'utf-8');
      expect(await readJsonSnapshot(path, counterSchema, 'bad')).toBeNull();
    });

    it('returns null when the shape does not match', async () => {
      const path = join(dirs.dataDir, 'wrong.json');
      await writeFile(path, JSON.stringify({ count: 'three' }), 'utf-8');
      expect(await readJsonSnapshot(path, counterSchema, 'wrong')).toBeNull();
    });

    it('applies schema defaults', async () => {
      const path = join(dirs.dataDir, 'ok.json');
      await writeFile(path, JSON.stringify({ count: 3 }), 'utf-8');
      expect(await readJsonSnapshot(path, counterSchema, 'ok')).toEqual({ count: 3, label: 'untitled' });
    });
  });

  describe('listSnapshotIds', () => {
    it('lists ids of prefixed JSON files only', async () => {
      for (const name of ['state_a.json', 'state_b.json', 'form_x.json', 'state_.json', 'state_c.jsonl']) {
        await writeFile(join(dirs.dataDir, name), '{}', 'utf-8');
      }
      expect(listSnapshotIds(dirs.dataDir, 'state_').sort()).toEqual(['a', 'b']);
    });

    it('returns an empty list for a missing directory', () => {
      expect(listSnapshotIds(join(dirs.root, 'nowhere'), 'state_')).toEqual([]);
    });
  });
});
