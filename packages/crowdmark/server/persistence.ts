/**
 * Snapshot persistence: one JSON file per resource, replaced atomically.
 * Writers go through a temp file in the same directory + fsync + rename, so a
 * reader (or a crash) never sees a half-written snapshot.
 */

import { existsSync, readdirSync } from 'fs';
import { open, readFile, rename, rm } from 'fs/promises';
import { join, dirname, basename } from 'path';
import { randomUUID } from 'crypto';
import type { z } from 'zod';

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeFileAtomic(path, JSON.stringify(value));
}

export async function writeFileAtomic(path: string, data: string): Promise<void> {
  const tmpPath = join(dirname(path), `.${basename(path)}.${randomUUID().slice(0, 8)}.tmp`);
  try {
    const handle = await open(tmpPath, 'w');
    try {
      await handle.writeFile(data, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Read and validate a snapshot. Missing files yield null; unreadable or invalid
 * ones are logged and also yield null so callers fall back to their defaults.
 */
export async function readJsonSnapshot<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  label: string,
): Promise<z.infer<S> | null> {
  if (!existsSync(path)) return null;
  try {
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      console.error(`[Store] Failed to load ${label}: ${parsed.error.issues[0]?.message ?? 'invalid snapshot'}`);
      return null;
    }
    return parsed.data;
  } catch (err) {
    console.error(`[Store] Failed to load ${label}:`, err instanceof Error ? err.message : err);
    return null;
  }
}

/** Ids of every `<prefix><id>.json` snapshot in dir. */
export function listSnapshotIds(dir: string, prefix: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((f) => f.startsWith(prefix) && f.endsWith('.json'))
    .map((f) => f.slice(prefix.length, -'.json'.length))
    .filter(Boolean);
}
