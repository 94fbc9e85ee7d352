import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { WebSocket } from 'ws';
import type { Subscriber } from '../../server/realtime-hub.js';

export const START_TIME = 1_000_000;

export interface TempDirs {
  root: string;
  dataDir: string;
  sourcesDir: string;
}

export async function makeTempDirs(): Promise<TempDirs> {
  const root = await mkdtemp(join(tmpdir(), 'crowdmark-test-'));
  const dataDir = join(root, 'data');
  const sourcesDir = join(root, 'sources');
  await mkdir(dataDir, { recursive: true });
  await mkdir(sourcesDir, { recursive: true });
  return { root, dataDir, sourcesDir };
}

export async function removeTempDirs(dirs: TempDirs): Promise<void> {
  await rm(dirs.root, { recursive: true, force: true });
}

export async function writeSource(dirs: TempDirs, name: string, text: string): Promise<void> {
  await writeFile(join(dirs.sourcesDir, name), text, 'utf-8');
}

/** Manually advanced clock in epoch milliseconds. */
export function fakeClock(start = START_TIME): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export class FakeSubscriber implements Subscriber {
  readyState: number = WebSocket.OPEN;
  sent: string[] = [];
  failing = false;

  send(data: string): void {
    if (this.failing) throw new Error('socket write failed');
    this.sent.push(data);
  }

  messages(): unknown[] {
    return this.sent.map((raw) => JSON.parse(raw));
  }
}
