import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocket } from 'ws';
import { startServer, type RunningServer } from '../server/index.js';
import { makeTempDirs, removeTempDirs, writeSource, fakeClock, START_TIME, type TempDirs } from './helpers/fixtures.js';

/** Buffers parsed messages so none are lost between awaits. */
class Inbox {
  private queue: unknown[] = [];
  private waiters: Array<(msg: unknown) => void> = [];

  constructor(ws: WebSocket) {
    ws.on('message', (data) => {
      const msg: unknown = JSON.parse(data.toString());
      const waiter = this.waiters.shift();
      if (waiter) waiter(msg);
      else this.queue.push(msg);
    });
  }

  next(): Promise<unknown> {
    if (this.queue.length > 0) return Promise.resolve(this.queue.shift());
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

describe('WebSocket channels', () => {
  let dirs: TempDirs;
  let running: RunningServer;
  let base: string;
  const sockets: WebSocket[] = [];

  beforeEach(async () => {
    dirs = await makeTempDirs();
    await writeSource(dirs, 'text.txt', 'The quick fox');
    running = await startServer(
      { port: 0, host: '127.0.0.1', dataDir: dirs.dataDir, sourcesDir: dirs.sourcesDir },
      { logRequests: false, now: fakeClock().now },
    );
    base = `127.0.0.1:${running.port}`;
  });

  afterEach(async () => {
    for (const ws of sockets.splice(0)) ws.terminate();
    await running.close();
    await removeTempDirs(dirs);
  });

  async function connect(path: string): Promise<{ ws: WebSocket; inbox: Inbox }> {
    const ws = new WebSocket(`ws://${base}${path}`);
    sockets.push(ws);
    const inbox = new Inbox(ws);
    await new Promise<void>((resolve, reject) => {
      ws.once('open', () => resolve());
      ws.once('error', reject);
    });
    return { ws, inbox };
  }

  async function joinDoc(client: string): Promise<{ ws: WebSocket; inbox: Inbox }> {
    const conn = await connect(`/?doc=doc1&client=${client}`);
    await conn.inbox.next();
    await conn.inbox.next();
    return conn;
  }

  async function fetchState(): Promise<unknown> {
    const res = await fetch(`http://${base}/api/state`);
    return res.json();
  }

  it('greets with hello and the current ranges', async () => {
    await running.store.applyHighlight('doc1', 'alice', 0, 1, 'red');
    const { inbox } = await connect('/?doc=doc1&client=bob');
    expect(await inbox.next()).toEqual({ type: 'hello', docId: 'doc1', locked: false });
    expect(await inbox.next()).toEqual({
      type: 'init',
      docId: 'doc1',
      ranges: [{ start: 0, end: 1, color: 'red' }],
      t: START_TIME,
    });
  });

  it('broadcasts state_updated to everyone on the document after a highlight', async () => {
    const alice = await joinDoc('alice');
    const bob = await joinDoc('bob');

    alice.ws.send(JSON.stringify({ type: 'highlight', action: 'set_range', start: 0, end: 1, color: 'red' }));
    expect(await bob.inbox.next()).toEqual({ type: 'state_updated', docId: 'doc1' });
    expect(await alice.inbox.next()).toEqual({ type: 'state_updated', docId: 'doc1' });
    expect(await fetchState()).toMatchObject({ ranges: [{ start: 0, end: 1, color: 'red' }] });
  });

  it('defaults end to start and accepts numeric strings', async () => {
    const alice = await joinDoc('alice');
    alice.ws.send(JSON.stringify({ type: 'highlight', action: 'set_range', start: '2', color: 'blue' }));
    await alice.inbox.next();
    expect(await fetchState()).toMatchObject({ ranges: [{ start: 2, end: 2, color: 'blue' }] });
  });

  it('ignores malformed and unrelated messages', async () => {
    const alice = await joinDoc('alice');
    alice.ws.send('not json');
    alice.ws.send(JSON.stringify({ type: 'chat', text: 'hi' }));
    alice.ws.send(JSON.stringify({ type: 'highlight', action: 'paint' }));
    alice.ws.send(JSON.stringify({ type: 'highlight', action: 'set_range', start: 1, end: 1, color: 'red' }));
    expect(await alice.inbox.next()).toEqual({ type: 'state_updated', docId: 'doc1' });
    expect(alice.ws.readyState).toBe(WebSocket.OPEN);
  });

  it('clears one client with clear_all', async () => {
    const alice = await joinDoc('alice');
    alice.ws.send(JSON.stringify({ type: 'highlight', action: 'set_range', start: 0, end: 2, color: 'red' }));
    await alice.inbox.next();
    alice.ws.send(JSON.stringify({ type: 'highlight', action: 'clear_all' }));
    expect(await alice.inbox.next()).toEqual({ type: 'state_updated', docId: 'doc1' });
    expect(await fetchState()).toMatchObject({ ranges: [] });
  });

  it('pushes lock changes to document subscribers', async () => {
    const alice = await joinDoc('alice');
    const res = await fetch(`http://${base}/api/control?action=lock`);
    expect(await res.json()).toEqual({ ok: true, docId: 'doc1', locked: true });
    expect(await alice.inbox.next()).toEqual({ type: 'control', action: 'lock', docId: 'doc1' });
  });

  function closeCode(ws: WebSocket): Promise<number> {
    return new Promise((resolve) => {
      ws.on('close', (code) => resolve(code));
    });
  }

  it('drops only the client that sends an invalid frame', async () => {
    const alice = await joinDoc('alice');
    const bob = await joinDoc('bob');

    const closed = closeCode(alice.ws);
    alice.ws.send(Buffer.from([0xff, 0xfe, 0xfd]), { binary: false });
    expect(await closed).toBe(1007);

    bob.ws.send(JSON.stringify({ type: 'highlight', action: 'set_range', start: 0, end: 0, color: 'red' }));
    expect(await bob.inbox.next()).toEqual({ type: 'state_updated', docId: 'doc1' });
    expect(await fetchState()).toMatchObject({ ranges: [{ start: 0, end: 0, color: 'red' }] });
  });

  it('survives an invalid frame on the control channel', async () => {
    const screen = await connect('/control?group=stage&client=screen1');
    await screen.inbox.next();

    const closed = closeCode(screen.ws);
    screen.ws.send(Buffer.from([0xff, 0xfe, 0xfd]), { binary: false });
    expect(await closed).toBe(1007);

    const res = await fetch(`http://${base}/api/router/default`);
    expect(await res.json()).toEqual({ default: null });
  });

  it('closes the connection for an invalid doc id', async () => {
    const ws = new WebSocket(`ws://${base}/?doc=bad%20id`);
    sockets.push(ws);
    const code = await new Promise<number>((resolve) => {
      ws.on('close', (closeCode) => resolve(closeCode));
    });
    expect(code).toBe(1008);
  });

  it('delivers navigation commands to the addressed control group', async () => {
    const screen = await connect('/control?group=stage&client=screen1');
    expect(await screen.inbox.next()).toEqual({ type: 'control_hello', group: 'stage', clientId: 'screen1' });

    const res = await fetch(`http://${base}/api/router/send`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ target: '/slides/2', group: 'stage' }),
    });
    expect(res.status).toBe(200);
    expect(await screen.inbox.next()).toEqual({
      type: 'navigate',
      target: '/slides/2',
      preserveClient: true,
      preserveParams: [],
    });
  });
});
