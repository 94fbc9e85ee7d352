/**
 * WebSocket handler: live highlight edits on `/`, navigation commands on `/control`.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Server, IncomingMessage } from 'http';
import type { DocumentStore, DocState } from './documents.js';
import type { RealtimeHub } from './realtime-hub.js';
import { ALL_GROUP, type NavigationHub } from './navigation.js';
import { rangesFromVotes } from './aggregate.js';
import { highlightMessageSchema } from './schemas.js';
import { sanitizeDocId } from './helpers.js';

export interface WebSocketDeps {
  store: DocumentStore;
  hub: RealtimeHub;
  nav: NavigationHub;
}

/** Close code for a connection whose query parameters are unusable. */
export const POLICY_VIOLATION = 1008;

function send(ws: WebSocket, message: object): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export function setupWebSocket(server: Server, deps: WebSocketDeps): WebSocketServer {
  const wss = new WebSocketServer({ server });

  wss.on('connection', (ws, req) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname === '/control') {
      handleControlConnection(ws, url, deps.nav);
      return;
    }
    handleDocConnection(ws, url, req, deps).catch((err: unknown) => {
      console.error('[WS] Connection setup failed:', err instanceof Error ? err.message : err);
    });
  });

  return wss;
}

// ============================================================================
// DOCUMENT CHANNEL
// ============================================================================

async function handleDocConnection(ws: WebSocket, url: URL, req: IncomingMessage, deps: WebSocketDeps): Promise<void> {
  const { store, hub } = deps;
  let docId: string;
  try {
    docId = sanitizeDocId(url.searchParams.get('doc') ?? undefined);
  } catch {
    console.warn(`[WS] Rejected connection with invalid doc id from ${req.socket.remoteAddress ?? 'unknown'}`);
    ws.close(POLICY_VIOLATION, 'Invalid doc id');
    return;
  }
  const clientId = url.searchParams.get('client') || 'anon';

  hub.register(docId, ws);
  ws.on('close', () => {
    hub.unregister(docId, ws);
    console.log(`[WS] ${clientId} left ${docId} (remaining: ${hub.count(docId)})`);
  });
  ws.on('error', (err) => {
    console.warn(`[WS] ${clientId} socket error on ${docId}: ${err.message}`);
  });
  ws.on('message', (data) => {
    handleDocMessage(data, docId, clientId, deps).catch((err: unknown) => {
      console.error('[WS] Highlight failed:', err instanceof Error ? err.message : err);
    });
  });
  console.log(`[WS] ${clientId} joined ${docId} (total: ${hub.count(docId)})`);

  let state: DocState | null = null;
  try {
    state = await store.ensureTokens(docId, null);
  } catch (err) {
    console.error(`[WS] Could not load tokens for ${docId}:`, err instanceof Error ? err.message : err);
  }

  send(ws, { type: 'hello', docId, locked: store.isLocked(docId) });
  if (state && state.tokens.length > 0) {
    send(ws, { type: 'init', docId, ranges: rangesFromVotes(state.votes), t: state.updated });
  }
}

async function handleDocMessage(data: RawData, docId: string, clientId: string, deps: WebSocketDeps): Promise<void> {
  let raw: unknown;
  try {
    raw = JSON.parse(data.toString());
  } catch {
    console.warn(`[WS] Ignoring unparsable message from ${clientId}`);
    return;
  }
  if (typeof raw !== 'object' || raw === null || !('type' in raw) || raw.type !== 'highlight') return;

  const parsed = highlightMessageSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[WS] Ignoring invalid highlight from ${clientId}: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    return;
  }

  const msg = parsed.data;
  const changed = msg.action === 'set_range'
    ? await deps.store.applyHighlight(docId, clientId, msg.start, msg.end ?? msg.start, msg.color ?? '', msg.t)
    : await deps.store.clearClient(docId, clientId, msg.t);
  if (changed) {
    deps.hub.broadcast(docId, { type: 'state_updated', docId });
  }
}

// ============================================================================
// CONTROL CHANNEL
// ============================================================================

function handleControlConnection(ws: WebSocket, url: URL, nav: NavigationHub): void {
  const group = url.searchParams.get('group')?.trim() || ALL_GROUP;
  const clientId = url.searchParams.get('client') || 'anon';

  nav.register(group, ws);
  ws.on('close', () => {
    nav.unregister(ws);
  });
  ws.on('error', (err) => {
    console.warn(`[WS] Control client ${clientId} socket error: ${err.message}`);
  });
  console.log(`[WS] Control client ${clientId} joined group ${group}`);
  send(ws, { type: 'control_hello', group, clientId });
}
