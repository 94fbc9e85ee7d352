/**
 * Express routes for documents: tokens, aggregated state, phrases, lock/clear/reset, export/import.
 * Mounted in index.ts to keep the main file lean.
 */

import { Router } from 'express';
import { basename, resolve } from 'path';
import type { DocumentStore } from './documents.js';
import type { RealtimeHub } from './realtime-hub.js';
import { rangesFromVotes, clientRanges, phrasesAggregated } from './aggregate.js';
import { renderMarkdown, isMarkdownName } from './markdown.js';
import { docExportSchema, parseBody } from './schemas.js';
import { ResourceError, sendError } from './errors.js';
import { sanitizeDocId, sanitizeSourceName, queryString } from './helpers.js';

interface DocumentRouterDeps {
  store: DocumentStore;
  hub: RealtimeHub;
}

export function createDocumentRouter({ store, hub }: DocumentRouterDeps): Router {
  const router = Router();

  const broadcastStateUpdated = (docId: string): void => {
    hub.broadcast(docId, { type: 'state_updated', docId });
  };

  router.get('/api/docs', (_req, res) => {
    res.json({ docs: store.listDocumentIds() });
  });

  router.get('/api/sources', (_req, res) => {
    res.json({ sources: store.listSources() });
  });

  router.get('/api/text', async (req, res) => {
    try {
      const name = queryString(req.query.name);
      const text = await store.readSourceText(name);
      if (isMarkdownName(sanitizeSourceName(name))) {
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.send(renderMarkdown(text));
        return;
      }
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.send(text);
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/tokens', async (req, res) => {
    try {
      const docId = sanitizeDocId(queryString(req.query.doc));
      const state = await store.ensureTokens(docId, queryString(req.query.name));
      res.json({ docId, tokens: state.tokens });
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/state', async (req, res) => {
    try {
      const docId = sanitizeDocId(queryString(req.query.doc));
      const state = await store.ensureTokens(docId, queryString(req.query.name));
      res.json({
        docId,
        updated: state.updated,
        tokens_len: state.tokens.length,
        ranges: rangesFromVotes(state.votes),
      });
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/myranges', async (req, res) => {
    try {
      const client = queryString(req.query.client);
      if (!client) throw new ResourceError('invalid_client', 'Missing client id', 400);
      const docId = sanitizeDocId(queryString(req.query.doc));
      const state = await store.ensureTokens(docId, null);
      res.json({ docId, ranges: clientRanges(state.tokens, state.votes, client) });
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/phrases', async (req, res) => {
    try {
      const docId = sanitizeDocId(queryString(req.query.doc));
      const state = await store.ensureTokens(docId, queryString(req.query.name));
      res.json({ docId, updated: state.updated, phrases: phrasesAggregated(state.tokens, state.votes) });
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/control', (req, res) => {
    try {
      const action = queryString(req.query.action);
      if (action !== 'lock' && action !== 'unlock') {
        throw new ResourceError('invalid_action', "action must be 'lock' or 'unlock'", 400);
      }
      const docId = sanitizeDocId(queryString(req.query.doc));
      store.setLocked(docId, action === 'lock');
      hub.broadcast(docId, { type: 'control', action, docId });
      console.log(`[Docs] ${docId} ${action}ed`);
      res.json({ ok: true, docId, locked: store.isLocked(docId) });
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/clear', async (req, res) => {
    try {
      const docId = sanitizeDocId(queryString(req.query.doc));
      await store.ensureTokens(docId, queryString(req.query.name));
      await store.clearVotes(docId);
      broadcastStateUpdated(docId);
      res.json({ ok: true, docId, cleared: 'votes' });
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/reset', async (req, res) => {
    try {
      const docId = sanitizeDocId(queryString(req.query.doc));
      const state = await store.retokenize(docId, queryString(req.query.name));
      broadcastStateUpdated(docId);
      console.log(`[Docs] ${docId} reset from ${state.sourceName} (${state.tokens.length} tokens)`);
      res.json({ ok: true, docId, reset: state.tokens.length, sourceName: state.sourceName });
    } catch (err) {
      sendError(res, err, 'Docs');
    }
  });

  router.get('/api/export', async (req, res) => {
    try {
      const docId = sanitizeDocId(queryString(req.query.doc));
      const fmt = (queryString(req.query.fmt) || 'json').toLowerCase();
      switch (fmt) {
        case 'json':
          res.json(await store.exportSnapshot(docId));
          break;
        case 'jsonl': {
          const path = await store.writeJsonlExport(docId);
          res.setHeader('Content-Type', 'application/octet-stream');
          res.setHeader('Content-Disposition', `attachment; filename="${basename(path)}"`);
          res.sendFile(resolve(path));
          break;
        }
        default:
          throw new ResourceError('invalid_format', 'fmt must be json or jsonl', 400);
      }
    } catch (err) {
      sendError(res, err, 'Export');
    }
  });

  // Replace a document wholesale with a payload from /api/export?fmt=json
  router.post('/api/import', async (req, res) => {
    try {
      const docId = sanitizeDocId(queryString(req.query.doc));
      const snapshot = parseBody(docExportSchema, req.body);
      const state = await store.replaceState(docId, snapshot);
      broadcastStateUpdated(docId);
      res.json({ ok: true, docId, tokens_len: state.tokens.length });
    } catch (err) {
      sendError(res, err, 'Import');
    }
  });

  return router;
}
