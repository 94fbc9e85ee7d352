/**
 * Express routes for feedback forms and button panels (/api/forms/*, /api/triggers/*).
 * Both are polled by consumers through the `since` parameter.
 */

import { Router } from 'express';
import type { FormManager } from './forms.js';
import type { ButtonManager } from './buttons.js';
import { formConfigBody, formSubmitBody, buttonConfigBody, buttonFireBody, parseBody } from './schemas.js';
import { ResourceError, sendError } from './errors.js';
import { sanitizeFormId, sanitizePanelId, requireClientId, parseSince, queryString } from './helpers.js';

function parseLockAction(raw: unknown): boolean {
  const action = queryString(raw);
  if (action !== 'lock' && action !== 'unlock') {
    throw new ResourceError('invalid_action', "action must be 'lock' or 'unlock'", 400);
  }
  return action === 'lock';
}

export function createFormRouter({ forms }: { forms: FormManager }): Router {
  const router = Router();

  router.get('/api/forms', (_req, res) => {
    res.json({ forms: forms.listFormIds() });
  });

  router.get('/api/forms/config', async (req, res) => {
    try {
      res.json(await forms.getConfig(sanitizeFormId(queryString(req.query.form))));
    } catch (err) {
      sendError(res, err, 'Forms');
    }
  });

  router.post('/api/forms/config', async (req, res) => {
    try {
      const body = parseBody(formConfigBody, req.body);
      const formId = sanitizeFormId(body.formId ?? undefined);
      res.json(await forms.updateConfig(formId, body));
    } catch (err) {
      sendError(res, err, 'Forms');
    }
  });

  router.get('/api/forms/control', async (req, res) => {
    try {
      const locked = parseLockAction(req.query.action);
      const formId = sanitizeFormId(queryString(req.query.form));
      res.json(await forms.updateConfig(formId, { locked }));
    } catch (err) {
      sendError(res, err, 'Forms');
    }
  });

  router.post('/api/forms/submit', async (req, res) => {
    try {
      const body = parseBody(formSubmitBody, req.body);
      const formId = sanitizeFormId(body.formId ?? undefined);
      const clientId = requireClientId(body.clientId);
      const result = await forms.submit(formId, clientId, body.answer);
      res.json({ formId, result });
    } catch (err) {
      sendError(res, err, 'Forms');
    }
  });

  router.get('/api/forms/results', async (req, res) => {
    try {
      const formId = sanitizeFormId(queryString(req.query.form));
      res.json(await forms.results(formId, parseSince(req.query.since)));
    } catch (err) {
      sendError(res, err, 'Forms');
    }
  });

  router.post('/api/forms/clear', async (req, res) => {
    try {
      const formId = sanitizeFormId(queryString(req.query.form));
      console.log(`[Forms] Cleared ${formId}`);
      res.json(await forms.clear(formId));
    } catch (err) {
      sendError(res, err, 'Forms');
    }
  });

  return router;
}

export function createTriggerRouter({ buttons }: { buttons: ButtonManager }): Router {
  const router = Router();

  router.get('/api/panels', (_req, res) => {
    res.json({ panels: buttons.listPanelIds() });
  });

  router.get('/api/triggers/config', async (req, res) => {
    try {
      res.json(await buttons.getConfig(sanitizePanelId(queryString(req.query.panel))));
    } catch (err) {
      sendError(res, err, 'Triggers');
    }
  });

  router.post('/api/triggers/config', async (req, res) => {
    try {
      const body = parseBody(buttonConfigBody, req.body);
      const panelId = sanitizePanelId(body.panelId ?? undefined);
      res.json(await buttons.updateConfig(panelId, body));
    } catch (err) {
      sendError(res, err, 'Triggers');
    }
  });

  router.get('/api/triggers/control', async (req, res) => {
    try {
      const locked = parseLockAction(req.query.action);
      const panelId = sanitizePanelId(queryString(req.query.panel));
      res.json(await buttons.updateConfig(panelId, { locked }));
    } catch (err) {
      sendError(res, err, 'Triggers');
    }
  });

  router.post('/api/triggers/fire', async (req, res) => {
    try {
      const body = parseBody(buttonFireBody, req.body);
      const panelId = sanitizePanelId(body.panelId ?? undefined);
      const clientId = requireClientId(body.clientId);
      const buttonId = body.buttonId.trim().toLowerCase();
      if (!buttonId) throw new ResourceError('invalid_button', 'buttonId cannot be empty', 400);
      const event = await buttons.fire(panelId, clientId, buttonId, body.direction);
      res.json({ panelId, event });
    } catch (err) {
      sendError(res, err, 'Triggers');
    }
  });

  router.get('/api/triggers/state', async (req, res) => {
    try {
      const panelId = sanitizePanelId(queryString(req.query.panel));
      res.json(await buttons.state(panelId, parseSince(req.query.since)));
    } catch (err) {
      sendError(res, err, 'Triggers');
    }
  });

  router.post('/api/triggers/reset', async (req, res) => {
    try {
      const panelId = sanitizePanelId(queryString(req.query.panel));
      console.log(`[Triggers] Reset ${panelId}`);
      res.json(await buttons.reset(panelId));
    } catch (err) {
      sendError(res, err, 'Triggers');
    }
  });

  return router;
}
