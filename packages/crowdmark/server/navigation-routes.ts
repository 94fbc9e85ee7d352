/**
 * Express routes for the navigation channel (/api/router/*).
 */

import { Router } from 'express';
import type { NavigationHub, NavigationCommand } from './navigation.js';
import { routerCommandBody, parseBody } from './schemas.js';
import { ResourceError, sendError } from './errors.js';

export function createNavigationRouter({ nav }: { nav: NavigationHub }): Router {
  const router = Router();

  router.post('/api/router/send', (req, res) => {
    try {
      const body = parseBody(routerCommandBody, req.body);
      const group = (body.group || 'all').trim() || 'all';
      let message: NavigationCommand;
      if (body.action === 'navigate') {
        if (!body.target) {
          throw new ResourceError('invalid_target', 'target is required for navigate action', 400);
        }
        message = {
          type: 'navigate',
          target: body.target,
          preserveClient: body.preserveClient,
          preserveParams: body.preserveParams ?? [],
        };
        if (body.setDefault !== false) nav.setDefault(body.target);
      } else {
        message = body.target ? { type: 'reload', target: body.target } : { type: 'reload' };
      }
      const delivered = nav.broadcast(group, message);
      console.log(`[Nav] ${body.action} → ${group} (${delivered} delivered)`);
      res.json({ ok: true, group, action: body.action });
    } catch (err) {
      sendError(res, err, 'Nav');
    }
  });

  router.get('/api/router/status', (_req, res) => {
    res.json(nav.status());
  });

  router.get('/api/router/default', (_req, res) => {
    res.json({ default: nav.getDefault() });
  });

  return router;
}
