/**
 * Express server: JSON API for documents, forms, panels and navigation,
 * plus the WebSocket channels on the same http.Server.
 */

import express, { type Express } from 'express';
import { createServer, type Server } from 'http';
import { DocumentStore } from './documents.js';
import { FormManager } from './forms.js';
import { ButtonManager } from './buttons.js';
import { RealtimeHub } from './realtime-hub.js';
import { NavigationHub } from './navigation.js';
import { createDocumentRouter } from './document-routes.js';
import { createFormRouter, createTriggerRouter } from './form-routes.js';
import { createNavigationRouter } from './navigation-routes.js';
import { setupWebSocket } from './ws.js';
import type { ServerConfig } from './helpers.js';

export interface AppOptions {
  dataDir: string;
  sourcesDir: string;
  /** Log one `[HTTP]` line per request. Default true. */
  logRequests?: boolean;
  now?: () => number;
}

export interface CrowdmarkApp {
  app: Express;
  store: DocumentStore;
  hub: RealtimeHub;
  forms: FormManager;
  buttons: ButtonManager;
  nav: NavigationHub;
}

export function createApp(options: AppOptions): CrowdmarkApp {
  const { dataDir, sourcesDir, now } = options;
  const store = new DocumentStore({ dataDir, sourcesDir, now });
  const forms = new FormManager({ dataDir, now });
  const buttons = new ButtonManager({ dataDir, now });
  const hub = new RealtimeHub();
  const nav = new NavigationHub({ now });

  const app = express();
  app.use(express.json({ limit: '10mb' }));

  if (options.logRequests !== false) {
    app.use((req, _res, next) => {
      console.log(`[HTTP] ${req.method} ${req.path}`);
      next();
    });
  }

  app.get('/api/status', (_req, res) => {
    res.json({
      docs: store.listDocumentIds().length,
      subscribers: Object.fromEntries(hub.keys().map((key) => [key, hub.count(key)])),
      control: nav.status().groups,
    });
  });

  app.use(createDocumentRouter({ store, hub }));
  app.use(createFormRouter({ forms }));
  app.use(createTriggerRouter({ buttons }));
  app.use(createNavigationRouter({ nav }));

  return { app, store, hub, forms, buttons, nav };
}

export interface RunningServer extends CrowdmarkApp {
  server: Server;
  /** Actual bound port (differs from the configured one when that was 0). */
  port: number;
  close(): Promise<void>;
}

export async function startServer(
  config: ServerConfig,
  options: Pick<AppOptions, 'logRequests' | 'now'> = {},
): Promise<RunningServer> {
  const crowdmark = createApp({ dataDir: config.dataDir, sourcesDir: config.sourcesDir, ...options });
  const server = createServer(crowdmark.app);

  // Setup WebSocket on same server
  const wss = setupWebSocket(server, crowdmark);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : config.port;
  console.log(`[Server] Crowdmark running at http://${config.host}:${port}`);
  console.log(`[Server] Data: ${config.dataDir}  Sources: ${config.sourcesDir}`);

  const close = async (): Promise<void> => {
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => {
      wss.close(() => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    });
  };

  return { ...crowdmark, server, port, close };
}
