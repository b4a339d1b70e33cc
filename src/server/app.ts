import express, { type Express, type Request, type Response } from 'express';
import type { ContentStore } from './content-store.js';
import { SERVER_CONSTANTS } from '../config/constants.js';

export interface AppDeps {
  store: ContentStore;
  filePath: string;
  route: string;
  contentType: string;
  /** Reports whether a watch is currently active */
  isWatching?: () => boolean;
}

export interface HealthData {
  status: 'ok' | 'degraded';
  file: string;
  loadedAt: string | null;
  bytes: number;
  watching: boolean;
  reloads: number;
  failedReloads: number;
}

/** GET <route> — Serves the last good copy of the watched file. */
export function handleContent(deps: AppDeps) {
  return (_req: Request, res: Response): void => {
    const snapshot = deps.store.get();
    if (!snapshot) {
      res.status(503).json({ error: 'content not loaded yet' });
      return;
    }

    res
      .status(200)
      .set('Content-Type', deps.contentType)
      .set('Last-Modified', snapshot.loadedAt.toUTCString())
      .send(snapshot.data);
  };
}

/** GET /healthz — Reports whether content is loaded and being watched. */
export function handleHealth(deps: AppDeps) {
  return (_req: Request, res: Response): void => {
    const snapshot = deps.store.get();
    const stats = deps.store.getStats();

    const data: HealthData = {
      status: snapshot ? 'ok' : 'degraded',
      file: deps.filePath,
      loadedAt: snapshot ? snapshot.loadedAt.toISOString() : null,
      bytes: snapshot ? snapshot.data.length : 0,
      watching: deps.isWatching ? deps.isWatching() : false,
      reloads: stats.reloads,
      failedReloads: stats.failedReloads
    };

    res.status(200).json(data);
  };
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get(deps.route, handleContent(deps));
  app.get(SERVER_CONSTANTS.HEALTH_ROUTE, handleHealth(deps));

  return app;
}
