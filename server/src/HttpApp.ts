import express from 'express';
import type { Express } from 'express';
import { errorHandler } from './HttpErrors.js';
import { createWorldsRouter } from './routes/worlds.js';
import { createCharactersRouter } from './routes/characters.js';
import { createDiscussionsRouter } from './routes/discussions.js';
import { createProgressStreamRouter } from './routes/progressStream.js';
import type { DiscussionRunEngine } from './DiscussionRunEngine.js';
import type { IDiscussionStore, IProgressRegistry } from './interfaces/index.js';
import type { ProgressFeed } from './ProgressFeed.js';
import type { WorldGenerator } from './WorldGenerator.js';

export interface HttpAppDeps {
  store: IDiscussionStore;
  registry: IProgressRegistry;
  engine: DiscussionRunEngine;
  feed: ProgressFeed;
  worldGenerator: WorldGenerator;
  corsOrigin: string;
  /** SSE keep-alive interval (ms) */
  pingIntervalMs?: number;
}

/** REST surface under /api plus the SSE stream. */
export function createHttpApp(deps: HttpAppDeps): Express {
  const { store, registry, engine, feed, worldGenerator, corsOrigin } = deps;
  const app = express();

  app.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', corsOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,DELETE,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Vary', 'Origin');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({ message: 'Discussion Forge API' });
  });
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  app.use('/api/worlds', createWorldsRouter({ store, engine, worldGenerator }));
  app.use('/api/characters', createCharactersRouter(store));
  app.use('/api/discussions', createProgressStreamRouter({ feed, registry, pingIntervalMs: deps.pingIntervalMs }));
  app.use('/api/discussions', createDiscussionsRouter({ store, registry, engine }));

  app.use((req, res) => {
    res.status(404).json({ error: 'not_found', detail: `No route for ${req.method} ${req.path}` });
  });
  app.use(errorHandler);

  return app;
}
