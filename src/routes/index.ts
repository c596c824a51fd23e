// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health (store, embedding provider and a health check of the LLM server) and /stats, and mounts the
//      query, capture, notes and indexing routers. Routers receive the services they use; none reach for globals.

import { Router, Request, Response, NextFunction } from 'express';
import type { Services } from '../services/container.js';
import { createCaptureRouter } from './capture.js';
import { createIndexingRouter } from './indexing.js';
import { createNotesRouter } from './notes.js';
import { createQueryRouter } from './query.js';

export function createRouter(services: Services): Router {
  const { config, store, embeddings, generation, indexer } = services;
  const router = Router();

  const embeddingInfo = () => ({
    id: embeddings.id,
    dimensions: embeddings.dimensions,
    degraded: embeddings.degraded,
  });

  router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const llm = await generation.checkHealth();
      res.json({
        status: llm.reachable && !embeddings.degraded ? 'ok' : 'degraded',
        vault_path: config.VAULT_PATH,
        vector_db: { kind: store.kind, location: store.location },
        llm: { base_url: generation.baseUrl, model: generation.model, ...llm },
        embedding: embeddingInfo(),
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({
        index_stats: await indexer.getIndexStats(),
        vault_path: config.VAULT_PATH,
        vector_db_path: store.location,
        llm_base_url: generation.baseUrl,
        embedding: embeddingInfo(),
      });
    } catch (err) {
      next(err);
    }
  });

  router.use('/query', createQueryRouter(services.queryEngine));
  router.use('/capture', createCaptureRouter(services.capture));
  router.use('/notes', createNotesRouter(services.inbox, services.notes));
  router.use('/', createIndexingRouter(indexer));

  return router;
}
