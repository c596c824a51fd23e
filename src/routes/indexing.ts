// src/routes/indexing.ts
// What: Index maintenance routes.
// How: POST /reindex rebuilds the whole index ({ force } clears it first). POST /index/file indexes one file and
//      DELETE /index/file removes a file's entries; relative paths resolve against the vault and indexing refuses
//      anything outside it. GET /index/search lists entries whose file name matches a regular expression, with
//      the total number of matches in count.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { IndexManager, MAX_PATTERN_CHARS } from '../services/indexer.js';

const reindexSchema = z.object({
  force: z.boolean().optional().default(false),
});

const fileSchema = z.object({
  path: z.string().trim().min(1, 'path must not be empty'),
});

const searchSchema = z.object({
  pattern: z.string().min(1, 'pattern must not be empty').max(MAX_PATTERN_CHARS),
  limit: z.coerce.number().int().positive().max(1000).optional().default(10),
});

function badRequest(res: Response, message: string): void {
  res.status(400).json({ error: { message, code: 'INVALID_INPUT' } });
}

export function createIndexingRouter(indexer: IndexManager): Router {
  const router = Router();

  router.post('/reindex', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = reindexSchema.safeParse(req.body ?? {});
      if (!parsed.success) return badRequest(res, parsed.error.message);
      res.json(await indexer.rebuildIndex(parsed.data.force));
    } catch (err) {
      next(err);
    }
  });

  router.post('/index/file', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = fileSchema.safeParse(req.body);
      if (!parsed.success) return badRequest(res, parsed.error.message);
      res.json(await indexer.incrementalIndex(parsed.data.path));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/index/file', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = fileSchema.safeParse(req.body);
      if (!parsed.success) return badRequest(res, parsed.error.message);
      res.json({ removed: await indexer.removeFromIndex(parsed.data.path) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/index/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = searchSchema.safeParse(req.query);
      if (!parsed.success) return badRequest(res, parsed.error.message);
      res.json(await indexer.findByFilePattern(parsed.data.pattern, parsed.data.limit));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
