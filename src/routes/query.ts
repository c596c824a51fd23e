// src/routes/query.ts
// What: POST /query, question answering over the indexed vault.
// How: Validates { query, top_k? } with zod and hands off to the QueryEngine. Failures go to the error handler.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { DEFAULT_TOP_K, QueryEngine } from '../services/queryEngine.js';

const schema = z.object({
  query: z.string().trim().min(1, 'query must not be empty').max(2000),
  top_k: z.number().int().positive().max(100).optional().default(DEFAULT_TOP_K),
});

export function createQueryRouter(queryEngine: QueryEngine): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'INVALID_INPUT' } });
        return;
      }
      const { query, top_k } = parsed.data;
      res.json(await queryEngine.query(query, top_k));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
