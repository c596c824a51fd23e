// src/routes/capture.ts
// What: POST /capture, saves clipped web content into the vault and indexes it.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { CaptureService } from '../services/capture.js';

const schema = z.object({
  url: z.string().min(1),
  title: z.string().default(''),
  content: z.string().min(1, 'content must not be empty'),
});

export function createCaptureRouter(capture: CaptureService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'INVALID_INPUT' } });
        return;
      }
      res.json(await capture.capture(parsed.data));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
