// src/routes/notes.ts
// What: Vault note maintenance. POST /notes/process files an inbox note by category; GET /notes/stats?path=
//      reports size, word and line counts of a note. Paths are relative to the vault and must stay inside it.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { InboxProcessor } from '../services/inbox.js';
import type { NoteWriter } from '../services/noteWriter.js';

const pathSchema = z.object({
  path: z.string().trim().min(1, 'path must not be empty'),
});

export function createNotesRouter(inbox: InboxProcessor, notes: NoteWriter): Router {
  const router = Router();

  router.post('/process', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = pathSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'INVALID_INPUT' } });
        return;
      }
      res.json(await inbox.process(parsed.data.path));
    } catch (err) {
      next(err);
    }
  });

  router.get('/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = pathSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'INVALID_INPUT' } });
        return;
      }
      res.json(await notes.getFileStats(parsed.data.path));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
