// src/app.ts
// What: Express application factory.
// How: JSON body limit, request logging, the root router and a centralized error handler returning
//      { error: { message, code } }. Status comes from the error's kind: invalid input 400, unavailable
//      backend 503, undecodable LLM response 502, anything else 500.

import express, { Express, NextFunction, Request, Response } from 'express';
import { errorKind, KnowledgeError, ResponseShapeError } from './errors.js';
import type { Logger } from './logging.js';
import { createRouter } from './routes/index.js';
import type { Services } from './services/container.js';

export function statusForError(err: unknown): number {
  if (err instanceof ResponseShapeError) return 502;
  switch (errorKind(err)) {
    case 'invalid_input':
      return 400;
    case 'backend_unavailable':
      return 503;
    default: {
      // body-parser errors carry their own 4xx status
      const status: unknown = typeof err === 'object' && err !== null ? Reflect.get(err, 'status') : undefined;
      return typeof status === 'number' && status >= 400 && status < 500 ? status : 500;
    }
  }
}

function requestLogger(log: Logger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      log.info(
        { method: req.method, path: req.path, status: res.statusCode, duration_ms: Date.now() - start },
        'request',
      );
    });
    next();
  };
}

export function createApp(services: Services): Express {
  const log = services.log.child({ module: 'http' });
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '5mb' }));
  app.use(requestLogger(log));

  app.use('/', createRouter(services));

  // Centralized error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(err);
    const code = err instanceof KnowledgeError ? err.code : status < 500 ? 'BAD_REQUEST' : 'INTERNAL';
    const message = err instanceof Error ? err.message : 'Internal Server Error';
    if (status >= 500) {
      log.error({ err, status, code }, 'Request failed');
    } else {
      log.warn({ err, status, code }, 'Request rejected');
    }
    res.status(status).json({ error: { message, code } });
  });

  return app;
}
