import express from 'express';
import type { Services } from '../core/runtime.js';
import { router } from './routes.js';

function resOnFinish(res: express.Response, cb: () => void) {
  res.on('finish', cb);
}

export function createApp(services: Services): express.Express {
  const { log } = services;
  const app = express();

  app.use(express.json({ limit: '512kb' }));

  // CORS support for frontend integration
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.use('/', router(services));

  // Malformed JSON bodies and other errors raised before a route runs
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: 'invalid_request', message: 'Request body is not valid JSON' } });
      return;
    }
    log.error({ err }, 'unhandled request error');
    res.status(500).json({ error: { code: 'internal_error', message: 'Internal server error' } });
  });

  return app;
}
