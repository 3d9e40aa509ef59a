import express from 'express';
import type { Express } from 'express';
import type { Server } from 'node:http';
import { createLogger, generateCorrelationId } from './utils/logger.js';
import type { SessionRegistry } from './core/assistant/SessionRegistry.js';
import { createSessionRouter } from './adapters/http/sessionRouter.js';

const logger = createLogger({ component: 'server' });

export function createApp(sessions: SessionRegistry): Express {
  const app = express();

  app.use(express.json({ limit: '32kb' }));

  // Request logging middleware
  app.use((req, res, next) => {
    const requestId = req.get('x-request-id') ?? generateCorrelationId();
    res.setHeader('x-request-id', requestId);
    logger.info({ requestId, method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use('/sessions', createSessionRouter(sessions));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', sessions: sessions.size, timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if ('type' in err && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'INVALID_REQUEST', issues: ['body: Malformed JSON'] });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(sessions: SessionRegistry, port: number, host: string = '0.0.0.0'): Promise<Server> {
  const app = createApp(sessions);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
