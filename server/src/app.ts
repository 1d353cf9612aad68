import express, { Express } from 'express';
import type { Logger } from 'pino';
import healthRouter from './routes/health';
import { createStatusRouter } from './routes/status';
import { createCheckRouter } from './routes/check';
import { MonitorView, SubscriberCount } from './routes/types';
import { createGlobalRateLimit, createCheckRateLimit } from './middleware/rateLimit';
import { createRequestLogger } from './middleware/requestLogger';
import { errorHandler } from './utils/errors';
import defaultLogger from './utils/logger';

export interface AppDeps {
  monitor: MonitorView;
  subscribers: SubscriberCount;
  logger?: Logger;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));
  app.use(createGlobalRateLimit());
  app.use(createRequestLogger({ logger: deps.logger ?? defaultLogger }));

  app.use('/api/health', healthRouter);
  app.use('/api/status', createStatusRouter(deps.monitor, deps.subscribers));
  app.use('/api/check', createCheckRateLimit(), createCheckRouter(deps.monitor));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Must be registered after all routes
  app.use(errorHandler);

  return app;
}
