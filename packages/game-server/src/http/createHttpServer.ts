import { type Logger, logger as defaultLogger, type SessionRegistry } from '@number-guess/engine';
import express, { type Express } from 'express';
import { createSessionRouter } from './sessionsRouter.js';

export function createHttpServer(registry: SessionRegistry, logger: Logger = defaultLogger): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // API routes
  app.use('/api/sessions', createSessionRouter(registry, logger));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', sessions: registry.size });
  });

  return app;
}
