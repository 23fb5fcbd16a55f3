import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { EnvironmentConfig } from './config/config';
import { DispatchError } from './models/errors';
import { createDispatchRouter } from './routes/dispatchRoutes';
import { DispatchEngine } from './services/DispatchEngine';
import { Logger, logger as rootLogger } from './utils/logger';

export interface AppOptions {
  engine: DispatchEngine;
  env: Pick<EnvironmentConfig, 'nodeEnv' | 'allowedOrigins'>;
  logger?: Logger;
}

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function createApp({ engine, env, logger = rootLogger }: AppOptions): express.Express {
  const app = express();
  const log = logger.child('http');

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(cors({
    origin: env.allowedOrigins,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Actor-Id', 'X-Actor-Role'],
    credentials: true
  }));

  app.use(express.json({ limit: '1mb' }));

  if (env.nodeEnv === 'development') {
    app.use((req, res, next) => {
      log.debug('Request', { method: req.method, path: req.path });
      next();
    });
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/api', createDispatchRouter(engine));

  app.get('/', (req, res) => {
    res.json({
      name: 'Repair Dispatch Service',
      version: '1.0.0',
      description: 'Matches repair jobs to nearby field workers',
      endpoints: {
        health: 'GET /api/health',
        workers: 'POST /api/workers',
        requests: 'POST /api/requests',
        nearby: 'GET /api/requests/nearby',
        accept: 'POST /api/requests/:id/accept',
        metrics: 'GET /api/metrics',
        notifications: 'GET /api/notifications'
      }
    });
  });

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Endpoint ${req.method} ${req.path} not found`
      }
    });
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof DispatchError) {
      res.status(err.status).json({
        success: false,
        error: { code: err.code, message: err.message, details: err.details }
      });
      return;
    }

    if (isJsonSyntaxError(err)) {
      res.status(400).json({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' }
      });
      return;
    }

    log.error('Unhandled error', err, { method: req.method, path: req.path });
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: env.nodeEnv === 'development' && err instanceof Error ? err.message : 'Internal server error'
      }
    });
  });

  return app;
}
