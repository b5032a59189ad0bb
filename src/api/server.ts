/**
 * HTTP API
 *
 * Express app over the scheduler: request ids, CORS, JSON bodies, per-request
 * logging and a rate limit on /api. Routes live in schedule-routes.ts and
 * content-routes.ts; this file owns the middleware chain and error mapping.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import rateLimit, { ipKeyGenerator } from 'express-rate-limit';
import type { Server } from 'http';
import { ZodError } from 'zod';
import type { Logger } from '../core/types.js';
import type { Scheduler } from '../services/scheduler/index.js';
import { createScheduleRoutes } from './schedule-routes.js';
import { createContentRoutes } from './content-routes.js';
import { getRequestId, resolveRequestId, sendError } from './responses.js';

export interface CreateAppOptions {
  rateLimit?: { windowMs: number; limit: number };
}

const DEFAULT_RATE_LIMIT = { windowMs: 60 * 1000, limit: 100 };
const SLOW_REQUEST_MS = 5000;

export function getRateLimitKey(req: Request): string {
  return `ip:${ipKeyGenerator(req.ip ?? '127.0.0.1')}`;
}

export function createApp(scheduler: Scheduler, logger: Logger, options: CreateAppOptions = {}): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const requestId = resolveRequestId(req.header('x-request-id'));
    res.setHeader('x-request-id', requestId);
    next();
  });

  app.use(cors({
    origin: [/localhost/, /127\.0\.0\.1/],
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Requested-With', 'X-Request-Id'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use('/api', (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      const durationMs = Date.now() - startedAt;
      const payload = {
        event: 'api_request',
        requestId: getRequestId(res),
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs,
      };

      if (res.statusCode >= 500) {
        logger.error('API request', payload);
      } else if (res.statusCode >= 400) {
        logger.warn('API request', payload);
      } else {
        logger.info('API request', payload);
      }

      if (durationMs > SLOW_REQUEST_MS) {
        logger.warn('Slow request', payload);
      }
    });
    next();
  });

  const limits = options.rateLimit ?? DEFAULT_RATE_LIMIT;
  app.use('/api/', rateLimit({
    windowMs: limits.windowMs,
    limit: limits.limit,
    keyGenerator: (req) => getRateLimitKey(req),
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      worker: scheduler.worker.isRunning ? 'running' : 'stopped',
      queue: scheduler.service.summary(),
    });
  });

  app.use('/api/schedule', createScheduleRoutes(scheduler));
  app.use('/api/content', createContentRoutes(scheduler));

  app.use('/api', (_req, res) => {
    sendError(res, 404, 'Not found');
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      sendError(res, 400, err.issues[0]?.message ?? 'Invalid payload', 'invalid_request');
      return;
    }
    if (err instanceof SyntaxError) {
      sendError(res, 400, 'Request body must be valid JSON', 'invalid_request');
      return;
    }
    logger.error('Unhandled API error', {
      requestId: getRequestId(res),
      method: req.method,
      path: req.originalUrl,
      error: err instanceof Error ? err.message : String(err),
    });
    sendError(res, 500, 'Internal server error');
  });

  return app;
}

export function startServer(app: express.Express, port: number, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, '0.0.0.0', () => {
      logger.info('Scheduler API started', { port, url: `http://0.0.0.0:${port}` });
      resolve(server);
    });
    server.once('error', reject);
  });
}
