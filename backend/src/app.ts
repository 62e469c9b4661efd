/**
 * app.ts — Express application factory
 *
 * Split from server.ts so tests can mount the app on an ephemeral port
 * with their own dataset cache.
 */
import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { env } from './config/env.ts';
import { sentryErrorHandler } from './config/sentry.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsMiddleware, metricsEndpoint } from './shared/metrics.ts';
import { isAppError, ValidationError } from './shared/errors.ts';
import { dashboardRouter } from './routes/dashboard.ts';
import { healthRouter } from './routes/health.ts';
import { getDatasetCache, type DatasetCache } from './services/dataset-cache.ts';
import type { ApiResponse } from './types.ts';

export interface AppOptions {
  cache?: DatasetCache;
  rateLimitMax?: number;
}

export function createApp(opts: AppOptions = {}): express.Express {
  const cache = opts.cache ?? getDatasetCache();
  const rateLimitMax = opts.rateLimitMax ?? env.RATE_LIMIT_MAX;
  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const allowedOrigins = env.ALLOWED_ORIGINS.split(',').map(s => s.trim());
  app.use(cors({
    origin: allowedOrigins.includes('*') ? true : allowedOrigins,
  }));

  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '10kb' }));

  // ─── Prometheus metrics (early — measures everything) ───

  app.use(metricsMiddleware());

  // ─── Structured request logging (Pino) ───

  app.use(requestLogger());

  // ─── Security headers ───

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  // ─── Rate limiting (in-memory, per window) ───

  const ipHits = new Map<string, number>();
  setInterval(() => ipHits.clear(), env.RATE_LIMIT_WINDOW_MS).unref();

  app.use(env.API_BASE, (req, res, next) => {
    if (req.method !== 'GET') return next();
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const hits = (ipHits.get(ip) || 0) + 1;
    ipHits.set(ip, hits);
    res.setHeader('X-RateLimit-Limit', String(rateLimitMax));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, rateLimitMax - hits)));
    if (hits > rateLimitMax) {
      const body: ApiResponse = { success: false, error: 'Rate limited', code: 'RATE_LIMITED' };
      res.status(429).json(body);
      return;
    }
    next();
  });

  // ─── API Routes ───

  app.get(`${env.API_BASE}/metrics`, metricsEndpoint);
  app.use(`${env.API_BASE}/health`, healthRouter(cache));
  app.use(env.API_BASE, dashboardRouter(cache));

  app.use(env.API_BASE, (req, res) => {
    const body: ApiResponse = { success: false, error: `Not found: ${req.method} ${req.originalUrl}`, code: 'NOT_FOUND' };
    res.status(404).json(body);
  });

  // ─── Error handling: Sentry first, then structured response ───

  app.use(sentryErrorHandler());
  app.use(errorResponder);

  return app;
}

const errorResponder: ErrorRequestHandler = (err, req, res, _next) => {
  const requestId = req.id || randomUUID().slice(0, 8);
  const log = req.log ?? logger;

  if (isAppError(err)) {
    log.warn({ code: err.code, status: err.status }, err.message);
    const body: ApiResponse = {
      success: false,
      error: err.message,
      code: err.code,
      details: err instanceof ValidationError ? err.details : undefined,
      requestId,
    };
    res.status(err.status).json(body);
    return;
  }

  log.error({ err, method: req.method, url: req.url }, `Unhandled error [${requestId}]`);
  const body: ApiResponse = {
    success: false,
    error: env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message,
    code: 'INTERNAL',
    requestId,
  };
  res.status(500).json(body);
};
