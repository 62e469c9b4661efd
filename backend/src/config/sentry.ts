/**
 * config/sentry.ts — Sentry error tracking (opt-in)
 *
 * Enable by setting SENTRY_DSN in environment.
 * When disabled, all functions are no-ops.
 *
 * Only unexpected failures are reported. Missing datasets and empty filter
 * results are user-facing outcomes and never reach Sentry.
 */
import type { ErrorRequestHandler } from 'express';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';

type SentryModule = typeof import('@sentry/node');

const log = childLogger({ module: 'sentry' });

let Sentry: SentryModule | null = null;

/**
 * Initialize Sentry. Call once at server startup.
 * No-op if SENTRY_DSN is not set.
 */
export async function initSentry(): Promise<void> {
  const dsn = env.SENTRY_DSN;
  if (!dsn) {
    log.info('Sentry disabled (no SENTRY_DSN)');
    return;
  }

  const mod = await import('@sentry/node');
  mod.init({
    dsn,
    environment: env.NODE_ENV,
    release: process.env.npm_package_version || 'unknown',
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers.cookie;
      }
      return event;
    },
  });

  Sentry = mod;
  log.info('Sentry initialized');
}

/**
 * Capture an exception manually.
 */
export function captureException(err: unknown, context?: Record<string, unknown>): void {
  if (!Sentry) return;
  Sentry.captureException(err, context ? { extra: context } : undefined);
}

/**
 * Express error handler middleware. Place before the JSON error responder.
 * Passes the error through untouched when Sentry is not running.
 */
export function sentryErrorHandler(): ErrorRequestHandler {
  return (err, _req, _res, next) => {
    if (Sentry && !(typeof err === 'object' && err !== null && 'expose' in err && err.expose === true)) {
      Sentry.captureException(err);
    }
    next(err);
  };
}

/**
 * Flush pending events before shutdown.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
  if (!Sentry) return;
  await Sentry.flush(timeout);
}
