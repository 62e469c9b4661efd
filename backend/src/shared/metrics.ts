/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   fia_http_requests_total            — Counter by method/route/status
 *   fia_http_request_duration_seconds  — Histogram by method/route/status
 *   fia_dataset_cache_operations_total — Counter by operation (hit/miss/invalidate)
 *   fia_dataset_load_duration_seconds  — Histogram by region/status
 *   fia_dataset_records                — Gauge of loaded records per region
 *   fia_dashboard_builds_total         — Counter by view/outcome
 */
import {
  Registry, Counter, Histogram, Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'fia_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'fia_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'fia_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

// ── Dataset Metrics ──

export const cacheOperations = new Counter({
  name: 'fia_dataset_cache_operations_total',
  help: 'Dataset cache operations by type',
  labelNames: ['operation'] as const, // hit, miss, invalidate
  registers: [registry],
});

export const datasetLoadDuration = new Histogram({
  name: 'fia_dataset_load_duration_seconds',
  help: 'Time spent reading and parsing a region dataset',
  labelNames: ['region', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const datasetRecords = new Gauge({
  name: 'fia_dataset_records',
  help: 'Number of records held for a region',
  labelNames: ['region'] as const,
  registers: [registry],
});

export const dashboardBuilds = new Counter({
  name: 'fia_dashboard_builds_total',
  help: 'Dashboard render models built',
  labelNames: ['view', 'outcome'] as const, // ok, empty, missing
  registers: [registry],
});

// ── Express Middleware ──

function normalizeRoute(req: Request): string {
  const url = req.baseUrl + (req.route?.path ?? '') || req.originalUrl || req.url;
  return url.split('?')[0] ?? url;
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.url === '/api/metrics') return next();

    const end = httpRequestDuration.startTimer();

    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch (err) {
    res.status(500).end(`Error collecting metrics: ${err instanceof Error ? err.message : String(err)}`);
  }
}
