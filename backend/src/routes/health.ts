/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness: dataset files + cache + memory
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';
import type { DatasetCache } from '../services/dataset-cache.ts';

export function healthRouter(cache: DatasetCache): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const regions = cache.regions();
    const available = regions.filter(r => r.available).map(r => r.region);
    const mem = process.memoryUsage();

    // Ready once at least one region has a backing file
    const ready = available.length > 0;

    res.status(ready ? 200 : 503).json({
      status: ready ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      checks: {
        datasets: { status: ready ? 'ok' : 'error', available },
        cache: { status: 'ok', details: cache.stats() },
        memory: {
          status: 'ok',
          details: {
            heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
            rssMB: Math.round(mem.rss / 1024 / 1024),
          },
        },
      },
      config: {
        nodeEnv: env.NODE_ENV,
        dataDir: env.DATA_DIR,
        datasetFile: env.DATASET_FILE,
      },
    });
  });

  return router;
}
