import express, { type Request, type Response, type NextFunction } from 'express';
import type { z } from 'zod';
import { env } from '../config/env.ts';
import { ValidationError, AuthError } from '../shared/errors.ts';
import { DashboardQuerySchema, RegionQuerySchema, RefreshSchema } from '../schemas.ts';
import { buildDashboard, buildFilterOptions, toDashboardRequest } from '../services/dashboard.ts';
import type { DatasetCache } from '../services/dataset-cache.ts';

// ── Zod validation ──

function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}

function requireAdmin(req: Request): void {
  if (!env.ADMIN_KEY) throw new AuthError('NO_ADMIN_KEY', 'ADMIN_KEY not configured');
  const fromQuery = typeof req.query.key === 'string' ? req.query.key : undefined;
  const provided = fromQuery ?? req.headers.authorization?.replace('Bearer ', '');
  if (provided !== env.ADMIN_KEY) throw new AuthError('AUTH_FAILED', 'Invalid admin key');
}

export function dashboardRouter(cache: DatasetCache): express.Router {
  const router = express.Router();

  /**
   * GET /api/regions — regions with dataset availability
   */
  router.get('/regions', (_req: Request, res: Response) => {
    res.json({ success: true, data: cache.regions() });
  });

  /**
   * GET /api/filters?region=CA — control options for one region
   */
  router.get('/filters', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { region } = parseInput(RegionQuerySchema, req.query);
      res.json({ success: true, data: buildFilterOptions(region, cache) });
    } catch (err) { next(err); }
  });

  /**
   * GET /api/dashboard — render model for one region/view/filter/query
   * Zod-validated: region, view, sectors, buckets, minScore, q
   */
  router.get('/dashboard', (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = toDashboardRequest(parseInput(DashboardQuerySchema, req.query));
      req.log?.debug({ request }, 'Building dashboard');
      res.json({ success: true, data: buildDashboard(request, { cache }) });
    } catch (err) { next(err); }
  });

  /**
   * POST /api/refresh — drop cached datasets so the next request re-reads them (protected)
   */
  router.post('/refresh', (req: Request, res: Response, next: NextFunction) => {
    try {
      requireAdmin(req);
      const { region } = parseInput(RefreshSchema, req.body ?? {});
      const invalidated = cache.invalidate(region);
      res.json({ success: true, data: { invalidated, region: region ?? 'all' } });
    } catch (err) { next(err); }
  });

  return router;
}
