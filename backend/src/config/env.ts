/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a variable is malformed.
 * Provides typed access to all config values.
 */
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const BUCKETS = ['Hot', 'Warm', 'Cold'] as const;

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  API_BASE: z.string().default('/api'),
  ALLOWED_ORIGINS: z.string().default('*'),
  ADMIN_KEY: z.string().min(1).optional(),

  // ── Datasets ──
  DATA_DIR: z.string().default('data'),
  DATASET_FILE: z.string().min(1).default('formd_investor_intent.csv'),

  // ── Filter / query defaults ──
  DEFAULT_MIN_INTENT_SCORE: z.coerce.number().min(0).max(1).default(0.45),
  DEFAULT_INTENT_BUCKETS: z.string()
    .default('Hot,Warm')
    .transform(s => s.split(',').map(b => b.trim()).filter(Boolean))
    .pipe(z.array(z.enum(BUCKETS))),
  QUERY_TOP_K: z.coerce.number().int().min(1).max(100).default(5),

  // ── Rate Limiting ──
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
