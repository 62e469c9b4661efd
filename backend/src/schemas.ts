// ═══════════════════════════════════════════════════════
// Zod Schemas — Dataset rows and API input validation
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { REGIONS, INTENT_BUCKETS, VIEW_MODES, type IntentBucket } from './types.ts';
import { parseCalendarDate } from './services/helpers.ts';

/** "🔥 Hot", "hot", " HOT " → "Hot" */
export function parseIntentBucket(raw: string): IntentBucket | null {
  const word = raw.replace(/[^a-z]/gi, '').toLowerCase();
  return INTENT_BUCKETS.find(b => b.toLowerCase() === word) ?? null;
}

// ── Shared enums ──

export const RegionEnum = z.string().trim().toUpperCase().pipe(z.enum(REGIONS));
export const ViewModeEnum = z.enum(VIEW_MODES);

const IntentBucketField = z.string().transform((s, ctx) => {
  const bucket = parseIntentBucket(s);
  if (!bucket) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown intent bucket "${s}"` });
    return z.NEVER;
  }
  return bucket;
});

// ── Dataset rows ──

const blankToZero = (v: unknown): unknown => (v === undefined || (typeof v === 'string' && v.trim() === '') ? 0 : v);

/** Required metric: blank cells are rejected */
const metric = z.string().trim().min(1, 'Required').pipe(z.coerce.number().finite());
/** Secondary metric: blank cells read as 0 */
const optionalMetric = z.preprocess(blankToZero, z.coerce.number().finite());

const TRUE_WORDS = new Set(['true', '1', 'yes', 'y', 't']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'n', 'f', '']);

const flag = z.string().default('').transform((s, ctx) => {
  const v = s.trim().toLowerCase();
  if (TRUE_WORDS.has(v)) return true;
  if (FALSE_WORDS.has(v)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a boolean: "${s}"` });
  return z.NEVER;
});

const calendarDate = z.string().default('').transform((s, ctx) => {
  const d = parseCalendarDate(s);
  if (!d) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Malformed date "${s}"` });
    return z.NEVER;
  }
  return d;
});

/** One raw CSV row as produced upstream. Unlisted columns are stripped. */
export const RawFilingRowSchema = z.object({
  issuer_name: z.string().trim().min(1, 'Required'),
  issuer_state: RegionEnum,
  fund_vertical: z.string().trim().default(''),
  filing_date: calendarDate,
  intent_bucket: IntentBucketField,
  actively_deploying: flag,
  offering_amount_total: optionalMetric,
  total_amount_sold: optionalMetric,
  decayed_amount_sold: metric,
  sale_velocity: metric,
  sale_acceleration: optionalMetric,
  fund_momentum: optionalMetric,
  investor_intent_score: metric.pipe(z.number().min(0).max(1)),
  related_person_name: z.string().default(''),
  number_of_investors: optionalMetric,
  why_investor: z.string().trim().default(''),
  days_since_filing: optionalMetric,
});

export type RawFilingRow = z.infer<typeof RawFilingRowSchema>;

// ── GET /api/dashboard ──

/**
 * ?x=a&x=b → ["a", "b"]; a single ?x=a → ["a"]. Values are never split,
 * sector names may contain commas.
 */
const listParam = z.union([
  z.string().transform(s => [s]),
  z.array(z.string()),
]).transform(items => items.map(s => s.trim()).filter(Boolean));

const blankToUndefined = (v: unknown): unknown => (typeof v === 'string' && v.trim() === '' ? undefined : v);

export const DashboardQuerySchema = z.object({
  region: RegionEnum,
  view: ViewModeEnum.default('founder'),
  sectors: listParam.default([]),
  buckets: listParam.pipe(z.array(IntentBucketField)).optional(),
  minScore: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).optional()),
  q: z.string().max(200).default(''),
});

export type DashboardQueryInput = z.infer<typeof DashboardQuerySchema>;

// ── GET /api/filters ──

export const RegionQuerySchema = z.object({
  region: RegionEnum,
});

// ── POST /api/refresh ──

export const RefreshSchema = z.object({
  region: RegionEnum.optional(),
});
