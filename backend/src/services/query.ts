/**
 * query.ts — Free-text query interpreter
 *
 * A query is matched against a fixed keyword table and planned into an
 * ordered list of named steps, each a pure Subset → Subset function:
 *
 *   1. sector:<kw>       keep records whose sector contains the keyword
 *   2. sort:<key>        one ranking step: composite when both size and speed
 *                        words appear, else velocity, else capital
 *   3. bucket:<bucket>   keep one intent bucket (hot → warm → cold, ANDed)
 *   4. limit:<k>         keep the first k records
 *
 * Keywords match case-insensitively at the start of a word ("fastest",
 * "emails"). Sector keywords must be the whole word (plural allowed), so
 * "email", "aim" and "healthy" select no sector.
 */
import { percentileRanks } from './helpers.ts';
import { INTENT_BUCKETS, type FundRecord, type IntentBucket, type QueryResult } from '../types.ts';

export const SECTOR_KEYWORDS = ['fintech', 'saas', 'ai', 'crypto', 'health', 'climate'] as const;
export const LARGENESS_KEYWORDS = ['large', 'big', 'huge', 'massive'] as const;
export const SPEED_KEYWORDS = ['fast', 'quick', 'rapid', 'speed'] as const;
export const URGENCY_KEYWORDS = ['email', 'this week', 'reach out', 'outreach', 'contact'] as const;

export const COMPOSITE_WEIGHTS = { capital: 0.45, velocity: 0.35, intent: 0.2 } as const;
export const DEFAULT_TOP_K = 5;

export interface QueryStep {
  name: string;
  apply: (records: readonly FundRecord[]) => FundRecord[];
}

export interface QuerySignals {
  sector: string | null;
  large: boolean;
  speed: boolean;
  buckets: IntentBucket[];
  urgent: boolean;
}

export interface QueryOptions {
  topK?: number;
}

const escape = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function wordPattern(words: readonly string[]): RegExp {
  return new RegExp(`\\b(${words.map(escape).join('|')})`, 'i');
}

function wholeWordPattern(words: readonly string[]): RegExp {
  return new RegExp(`\\b(${words.map(escape).join('|')})s?\\b`, 'i');
}

const PATTERNS = {
  sector: wholeWordPattern(SECTOR_KEYWORDS),
  large: wordPattern(LARGENESS_KEYWORDS),
  speed: wordPattern(SPEED_KEYWORDS),
  urgent: wordPattern(URGENCY_KEYWORDS),
  buckets: INTENT_BUCKETS.map(b => ({ bucket: b, pattern: wordPattern([b.toLowerCase()]) })),
};

/** Match the query text against the keyword table. */
export function detectSignals(text: string): QuerySignals {
  const sectorMatch = PATTERNS.sector.exec(text);
  return {
    sector: sectorMatch?.[1]?.toLowerCase() ?? null,
    large: PATTERNS.large.test(text),
    speed: PATTERNS.speed.test(text),
    buckets: PATTERNS.buckets.filter(b => b.pattern.test(text)).map(b => b.bucket),
    urgent: PATTERNS.urgent.test(text),
  };
}

// ── Steps ──

function sectorStep(keyword: string): QueryStep {
  return {
    name: `sector:${keyword}`,
    apply: records => records.filter(r => r.sector.toLowerCase().includes(keyword)),
  };
}

function sortStep(name: string, key: 'recentCapitalDeployed' | 'capitalVelocity'): QueryStep {
  return {
    name,
    apply: records => [...records].sort((a, b) => b[key] - a[key]),
  };
}

/**
 * Weighted percentile-rank score per record, index-aligned with the input.
 * Ranks are taken within the given subset.
 */
export function compositeScores(records: readonly FundRecord[]): number[] {
  const cap = percentileRanks(records.map(r => r.recentCapitalDeployed));
  const vel = percentileRanks(records.map(r => r.capitalVelocity));
  const intent = percentileRanks(records.map(r => r.investorIntentScore));
  return records.map((_, i) =>
    COMPOSITE_WEIGHTS.capital * (cap[i] ?? 0)
    + COMPOSITE_WEIGHTS.velocity * (vel[i] ?? 0)
    + COMPOSITE_WEIGHTS.intent * (intent[i] ?? 0));
}

const compositeStep: QueryStep = {
  name: 'sort:composite',
  apply: records => {
    const scores = compositeScores(records);
    return records
      .map((r, i) => ({ r, score: scores[i] ?? 0 }))
      .sort((a, b) =>
        b.score - a.score
        || b.r.recentCapitalDeployed - a.r.recentCapitalDeployed
        || b.r.capitalVelocity - a.r.capitalVelocity
        || b.r.investorIntentScore - a.r.investorIntentScore
        || a.r.fundName.localeCompare(b.r.fundName))
      .map(e => e.r);
  },
};

function bucketStep(bucket: IntentBucket): QueryStep {
  return {
    name: `bucket:${bucket}`,
    apply: records => records.filter(r => r.intentBucket === bucket),
  };
}

function limitStep(k: number): QueryStep {
  return {
    name: `limit:${k}`,
    apply: records => records.slice(0, k),
  };
}

// ── Plan table ──

type StepRule = (signals: QuerySignals, topK: number) => QueryStep[];

/** Rules run in priority order; each may contribute zero or more steps. */
const STEP_TABLE: readonly StepRule[] = [
  s => (s.sector ? [sectorStep(s.sector)] : []),
  s => {
    if (s.large && s.speed) return [compositeStep];
    if (s.speed) return [sortStep('sort:velocity', 'capitalVelocity')];
    if (s.large) return [sortStep('sort:capital', 'recentCapitalDeployed')];
    return [];
  },
  s => s.buckets.map(bucketStep),
  (s, k) => (s.urgent ? [limitStep(k)] : []),
];

export function planQuery(text: string, opts: QueryOptions = {}): QueryStep[] {
  const topK = opts.topK ?? DEFAULT_TOP_K;
  const signals = detectSignals(text);
  return STEP_TABLE.flatMap(rule => rule(signals, topK));
}

/**
 * Interpret `text` over an already-filtered subset. Empty text returns the
 * input unchanged with no summary.
 */
export function interpretQuery(records: readonly FundRecord[], text: string, opts: QueryOptions = {}): QueryResult {
  const q = text.trim();
  if (!q) return { records: [...records], steps: [], summary: null };

  const steps = planQuery(q, opts);
  const out = steps.reduce<FundRecord[]>((temp, step) => step.apply(temp), [...records]);
  return { records: out, steps: steps.map(s => s.name), summary: out.length };
}
