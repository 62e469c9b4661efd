/**
 * aggregator.ts — Aggregate statistics engine
 * Pure functions over a record subset: concentration, monthly rolling sums,
 * quantile counts, anomaly counts and per-GP rollups.
 * Ratios whose denominator is 0 are defined as 0.
 */
import { sum, mean, median, quantile, safeDiv, monthStart, monthRange } from './helpers.ts';
import type { ConcentrationCurve, FundRecord, GpRollup, MonthlyBucket } from '../types.ts';

export const ANOMALY_SCORE_FLOOR = 0.75;
export const ROLLING_WINDOW = 3;

const byCapitalDesc = (records: readonly FundRecord[]): number[] =>
  records.map(r => r.recentCapitalDeployed).sort((a, b) => b - a);

/**
 * Share of total recent capital held by the top floor(p × N) records.
 * 0 when that slice is empty or total capital is 0.
 */
export function concentrationRatio(records: readonly FundRecord[], p: number): number {
  const sorted = byCapitalDesc(records);
  const k = Math.floor(p * sorted.length);
  if (k <= 0) return 0;
  return safeDiv(sum(sorted.slice(0, k)), sum(sorted));
}

/**
 * Running cumulative share of recent capital, largest first, with the
 * equality line for the same number of points.
 */
export function concentrationCurve(records: readonly FundRecord[]): ConcentrationCurve {
  const sorted = byCapitalDesc(records);
  const total = sum(sorted);
  let running = 0;
  const share = sorted.map(v => {
    running += v;
    return safeDiv(running, total);
  });
  const n = sorted.length;
  const equality = sorted.map((_, i) => (n > 1 ? i / (n - 1) : 0));
  return { share, equality };
}

/**
 * Monthly recent-capital totals from the first to the last filing month
 * (empty months total 0) with a trailing simple moving average. Buckets
 * without a full window carry `rollingMean: null`.
 */
export function monthlyRolling(records: readonly FundRecord[], window = ROLLING_WINDOW): MonthlyBucket[] {
  if (records.length === 0) return [];

  const totals = new Map<string, number>();
  for (const r of records) {
    const key = monthStart(r.filingDate);
    totals.set(key, (totals.get(key) ?? 0) + r.recentCapitalDeployed);
  }

  const keys = [...totals.keys()].sort();
  const first = keys[0];
  const last = keys[keys.length - 1];
  if (!first || !last) return [];

  const months = monthRange(first, last).map(month => ({ month, total: totals.get(month) ?? 0 }));
  return months.map((m, i) => ({
    ...m,
    rollingMean: i + 1 >= window ? mean(months.slice(i + 1 - window, i + 1).map(x => x.total)) : null,
  }));
}

/** Records whose capital velocity is at or above the q-th quantile. */
export function quantileThresholdCount(records: readonly FundRecord[], q: number): number {
  const velocities = records.map(r => r.capitalVelocity);
  const threshold = quantile(velocities, q);
  return velocities.filter(v => v >= threshold).length;
}

/** High intent (> 0.75) paired with below-median recent capital. */
export function anomalyCount(records: readonly FundRecord[], scoreFloor = ANOMALY_SCORE_FLOOR): number {
  const med = median(records.map(r => r.recentCapitalDeployed));
  return records.filter(r => r.investorIntentScore > scoreFloor && r.recentCapitalDeployed < med).length;
}

/**
 * Group by normalised GP name. Names that normalise to the same string are
 * merged. Groups come back in first-seen order.
 */
export function gpRollup(records: readonly FundRecord[]): GpRollup[] {
  const groups = new Map<string, FundRecord[]>();
  for (const r of records) {
    const g = groups.get(r.gpName);
    if (g) g.push(r);
    else groups.set(r.gpName, [r]);
  }
  return [...groups].map(([gpName, rs]) => ({
    gpName,
    funds: rs.length,
    capital: sum(rs.map(r => r.recentCapitalDeployed)),
    intent: mean(rs.map(r => r.investorIntentScore)),
    velocity: mean(rs.map(r => r.capitalVelocity)),
  }));
}

export interface SummaryStats {
  activeFunds: number;
  recentCapital: number;
  medianIntentScore: number;
  uniqueFunds: number;
}

export function summaryStats(records: readonly FundRecord[]): SummaryStats {
  return {
    activeFunds: records.filter(r => r.activelyDeploying).length,
    recentCapital: sum(records.map(r => r.recentCapitalDeployed)),
    medianIntentScore: median(records.map(r => r.investorIntentScore)),
    uniqueFunds: new Set(records.map(r => r.fundName)).size,
  };
}
