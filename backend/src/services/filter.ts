/**
 * filter.ts — Filter engine
 *
 * Conjunction of sector membership, intent-bucket membership and a minimum
 * intent score. Empty sector/bucket sets mean "no restriction"; the score
 * threshold always applies. Surviving records keep their original order.
 */
import { EmptyResultError } from '../shared/errors.ts';
import type { FilterState, FundRecord } from '../types.ts';

export function matchesFilter(r: FundRecord, sectors: ReadonlySet<string>, buckets: ReadonlySet<string>, minScore: number): boolean {
  if (sectors.size > 0 && !sectors.has(r.sector)) return false;
  if (buckets.size > 0 && !buckets.has(r.intentBucket)) return false;
  return r.investorIntentScore >= minScore;
}

/**
 * Apply the filter state. Throws EmptyResultError when nothing survives.
 */
export function applyFilters(records: readonly FundRecord[], state: FilterState): FundRecord[] {
  const sectors = new Set(state.sectors);
  const buckets = new Set<string>(state.buckets);
  const out = records.filter(r => matchesFilter(r, sectors, buckets, state.minScore));
  if (out.length === 0) throw new EmptyResultError();
  return out;
}
