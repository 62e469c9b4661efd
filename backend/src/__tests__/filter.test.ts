import { describe, it, expect } from 'vitest';
import { applyFilters } from '../services/filter.ts';
import { EmptyResultError } from '../shared/errors.ts';
import type { FilterState, FundRecord } from '../types.ts';
import { makeRecord } from './records.ts';

const records: FundRecord[] = [
  makeRecord({ fundName: 'a', sector: 'AI', intentBucket: 'Hot', investorIntentScore: 0.9 }),
  makeRecord({ fundName: 'b', sector: 'Fintech', intentBucket: 'Warm', investorIntentScore: 0.6 }),
  makeRecord({ fundName: 'c', sector: 'AI', intentBucket: 'Cold', investorIntentScore: 0.4 }),
  makeRecord({ fundName: 'd', sector: 'Climate', intentBucket: 'Hot', investorIntentScore: 0.45 }),
  makeRecord({ fundName: 'e', sector: 'SaaS', intentBucket: 'Warm', investorIntentScore: 0.2 }),
];

const state = (s: Partial<FilterState>): FilterState => ({ sectors: [], buckets: [], minScore: 0, ...s });
const names = (rs: FundRecord[]): string[] => rs.map(r => r.fundName);

function sizeAt(minScore: number): number {
  try {
    return applyFilters(records, state({ minScore })).length;
  } catch (err) {
    if (err instanceof EmptyResultError) return 0;
    throw err;
  }
}

describe('applyFilters', () => {
  it('keeps everything with empty sets and a zero threshold', () => {
    expect(names(applyFilters(records, state({})))).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('restricts to the sector set', () => {
    const out = applyFilters(records, state({ sectors: ['AI', 'SaaS'] }));
    expect(names(out)).toEqual(['a', 'c', 'e']);
    expect(out.every(r => ['AI', 'SaaS'].includes(r.sector))).toBe(true);
  });

  it('restricts to the bucket set', () => {
    expect(names(applyFilters(records, state({ buckets: ['Hot'] })))).toEqual(['a', 'd']);
  });

  it('treats the threshold as inclusive', () => {
    const out = applyFilters(records, state({ buckets: ['Hot', 'Warm'], minScore: 0.45 }));
    expect(names(out)).toEqual(['a', 'b', 'd']);
    expect(out.every(r => r.investorIntentScore >= 0.45)).toBe(true);
  });

  it('combines predicates as a conjunction', () => {
    expect(names(applyFilters(records, state({ sectors: ['AI'], buckets: ['Hot', 'Cold'], minScore: 0.5 })))).toEqual(['a']);
  });

  it('is idempotent', () => {
    const s = state({ sectors: ['AI', 'Climate'], minScore: 0.4 });
    const once = applyFilters(records, s);
    expect(applyFilters(once, s)).toEqual(once);
  });

  it('never grows as the threshold rises', () => {
    const sizes = [0, 0.3, 0.45, 0.5, 0.7, 0.9, 0.95].map(sizeAt);
    expect(sizes).toEqual([5, 4, 3, 2, 1, 1, 0]);
  });

  it('signals an empty result', () => {
    expect(() => applyFilters(records, state({ sectors: ['Crypto'] }))).toThrow(EmptyResultError);
    expect(() => applyFilters([], state({}))).toThrow('No investors matched the selected filters.');
  });

  it('does not modify the input', () => {
    const copy = [...records];
    applyFilters(records, state({ buckets: ['Cold'] }));
    expect(records).toEqual(copy);
  });
});
