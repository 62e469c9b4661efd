import { describe, it, expect } from 'vitest';
import {
  concentrationRatio, concentrationCurve, monthlyRolling,
  quantileThresholdCount, anomalyCount, gpRollup, summaryStats,
} from '../services/aggregator.ts';
import { makeRecord } from './records.ts';

const withCapital = (values: number[]) => values.map(v => makeRecord({ recentCapitalDeployed: v }));

describe('concentrationRatio', () => {
  const records = withCapital([20, 0, 50, 0, 0, 30, 0, 0, 0, 0]);

  it('takes the top floor(p × N) records by capital', () => {
    expect(concentrationRatio(records, 0.1)).toBe(0.5);
    expect(concentrationRatio(records, 0.2)).toBe(0.8);
    expect(concentrationRatio(records, 1)).toBe(1);
  });

  it('is 0 when the slice is empty', () => {
    expect(concentrationRatio(records, 0)).toBe(0);
    expect(concentrationRatio(records, 0.05)).toBe(0);
    expect(concentrationRatio([], 0.1)).toBe(0);
  });

  it('is 0 when total capital is 0', () => {
    expect(concentrationRatio(withCapital(new Array<number>(10).fill(0)), 0.5)).toBe(0);
  });

  it('stays in [0, 1] and never decreases with p', () => {
    const ratios = [0.1, 0.3, 0.5, 0.7, 1].map(p => concentrationRatio(records, p));
    for (let i = 1; i < ratios.length; i++) {
      expect(ratios[i]).toBeGreaterThanOrEqual(ratios[i - 1] ?? 0);
    }
    expect(ratios.every(r => r >= 0 && r <= 1)).toBe(true);
  });
});

describe('concentrationCurve', () => {
  it('accumulates shares largest first with an equality line', () => {
    const curve = concentrationCurve(withCapital([20, 50, 30]));
    expect(curve.share[0]).toBeCloseTo(0.5, 10);
    expect(curve.share[1]).toBeCloseTo(0.8, 10);
    expect(curve.share[2]).toBeCloseTo(1, 10);
    expect(curve.equality).toEqual([0, 0.5, 1]);
  });

  it('is flat zero when there is no capital', () => {
    expect(concentrationCurve(withCapital([0, 0]))).toEqual({ share: [0, 0], equality: [0, 1] });
  });
});

describe('monthlyRolling', () => {
  const records = [
    makeRecord({ filingDate: '2025-01-15', recentCapitalDeployed: 1000 }),
    makeRecord({ filingDate: '2025-01-05', recentCapitalDeployed: 600 }),
    makeRecord({ filingDate: '2025-02-03', recentCapitalDeployed: 400 }),
    makeRecord({ filingDate: '2025-04-10', recentCapitalDeployed: 3000 }),
  ];

  it('fills empty months and averages over a trailing window', () => {
    const out = monthlyRolling(records);
    expect(out.map(m => [m.month, m.total])).toEqual([
      ['2025-01-01', 1600],
      ['2025-02-01', 400],
      ['2025-03-01', 0],
      ['2025-04-01', 3000],
    ]);
    expect(out[0]?.rollingMean).toBeNull();
    expect(out[1]?.rollingMean).toBeNull();
    expect(out[2]?.rollingMean).toBeCloseTo(2000 / 3, 6);
    expect(out[3]?.rollingMean).toBeCloseTo(3400 / 3, 6);
  });

  it('leaves the rolling mean null until the window fills', () => {
    expect(monthlyRolling([])).toEqual([]);
    expect(monthlyRolling(records.slice(0, 2)).map(m => m.rollingMean)).toEqual([null]);
  });

  it('takes a custom window', () => {
    expect(monthlyRolling(records, 1).map(m => m.rollingMean)).toEqual([1600, 400, 0, 3000]);
  });
});

describe('quantileThresholdCount', () => {
  const records = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10].map(v => makeRecord({ capitalVelocity: v }));

  it('counts records at or above the velocity quantile', () => {
    expect(quantileThresholdCount(records, 0.9)).toBe(1);
    expect(quantileThresholdCount(records, 0.5)).toBe(5);
    expect(quantileThresholdCount(records, 0)).toBe(10);
  });

  it('is 0 for an empty subset', () => {
    expect(quantileThresholdCount([], 0.9)).toBe(0);
  });
});

describe('anomalyCount', () => {
  it('counts high intent with below-median capital', () => {
    const records = [
      makeRecord({ investorIntentScore: 0.9, recentCapitalDeployed: 3 }),
      makeRecord({ investorIntentScore: 0.8, recentCapitalDeployed: 500 }),
      makeRecord({ investorIntentScore: 0.2, recentCapitalDeployed: 5 }),
      makeRecord({ investorIntentScore: 0.75, recentCapitalDeployed: 1 }),
    ];
    // median capital = (3 + 5) / 2 = 4; 0.75 is not above the floor
    expect(anomalyCount(records)).toBe(1);
  });

  it('is 0 for an empty subset', () => {
    expect(anomalyCount([])).toBe(0);
  });
});

describe('gpRollup', () => {
  it('merges records by normalised GP name in first-seen order', () => {
    const out = gpRollup([
      makeRecord({ gpName: 'Jane Doe', recentCapitalDeployed: 100, investorIntentScore: 0.4, capitalVelocity: 2 }),
      makeRecord({ gpName: 'John Smith', recentCapitalDeployed: 50, investorIntentScore: 0.6, capitalVelocity: 1 }),
      makeRecord({ gpName: 'Jane Doe', recentCapitalDeployed: 300, investorIntentScore: 0.8, capitalVelocity: 4 }),
    ]);
    expect(out.map(g => [g.gpName, g.funds, g.capital, g.velocity])).toEqual([
      ['Jane Doe', 2, 400, 3],
      ['John Smith', 1, 50, 1],
    ]);
    expect(out[0]?.intent).toBeCloseTo(0.6, 10);
  });
});

describe('summaryStats', () => {
  it('summarises a subset', () => {
    const stats = summaryStats([
      makeRecord({ fundName: 'x', activelyDeploying: true, recentCapitalDeployed: 100, investorIntentScore: 0.5 }),
      makeRecord({ fundName: 'x', activelyDeploying: false, recentCapitalDeployed: 200, investorIntentScore: 0.7 }),
      makeRecord({ fundName: 'y', activelyDeploying: true, recentCapitalDeployed: 300, investorIntentScore: 0.9 }),
    ]);
    expect(stats).toEqual({ activeFunds: 2, recentCapital: 600, medianIntentScore: 0.7, uniqueFunds: 2 });
  });
});
