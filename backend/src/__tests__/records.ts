import type { FundRecord } from '../types.ts';

let seq = 0;

/** Test record with neutral defaults; override what the test cares about. */
export function makeRecord(overrides: Partial<FundRecord> = {}): FundRecord {
  seq++;
  return {
    fundName: `Fund ${seq}`,
    gpName: 'Test Gp',
    state: 'CA',
    sector: 'AI',
    filingDate: '2025-01-01',
    intentBucket: 'Hot',
    activelyDeploying: true,
    totalFundSize: 1_000_000,
    lifetimeCapitalDeployed: 500_000,
    recentCapitalDeployed: 100,
    capitalVelocity: 1,
    capitalAcceleration: 0,
    fundMomentum: 0.5,
    investorIntentScore: 0.5,
    investorCount: 1,
    daysSinceFiling: 30,
    whyThisInvestor: '',
    ...overrides,
  };
}
