import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  buildDashboard, buildFilterOptions, toDashboardRequest, headlineMetrics,
  founderSection, institutionalSection, advancedSection, project, bucketLabel,
} from '../services/dashboard.ts';
import { DatasetCache } from '../services/dataset-cache.ts';
import { loadDataset, type LoaderOptions } from '../services/loader.ts';
import { applyFilters } from '../services/filter.ts';
import { EmptyResultError, MissingDataError } from '../shared/errors.ts';
import type { DashboardRequest, FundRecord } from '../types.ts';

const opts: LoaderOptions = {
  dataDir: fileURLToPath(new URL('./fixtures', import.meta.url)),
  fileName: 'filings.csv',
};

// Default controls keep Alpha, Beta, Delta and Zeta from the fixture.
const matched: FundRecord[] = applyFilters(loadDataset('CA', opts).records, {
  sectors: [], buckets: ['Hot', 'Warm'], minScore: 0.45,
});

const request = (overrides: Partial<DashboardRequest> = {}): DashboardRequest => ({
  region: 'CA',
  view: 'founder',
  filterState: { sectors: [], buckets: ['Hot', 'Warm'], minScore: 0.45 },
  query: '',
  ...overrides,
});

describe('toDashboardRequest', () => {
  it('fills configured defaults and freezes the result', () => {
    const req = toDashboardRequest({ region: 'CA', view: 'advanced', sectors: ['AI'], q: '' });
    expect(req).toEqual({
      region: 'CA',
      view: 'advanced',
      filterState: { sectors: ['AI'], buckets: ['Hot', 'Warm'], minScore: 0.45 },
      query: '',
    });
    expect(Object.isFrozen(req)).toBe(true);
    expect(Object.isFrozen(req.filterState)).toBe(true);
  });

  it('keeps an explicitly empty bucket list', () => {
    const req = toDashboardRequest({ region: 'TX', view: 'founder', sectors: [], buckets: [], minScore: 0, q: 'x' });
    expect(req.filterState).toEqual({ sectors: [], buckets: [], minScore: 0 });
  });
});

describe('headlineMetrics', () => {
  it('formats the summary for display', () => {
    expect(headlineMetrics(matched)).toEqual({
      activeFunds: 3,
      recentCapital: '$5,000',
      medianIntentScore: '0.77',
      uniqueFunds: 4,
    });
  });
});

describe('project', () => {
  it('uses display names and labels buckets with their glyph', () => {
    expect(project(matched.slice(0, 1), ['fundName', 'intentBucket', 'recentCapitalDeployed'])).toEqual([
      { 'Fund Name': 'Alpha Ventures I', 'Intent Bucket': '🔥 Hot', 'Recent Capital Deployed': 1000 },
    ]);
    expect(bucketLabel('Cold')).toBe('❄️ Cold');
  });
});

describe('founderSection', () => {
  it('has no suggestions without a query', () => {
    const section = founderSection(matched, '  ');
    expect(section.suggestions).toBeNull();
    expect(section.charts[0]?.points.map(p => p['Fund Name'])).toEqual([
      'Alpha Ventures I', 'Beta Capital', 'Delta Partners', 'Zeta SaaS Fund',
    ]);
  });

  it('ranks suggestions and the chart by the query', () => {
    const section = founderSection(matched, 'fast');
    expect(section.suggestions?.steps).toEqual(['sort:velocity']);
    expect(section.suggestions?.message).toBe('Suggest prioritizing 4 funds.');
    expect(section.suggestions?.columns).toEqual([
      'Fund Name', 'Sector', 'Investor Intent Score', 'Recent Capital Deployed', 'Why This Investor',
    ]);
    expect(section.suggestions?.rows[0]).toEqual({
      'Fund Name': 'Alpha Ventures I',
      'Sector': 'AI',
      'Investor Intent Score': 0.9,
      'Recent Capital Deployed': 1000,
      'Why This Investor': 'Deploying into seed rounds',
    });
    expect(section.charts[0]?.points.map(p => p['Fund Name'])).toEqual([
      'Alpha Ventures I', 'Zeta SaaS Fund', 'Beta Capital', 'Delta Partners',
    ]);
  });

  it('uses the singular for one fund', () => {
    const section = founderSection(matched, 'email fintech');
    expect(section.suggestions?.steps).toEqual(['sector:fintech', 'limit:5']);
    expect(section.suggestions?.message).toBe('Suggest prioritizing 1 fund.');
  });

  it('describes the deployment chart by display name', () => {
    const [chart] = founderSection(matched, '').charts;
    expect(chart?.x).toBe('Capital Velocity');
    expect(chart?.y).toBe('Recent Capital Deployed');
    expect(chart?.color).toBe('Intent Bucket');
    expect(chart?.colorMap).toEqual({ '🔥 Hot': '#ff6b6b', '🟡 Warm': '#feca57', '❄️ Cold': '#8395a7' });
  });
});

describe('institutionalSection', () => {
  const section = institutionalSection(matched);

  it('reports the top-decile share', () => {
    // floor(0.1 × 4) = 0 funds
    expect(section.topDecileShare).toBe('0%');
    expect(section.insight).toBe('Top 10% of funds account for 0% of recent capital deployment.');
  });

  it('builds the concentration curve', () => {
    const expected = [0.6, 0.8, 0.92, 1];
    section.concentration.share.forEach((v, i) => expect(v).toBeCloseTo(expected[i] ?? NaN, 10));
    expect(section.charts.find(c => c.id === 'concentration-curve')?.points[0]).toEqual({ rank: 1, share: 0.6, equality: 0 });
  });

  it('rolls funds up by GP', () => {
    expect(section.gpRollup.map(g => g.gpName)).toEqual(['Jane Doe', 'John Smith', 'Mary Ann Lee', 'Bob Builder']);
  });
});

describe('advancedSection', () => {
  const section = advancedSection(matched);

  it('computes the market metrics', () => {
    expect(section.metrics).toEqual({ topDecileShare: '0%', fastMovers: '1 funds', highIntentLowDeployment: '0 funds' });
    expect(section.medians.daysSinceFiling).toBe(45);
    expect(section.medians.fundMomentum).toBeCloseTo(0.6, 10);
  });

  it('buckets capital by month', () => {
    expect(section.monthly.map(m => m.total)).toEqual([1600, 400, 0, 3000]);
    expect(section.charts.map(c => c.id)).toEqual(['momentum-recency', 'capital-over-time', 'momentum-size', 'velocity-timeline']);
  });
});

describe('buildDashboard', () => {
  const cache = new DatasetCache(opts);

  it('produces the render model for a request', () => {
    const model = buildDashboard(request({ view: 'institutional' }), { cache });
    expect(model.viewLabel).toBe('Institutional View');
    expect(model.totalRecords).toBe(6);
    expect(model.matchedRecords).toBe(4);
    expect(model.filters).toEqual({ sectors: [], buckets: ['Hot', 'Warm'], minScore: 0.45 });
    expect(model.section.view).toBe('institutional');
  });

  it('applies every filter before the view', () => {
    const model = buildDashboard(request({
      filterState: { sectors: ['Fintech'], buckets: [], minScore: 0 },
    }), { cache });
    expect(model.matchedRecords).toBe(2);
    expect(model.metrics.recentCapital).toBe('$450');
  });

  it('fails with EmptyResultError when nothing matches', () => {
    expect(() => buildDashboard(request({
      filterState: { sectors: ['Crypto'], buckets: [], minScore: 0 },
    }), { cache })).toThrow(EmptyResultError);
  });

  it('fails with MissingDataError for a region without data', () => {
    expect(() => buildDashboard(request({ region: 'MA' }), { cache })).toThrow(MissingDataError);
  });
});

describe('buildFilterOptions', () => {
  it('lists the region sectors and the control defaults', () => {
    const options = buildFilterOptions('CA', new DatasetCache(opts));
    expect(options.sectors).toEqual(['AI', 'AI/ML', 'Climate', 'Fintech', 'SaaS']);
    expect(options.buckets).toEqual([
      { value: 'Hot', label: '🔥 Hot' },
      { value: 'Warm', label: '🟡 Warm' },
      { value: 'Cold', label: '❄️ Cold' },
    ]);
    expect(options.defaultBuckets).toEqual(['Hot', 'Warm']);
    expect(options.score).toEqual({ min: 0, max: 1, step: 0.05, default: 0.45 });
  });
});
