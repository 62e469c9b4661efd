/**
 * dashboard.ts — Request → render model pipeline
 *
 * buildDashboard() is the only entry point the routes call. It takes an
 * immutable DashboardRequest, loads the region through the dataset cache,
 * filters, then builds the section for the requested view. Everything
 * returned is data: chart specs name their columns, the client draws them.
 */
import { env } from '../config/env.ts';
import { dashboardBuilds } from '../shared/metrics.ts';
import { EmptyResultError, MissingDataError } from '../shared/errors.ts';
import { getDatasetCache, type DatasetCache } from './dataset-cache.ts';
import { DISPLAY_NAMES } from './loader.ts';
import { applyFilters } from './filter.ts';
import { interpretQuery } from './query.ts';
import {
  concentrationRatio, concentrationCurve, monthlyRolling, quantileThresholdCount,
  anomalyCount, gpRollup, summaryStats,
} from './aggregator.ts';
import { median, uniqueSorted, formatCurrency, formatPercent, formatFixed } from './helpers.ts';
import {
  BUCKET_GLYPHS, INTENT_BUCKETS, VIEW_LABELS, VIEW_MODES,
  type AdvancedSection, type ChartSpec, type DashboardRequest, type FilterOptions, type FounderSection,
  type FundRecord, type HeadlineMetrics, type InstitutionalSection, type IntentBucket, type ProjectedRow,
  type RecordKey, type Region, type RenderModel, type ViewSection,
} from '../types.ts';
import type { DashboardQueryInput } from '../schemas.ts';

export const TOP_SHARE = 0.1;
export const FAST_MOVER_QUANTILE = 0.9;
export const FOUNDER_CHART_LIMIT = 50;
export const VELOCITY_TIMELINE_LIMIT = 20;

export const SUGGESTION_COLUMNS: RecordKey[] = [
  'fundName', 'sector', 'investorIntentScore', 'recentCapitalDeployed', 'whyThisInvestor',
];

const FOUNDER_COLORS: Record<IntentBucket, string> = { Hot: '#ff6b6b', Warm: '#feca57', Cold: '#8395a7' };
const INSTITUTIONAL_COLORS: Record<IntentBucket, string> = { Hot: '#e74c3c', Warm: '#f1c40f', Cold: '#95a5a6' };

/** "Hot" → "🔥 Hot" */
export function bucketLabel(b: IntentBucket): string {
  return `${BUCKET_GLYPHS[b]} ${b}`;
}

function colorMap(palette: Record<IntentBucket, string>): Record<string, string> {
  return Object.fromEntries(INTENT_BUCKETS.map(b => [bucketLabel(b), palette[b]]));
}

/** Project records onto display-named columns. */
export function project(records: readonly FundRecord[], keys: readonly RecordKey[]): ProjectedRow[] {
  return records.map(r => {
    const row: ProjectedRow = {};
    for (const k of keys) {
      row[DISPLAY_NAMES[k]] = k === 'intentBucket' ? bucketLabel(r.intentBucket) : r[k];
    }
    return row;
  });
}

function scatter(
  id: string,
  title: string,
  records: readonly FundRecord[],
  axes: { x: RecordKey; y: RecordKey; size?: RecordKey; color?: RecordKey },
  extra: Partial<Pick<ChartSpec, 'colorMap' | 'logX' | 'guides'>> = {},
): ChartSpec {
  const keys: RecordKey[] = ['fundName', axes.x, axes.y];
  if (axes.size) keys.push(axes.size);
  if (axes.color) keys.push(axes.color);
  return {
    id,
    title,
    kind: 'scatter',
    x: DISPLAY_NAMES[axes.x],
    y: DISPLAY_NAMES[axes.y],
    size: axes.size && DISPLAY_NAMES[axes.size],
    color: axes.color && DISPLAY_NAMES[axes.color],
    hover: DISPLAY_NAMES.fundName,
    ...extra,
    points: project(records, [...new Set(keys)]),
  };
}

// ── Request ──

/** Build the immutable request from validated query params and configured defaults. */
export function toDashboardRequest(input: DashboardQueryInput): DashboardRequest {
  return Object.freeze({
    region: input.region,
    view: input.view,
    filterState: Object.freeze({
      sectors: Object.freeze([...input.sectors]),
      buckets: Object.freeze([...(input.buckets ?? env.DEFAULT_INTENT_BUCKETS)]),
      minScore: input.minScore ?? env.DEFAULT_MIN_INTENT_SCORE,
    }),
    query: input.q,
  });
}

// ── Headline ──

export function headlineMetrics(records: readonly FundRecord[]): HeadlineMetrics {
  const s = summaryStats(records);
  return {
    activeFunds: s.activeFunds,
    recentCapital: formatCurrency(s.recentCapital),
    medianIntentScore: formatFixed(s.medianIntentScore, 2),
    uniqueFunds: s.uniqueFunds,
  };
}

// ── Views ──

export function founderSection(records: readonly FundRecord[], query: string, topK = env.QUERY_TOP_K): FounderSection {
  const result = interpretQuery(records, query, { topK });
  const suggestions = result.summary === null ? null : {
    query: query.trim(),
    steps: result.steps,
    count: result.summary,
    message: `Suggest prioritizing ${result.summary} ${result.summary === 1 ? 'fund' : 'funds'}.`,
    columns: SUGGESTION_COLUMNS.map(k => DISPLAY_NAMES[k]),
    rows: project(result.records, SUGGESTION_COLUMNS),
  };

  return {
    view: 'founder',
    suggestions,
    charts: [
      scatter('active-deployment', 'Active Funds Deployment', result.records.slice(0, FOUNDER_CHART_LIMIT),
        { x: 'capitalVelocity', y: 'recentCapitalDeployed', size: 'investorCount', color: 'intentBucket' },
        { colorMap: colorMap(FOUNDER_COLORS) }),
    ],
  };
}

export function institutionalSection(records: readonly FundRecord[]): InstitutionalSection {
  const concentration = concentrationCurve(records);
  const topDecileShare = formatPercent(concentrationRatio(records, TOP_SHARE));
  const gps = gpRollup(records);

  return {
    view: 'institutional',
    topDecileShare,
    insight: `Top 10% of funds account for ${topDecileShare} of recent capital deployment.`,
    concentration,
    gpRollup: gps,
    charts: [
      scatter('deployment-map', 'Capital Deployment Map', records,
        { x: 'capitalVelocity', y: 'recentCapitalDeployed', size: 'investorCount', color: 'intentBucket' },
        { colorMap: colorMap(INSTITUTIONAL_COLORS) }),
      {
        id: 'concentration-curve',
        title: 'Capital Concentration Curve',
        kind: 'area',
        x: 'rank',
        y: 'share',
        line: 'equality',
        points: concentration.share.map((share, i) => ({ rank: i + 1, share, equality: concentration.equality[i] ?? 0 })),
      },
      {
        id: 'gp-influence',
        title: 'GP Influence & Capital Concentration',
        kind: 'scatter',
        x: 'velocity',
        y: 'intent',
        size: 'capital',
        hover: DISPLAY_NAMES.gpName,
        points: gps.map(g => ({ [DISPLAY_NAMES.gpName]: g.gpName, velocity: g.velocity, intent: g.intent, capital: g.capital })),
      },
    ],
  };
}

export function advancedSection(records: readonly FundRecord[]): AdvancedSection {
  const medians = {
    daysSinceFiling: median(records.map(r => r.daysSinceFiling)),
    fundMomentum: median(records.map(r => r.fundMomentum)),
  };
  const monthly = monthlyRolling(records);
  const topByIntent = [...records]
    .sort((a, b) => b.investorIntentScore - a.investorIntentScore)
    .slice(0, VELOCITY_TIMELINE_LIMIT);
  const fast = quantileThresholdCount(records, FAST_MOVER_QUANTILE);
  const anomalies = anomalyCount(records);

  return {
    view: 'advanced',
    medians,
    monthly,
    metrics: {
      topDecileShare: formatPercent(concentrationRatio(records, TOP_SHARE)),
      fastMovers: `${fast} funds`,
      highIntentLowDeployment: `${anomalies} funds`,
    },
    charts: [
      scatter('momentum-recency', 'Momentum vs Recency', records,
        { x: 'daysSinceFiling', y: 'fundMomentum', color: 'activelyDeploying' },
        { guides: { x: medians.daysSinceFiling, y: medians.fundMomentum } }),
      {
        id: 'capital-over-time',
        title: 'Investor Intent Over Time',
        kind: 'bar-line',
        x: 'month',
        y: 'total',
        line: 'rollingMean',
        points: monthly.map(m => ({ month: m.month, total: m.total, rollingMean: m.rollingMean })),
      },
      scatter('momentum-size', 'Fund Momentum vs Fund Size', records,
        { x: 'totalFundSize', y: 'fundMomentum', size: 'investorCount', color: 'capitalVelocity' },
        { logX: true }),
      scatter('velocity-timeline', `Capital Velocity vs Time (Top ${VELOCITY_TIMELINE_LIMIT} Funds)`, topByIntent,
        { x: 'filingDate', y: 'capitalVelocity', size: 'totalFundSize', color: 'investorIntentScore' }),
    ],
  };
}

function buildSection(request: DashboardRequest, records: readonly FundRecord[], topK: number): ViewSection {
  switch (request.view) {
    case 'founder': return founderSection(records, request.query, topK);
    case 'institutional': return institutionalSection(records);
    case 'advanced': return advancedSection(records);
  }
}

// ── Pipeline ──

export interface DashboardOptions {
  cache?: DatasetCache;
  topK?: number;
}

/**
 * Load → filter → view section. Throws MissingDataError or EmptyResultError;
 * nothing downstream of a failed step runs.
 */
export function buildDashboard(request: DashboardRequest, opts: DashboardOptions = {}): RenderModel {
  const cache = opts.cache ?? getDatasetCache();
  try {
    const dataset = cache.get(request.region);
    const filtered = applyFilters(dataset.records, request.filterState);
    const model: RenderModel = {
      region: request.region,
      view: request.view,
      viewLabel: VIEW_LABELS[request.view],
      filters: {
        sectors: [...request.filterState.sectors],
        buckets: [...request.filterState.buckets],
        minScore: request.filterState.minScore,
      },
      totalRecords: dataset.records.length,
      matchedRecords: filtered.length,
      metrics: headlineMetrics(filtered),
      section: buildSection(request, filtered, opts.topK ?? env.QUERY_TOP_K),
    };
    dashboardBuilds.inc({ view: request.view, outcome: 'ok' });
    return model;
  } catch (err) {
    if (err instanceof EmptyResultError) dashboardBuilds.inc({ view: request.view, outcome: 'empty' });
    else if (err instanceof MissingDataError) dashboardBuilds.inc({ view: request.view, outcome: 'missing' });
    throw err;
  }
}

// ── Controls ──

export function buildFilterOptions(region: Region, cache: DatasetCache = getDatasetCache()): FilterOptions {
  const dataset = cache.get(region);
  return {
    region,
    sectors: uniqueSorted(dataset.records.map(r => r.sector)),
    buckets: INTENT_BUCKETS.map(value => ({ value, label: bucketLabel(value) })),
    defaultBuckets: [...env.DEFAULT_INTENT_BUCKETS],
    score: { min: 0, max: 1, step: 0.05, default: env.DEFAULT_MIN_INTENT_SCORE },
    views: VIEW_MODES.map(value => ({ value, label: VIEW_LABELS[value] })),
  };
}
