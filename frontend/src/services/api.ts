import type { ApiEnvelope, DashboardModel, DashboardParams, FilterOptions, Region, RegionInfo } from '../types';

let apiBase = '';

/** Point the client at another origin (default: same origin). */
export function setApiBase(url: string): void {
  apiBase = url.replace(/\/$/, '');
}

export class ApiError extends Error {
  constructor(message: string, readonly status: number, readonly code?: string) {
    super(message);
    this.name = 'ApiError';
  }
}

function isEnvelope(v: unknown): v is ApiEnvelope<unknown> {
  return typeof v === 'object' && v !== null && 'success' in v;
}

async function get<T>(path: string): Promise<T> {
  const res = await fetch(`${apiBase}${path}`);
  const json: unknown = await res.json();
  if (!isEnvelope(json)) throw new ApiError(`API ${res.status}: malformed response`, res.status);
  if (!res.ok || !json.success || json.data === undefined) {
    throw new ApiError(json.error || `API ${res.status}`, res.status, json.code);
  }
  return json.data as T;
}

/**
 * Query string for a dashboard request. Lists are sent as repeated params;
 * an empty bucket list is sent as `buckets=` so the server applies no bucket
 * filter instead of its defaults.
 */
export function dashboardQuery(p: DashboardParams): string {
  const sp = new URLSearchParams({ region: p.region, view: p.view, minScore: String(p.minScore) });
  for (const s of p.sectors) sp.append('sectors', s);
  if (p.buckets.length === 0) sp.set('buckets', '');
  for (const b of p.buckets) sp.append('buckets', b);
  if (p.query.trim()) sp.set('q', p.query.trim());
  return sp.toString();
}

export function fetchRegions(): Promise<RegionInfo[]> {
  return get<RegionInfo[]>('/api/regions');
}

export function fetchFilterOptions(region: Region): Promise<FilterOptions> {
  return get<FilterOptions>(`/api/filters?region=${encodeURIComponent(region)}`);
}

export function fetchDashboard(params: DashboardParams): Promise<DashboardModel> {
  return get<DashboardModel>(`/api/dashboard?${dashboardQuery(params)}`);
}
