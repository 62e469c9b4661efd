// ═══════════════════════════════════════════════════════
// Client-side shapes of the dashboard API
// ═══════════════════════════════════════════════════════

export type Region = 'CA' | 'NY' | 'MA' | 'TX';
export type ViewMode = 'founder' | 'institutional' | 'advanced';
export type IntentBucket = 'Hot' | 'Warm' | 'Cold';

export type Cell = string | number | boolean | null;
export type Row = Record<string, Cell>;

export interface ApiEnvelope<T> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: string[];
  requestId?: string;
}

export interface RegionInfo {
  region: Region;
  available: boolean;
  cached: boolean;
}

export interface FilterOptions {
  region: Region;
  sectors: string[];
  buckets: Array<{ value: IntentBucket; label: string }>;
  defaultBuckets: IntentBucket[];
  score: { min: number; max: number; step: number; default: number };
  views: Array<{ value: ViewMode; label: string }>;
}

export interface Chart {
  id: string;
  title: string;
  kind: 'scatter' | 'area' | 'bar-line';
  x: string;
  y: string;
  line?: string;
  size?: string;
  color?: string;
  hover?: string;
  logX?: boolean;
  colorMap?: Record<string, string>;
  guides?: { x?: number; y?: number };
  points: Row[];
}

export interface Suggestions {
  query: string;
  steps: string[];
  count: number;
  message: string;
  columns: string[];
  rows: Row[];
}

export type Section =
  | { view: 'founder'; suggestions: Suggestions | null; charts: Chart[] }
  | { view: 'institutional'; topDecileShare: string; insight: string; charts: Chart[] }
  | {
      view: 'advanced';
      metrics: { topDecileShare: string; fastMovers: string; highIntentLowDeployment: string };
      charts: Chart[];
    };

export interface DashboardModel {
  region: Region;
  view: ViewMode;
  viewLabel: string;
  filters: { sectors: string[]; buckets: IntentBucket[]; minScore: number };
  totalRecords: number;
  matchedRecords: number;
  metrics: { activeFunds: number; recentCapital: string; medianIntentScore: string; uniqueFunds: number };
  section: Section;
}

/** Everything the sidebar controls hold; sent as one request. */
export interface DashboardParams {
  region: Region;
  view: ViewMode;
  sectors: string[];
  buckets: IntentBucket[];
  minScore: number;
  query: string;
}
