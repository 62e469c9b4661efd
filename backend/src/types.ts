// ═══════════════════════════════════════════════════════
// Fund Intent Analytics — Core Type Definitions
// Every data shape used across the service.
// ═══════════════════════════════════════════════════════

// ── Enums ──

export const REGIONS = ['CA', 'NY', 'MA', 'TX'] as const;
export type Region = typeof REGIONS[number];

export const INTENT_BUCKETS = ['Hot', 'Warm', 'Cold'] as const;
export type IntentBucket = typeof INTENT_BUCKETS[number];

export const BUCKET_GLYPHS: Record<IntentBucket, string> = {
  Hot: '🔥',
  Warm: '🟡',
  Cold: '❄️',
};

export const VIEW_MODES = ['founder', 'institutional', 'advanced'] as const;
export type ViewMode = typeof VIEW_MODES[number];

export const VIEW_LABELS: Record<ViewMode, string> = {
  founder: 'Founder View',
  institutional: 'Institutional View',
  advanced: 'Advanced Market Analytics',
};

// ── Records ──

/** One fund filing observation after renaming and normalisation. */
export interface FundRecord {
  fundName: string;
  gpName: string;
  state: Region;
  sector: string;
  filingDate: string;               // YYYY-MM-DD
  intentBucket: IntentBucket;
  activelyDeploying: boolean;
  totalFundSize: number;
  lifetimeCapitalDeployed: number;
  recentCapitalDeployed: number;    // time-decayed
  capitalVelocity: number;
  capitalAcceleration: number;
  fundMomentum: number;
  investorIntentScore: number;      // [0, 1]
  investorCount: number;
  daysSinceFiling: number;
  whyThisInvestor: string;
}

export type RecordKey = keyof FundRecord;
export type CellValue = string | number | boolean;

export interface Dataset {
  region: Region;
  source: string;
  loadedAt: string;
  records: readonly FundRecord[];
  skippedRows: number;
}

// ── Filters / queries ──

export interface FilterState {
  sectors: readonly string[];
  buckets: readonly IntentBucket[];
  minScore: number;
}

export interface DashboardRequest {
  readonly region: Region;
  readonly view: ViewMode;
  readonly filterState: Readonly<FilterState>;
  readonly query: string;
}

export interface QueryResult {
  records: FundRecord[];
  steps: string[];
  summary: number | null;
}

// ── Aggregates ──

export interface ConcentrationCurve {
  share: number[];
  equality: number[];
}

export interface MonthlyBucket {
  month: string;                    // YYYY-MM-01
  total: number;
  rollingMean: number | null;
}

export interface GpRollup {
  gpName: string;
  funds: number;
  capital: number;
  intent: number;
  velocity: number;
}

// ── Render model ──

export type ProjectedRow = Record<string, CellValue | null>;

export interface ChartSpec {
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
  points: ProjectedRow[];
}

export interface HeadlineMetrics {
  activeFunds: number;
  recentCapital: string;
  medianIntentScore: string;
  uniqueFunds: number;
}

export interface FounderSection {
  view: 'founder';
  suggestions: {
    query: string;
    steps: string[];
    count: number;
    message: string;
    columns: string[];
    rows: ProjectedRow[];
  } | null;
  charts: ChartSpec[];
}

export interface InstitutionalSection {
  view: 'institutional';
  topDecileShare: string;
  insight: string;
  concentration: ConcentrationCurve;
  gpRollup: GpRollup[];
  charts: ChartSpec[];
}

export interface AdvancedSection {
  view: 'advanced';
  medians: { daysSinceFiling: number; fundMomentum: number };
  monthly: MonthlyBucket[];
  metrics: {
    topDecileShare: string;
    fastMovers: string;
    highIntentLowDeployment: string;
  };
  charts: ChartSpec[];
}

export type ViewSection = FounderSection | InstitutionalSection | AdvancedSection;

export interface RenderModel {
  region: Region;
  view: ViewMode;
  viewLabel: string;
  filters: FilterState;
  totalRecords: number;
  matchedRecords: number;
  metrics: HeadlineMetrics;
  section: ViewSection;
}

// ── Controls ──

export interface FilterOptions {
  region: Region;
  sectors: string[];
  buckets: Array<{ value: IntentBucket; label: string }>;
  defaultBuckets: IntentBucket[];
  score: { min: number; max: number; step: number; default: number };
  views: Array<{ value: ViewMode; label: string }>;
}

export interface RegionInfo {
  region: Region;
  available: boolean;
  cached: boolean;
}

// ── API response ──

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: string[];
  requestId?: string;
}
