/**
 * loader.ts — Region dataset loader
 *
 * Reads `${dataDir}/${region}/${fileName}`, validates every row against
 * RawFilingRowSchema, renames raw columns to record keys and normalises
 * GP names. Rows that fail validation (malformed filing date included) are
 * dropped with a warning; the dataset keeps the count in `skippedRows`.
 */
import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import Papa from 'papaparse';
import { env } from '../config/env.ts';
import { childLogger } from '../shared/logger.ts';
import { MissingDataError } from '../shared/errors.ts';
import { RawFilingRowSchema, type RawFilingRow } from '../schemas.ts';
import { normalizeGpName } from './helpers.ts';
import type { Dataset, FundRecord, RecordKey, Region } from '../types.ts';

const log = childLogger({ module: 'loader' });

/** Raw upstream column → record key */
export const COLUMN_MAP = {
  issuer_name: 'fundName',
  issuer_state: 'state',
  fund_vertical: 'sector',
  filing_date: 'filingDate',
  intent_bucket: 'intentBucket',
  actively_deploying: 'activelyDeploying',
  offering_amount_total: 'totalFundSize',
  total_amount_sold: 'lifetimeCapitalDeployed',
  decayed_amount_sold: 'recentCapitalDeployed',
  sale_velocity: 'capitalVelocity',
  sale_acceleration: 'capitalAcceleration',
  fund_momentum: 'fundMomentum',
  investor_intent_score: 'investorIntentScore',
  related_person_name: 'gpName',
  number_of_investors: 'investorCount',
  why_investor: 'whyThisInvestor',
  days_since_filing: 'daysSinceFiling',
} as const satisfies Record<keyof RawFilingRow, RecordKey>;

/** Record key → canonical display name */
export const DISPLAY_NAMES: Record<RecordKey, string> = {
  fundName: 'Fund Name',
  gpName: 'GP Name',
  state: 'State',
  sector: 'Sector',
  filingDate: 'Filing Date',
  intentBucket: 'Intent Bucket',
  activelyDeploying: 'Actively Deploying',
  totalFundSize: 'Total Fund Size',
  lifetimeCapitalDeployed: 'Lifetime Capital Deployed',
  recentCapitalDeployed: 'Recent Capital Deployed',
  capitalVelocity: 'Capital Velocity',
  capitalAcceleration: 'Capital Acceleration',
  fundMomentum: 'Fund Momentum',
  investorIntentScore: 'Investor Intent Score',
  investorCount: 'Investor Count',
  daysSinceFiling: 'Days Since Filing',
  whyThisInvestor: 'Why This Investor',
};

export interface LoaderOptions {
  dataDir: string;
  fileName: string;
}

export function defaultLoaderOptions(): LoaderOptions {
  return { dataDir: resolve(env.DATA_DIR), fileName: env.DATASET_FILE };
}

export function datasetPath(region: Region, opts: LoaderOptions): string {
  return join(opts.dataDir, region, opts.fileName);
}

export function toRecord(row: RawFilingRow): FundRecord {
  return {
    fundName: row.issuer_name,
    gpName: normalizeGpName(row.related_person_name),
    state: row.issuer_state,
    sector: row.fund_vertical,
    filingDate: row.filing_date,
    intentBucket: row.intent_bucket,
    activelyDeploying: row.actively_deploying,
    totalFundSize: row.offering_amount_total,
    lifetimeCapitalDeployed: row.total_amount_sold,
    recentCapitalDeployed: row.decayed_amount_sold,
    capitalVelocity: row.sale_velocity,
    capitalAcceleration: row.sale_acceleration,
    fundMomentum: row.fund_momentum,
    investorIntentScore: row.investor_intent_score,
    investorCount: row.number_of_investors,
    daysSinceFiling: row.days_since_filing,
    whyThisInvestor: row.why_investor,
  };
}

/**
 * Parse CSV text into frozen records. Exported separately from file access
 * so the row policy can be exercised without touching disk.
 */
export function parseDatasetCsv(text: string, region: Region): { records: FundRecord[]; skippedRows: number } {
  const parsed = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
    transformHeader: h => h.trim(),
  });

  const dropped = (parsed.meta.fields ?? []).filter(f => !(f in COLUMN_MAP));
  if (dropped.length > 0) {
    log.debug({ region, columns: dropped }, 'Ignoring unmapped columns');
  }

  for (const e of parsed.errors) {
    log.warn({ region, row: e.row, code: e.code }, `CSV structure issue: ${e.message}`);
  }

  const records: FundRecord[] = [];
  let skippedRows = 0;
  parsed.data.forEach((raw, i) => {
    const result = RawFilingRowSchema.safeParse(raw);
    if (!result.success) {
      skippedRows++;
      const issues = result.error.issues.map(iss => `${iss.path.join('.')}: ${iss.message}`);
      log.warn({ region, row: i + 1, issues }, 'Dropping invalid row');
      return;
    }
    records.push(Object.freeze(toRecord(result.data)));
  });

  return { records, skippedRows };
}

/**
 * Load one region's dataset. Blocking; throws MissingDataError when the
 * backing file does not exist.
 */
export function loadDataset(region: Region, opts: LoaderOptions = defaultLoaderOptions()): Dataset {
  const path = datasetPath(region, opts);
  if (!existsSync(path)) {
    throw new MissingDataError(region, path);
  }

  const { records, skippedRows } = parseDatasetCsv(readFileSync(path, 'utf8'), region);
  if (skippedRows > 0) {
    log.warn({ region, skippedRows, kept: records.length }, 'Rows dropped during load');
  }
  log.info({ region, records: records.length, path }, 'Dataset loaded');

  return Object.freeze({
    region,
    source: path,
    loadedAt: new Date().toISOString(),
    records: Object.freeze(records),
    skippedRows,
  });
}
