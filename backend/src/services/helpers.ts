// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════

/**
 * Normalise a raw GP name: split camelCase boundaries, turn underscores into
 * spaces, title-case each whitespace-delimited token, trim.
 * "jane_doeSmith" → "Jane Doe Smith"
 */
export function normalizeGpName(raw: string): string {
  return raw
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/_/g, ' ')
    .replace(/\S+/g, tok => tok.charAt(0).toUpperCase() + tok.slice(1).toLowerCase())
    .trim();
}

/** Parse a calendar date ("2025-03-14", optionally followed by a time) → "2025-03-14" */
export function parseCalendarDate(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const m = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+Z?)?$/.exec(raw.trim());
  if (!m) return null;
  const [, y, mo, d] = m;
  const year = Number(y), month = Number(mo), day = Number(d);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return `${y}-${mo}-${d}`;
}

/** "2025-03-14" → "2025-03-01" */
export function monthStart(date: string): string {
  return `${date.slice(0, 7)}-01`;
}

/** Every month start from `first` to `last` inclusive. */
export function monthRange(first: string, last: string): string[] {
  const out: string[] = [];
  let y = Number(first.slice(0, 4));
  let m = Number(first.slice(5, 7));
  const endKey = last.slice(0, 7);
  for (;;) {
    const key = `${y}-${String(m).padStart(2, '0')}`;
    out.push(`${key}-01`);
    if (key >= endKey) break;
    m++;
    if (m > 12) { m = 1; y++; }
  }
  return out;
}

export const sum = (values: readonly number[]): number => values.reduce((s, v) => s + v, 0);

/** Mean (returns 0 for empty) */
export const mean = (values: readonly number[]): number => values.length > 0 ? sum(values) / values.length : 0;

/** Median of numeric array, even counts average the middle pair (returns 0 for empty) */
export function median(values: readonly number[]): number {
  if (!values.length) return 0;
  const s = [...values].sort((a, b) => a - b);
  const m = Math.floor(s.length / 2);
  const hi = s[m] ?? 0;
  return s.length % 2 ? hi : ((s[m - 1] ?? hi) + hi) / 2;
}

/** Linear-interpolation quantile, q in [0, 1] (NaN for empty) */
export function quantile(values: readonly number[], q: number): number {
  if (!values.length) return NaN;
  const s = [...values].sort((a, b) => a - b);
  const pos = (s.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const a = s[lo] ?? 0;
  const b = s[hi] ?? a;
  return a + (b - a) * (pos - lo);
}

/**
 * Percentile rank of each value (rank / n, 1-based), ties get the mean of the
 * ranks they span. Output is index-aligned with the input.
 */
export function percentileRanks(values: readonly number[]): number[] {
  const n = values.length;
  const order = values.map((v, i) => ({ v, i })).sort((a, b) => a.v - b.v);
  const ranks = new Array<number>(n).fill(0);
  let start = 0;
  while (start < n) {
    let end = start;
    while (end + 1 < n && order[end + 1]?.v === order[start]?.v) end++;
    // positions start..end hold ranks start+1..end+1
    const avgRank = (start + end + 2) / 2;
    for (let k = start; k <= end; k++) {
      const entry = order[k];
      if (entry) ranks[entry.i] = avgRank / n;
    }
    start = end + 1;
  }
  return ranks;
}

/** Division that yields 0 instead of NaN/Infinity */
export function safeDiv(num: number, den: number): number {
  return den === 0 ? 0 : num / den;
}

/** Sorted distinct non-empty strings */
export function uniqueSorted(values: Iterable<string>): string[] {
  const set = new Set<string>();
  for (const v of values) if (v) set.add(v);
  return [...set].sort((a, b) => a.localeCompare(b));
}

// ── Presentation formatting ──

const currencyFmt = new Intl.NumberFormat('en-US', {
  style: 'currency', currency: 'USD', minimumFractionDigits: 0, maximumFractionDigits: 0,
});
const percentFmt = new Intl.NumberFormat('en-US', {
  style: 'percent', minimumFractionDigits: 0, maximumFractionDigits: 0,
});

/** 1234567.8 → "$1,234,568" */
export const formatCurrency = (v: number): string => currencyFmt.format(v);

/** 0.424 → "42%" */
export const formatPercent = (v: number): string => percentFmt.format(v);

/** 0.5 → "0.50" */
export const formatFixed = (v: number, decimals = 2): string => v.toFixed(decimals);
