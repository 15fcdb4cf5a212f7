/**
 * Normalization — Period Keys
 *
 * Quarterly keys are "YYYY-Q#"; trailing-twelve-month keys are "TTM-YYYYQ#"
 * and name the last quarter of the window.
 */

const QUARTER_KEY = /^(\d{4})-Q([1-4])$/;

export interface QuarterRef {
  year: number;
  quarter: number;
}

export function quarterKey(year: number, quarter: number): string {
  return `${year}-Q${quarter}`;
}

export function ttmKey(year: number, quarter: number): string {
  return `TTM-${year}Q${quarter}`;
}

export function parseQuarterKey(key: string): QuarterRef | undefined {
  const m = QUARTER_KEY.exec(key);
  if (!m) return undefined;
  return { year: Number(m[1]), quarter: Number(m[2]) };
}

function quarterIndex(ref: QuarterRef): number {
  return ref.year * 4 + (ref.quarter - 1);
}

function fromIndex(index: number): string {
  return quarterKey(Math.floor(index / 4), (index % 4) + 1);
}

export function shiftQuarterKey(key: string, quarters: number): string | undefined {
  const ref = parseQuarterKey(key);
  if (!ref) return undefined;
  return fromIndex(quarterIndex(ref) + quarters);
}

export function previousQuarterKey(key: string): string | undefined {
  return shiftQuarterKey(key, -1);
}

export function yearAgoQuarterKey(key: string): string | undefined {
  return shiftQuarterKey(key, -4);
}

/** `count` keys ending at `key`, most recent first. */
export function trailingQuarterKeys(key: string, count: number): string[] {
  const out: string[] = [];
  for (let i = 0; i < count; i++) {
    const k = shiftQuarterKey(key, -i);
    if (k === undefined) return [];
    out.push(k);
  }
  return out;
}

export function compareQuarterKeys(a: string, b: string): number {
  const ra = parseQuarterKey(a);
  const rb = parseQuarterKey(b);
  if (!ra || !rb) return a < b ? -1 : a > b ? 1 : 0;
  return quarterIndex(ra) - quarterIndex(rb);
}

/** True when the keys (any order) form an unbroken run of quarters. */
export function isContiguous(keys: readonly string[]): boolean {
  const indices = keys.map(parseQuarterKey).map((r) => (r ? quarterIndex(r) : NaN));
  if (indices.some((i) => Number.isNaN(i))) return false;
  indices.sort((a, b) => a - b);
  return indices.every((v, i) => i === 0 || v === indices[i - 1] + 1);
}
