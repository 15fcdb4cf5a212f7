/**
 * Normalization — Statement Normalizer
 *
 * Raw extraction → CompanyQuarter. Detects scale per statement (a line's own
 * marker wins), converts monetary lines into the base currency, checks that
 * the three statements describe the same period, then rolls up TTM values.
 *
 * Pure function — deterministic, no side effects. Inputs are never mutated.
 */

import { NormalizationError } from "@/lib/errors";
import { NA } from "@/lib/dossier/types";
import type { CompanyQuarter, Maybe, StatementLines, StatementValue } from "@/lib/dossier/types";
import { parseIsoDate } from "@/lib/utils/dates";
import { compareQuarterKeys, quarterKey, trailingQuarterKeys, ttmKey } from "./periods";
import { detectScale, isCurrencyUnit, LINE_UNITS, UNSCALED_UNITS } from "./scale";
import type { DroppedPeriod, NormalizedHistory, NormalizeOptions, RawLine, RawQuarter, RawStatement } from "./types";

const MS_PER_DAY = 86_400_000;

interface LineContext {
  scale: number;
  currency: string;
  options: NormalizeOptions;
}

function fxRate(currency: string, options: NormalizeOptions): number {
  if (currency === options.baseCurrency) return 1;
  const rate = options.fxRates?.[currency];
  if (rate === undefined || !Number.isFinite(rate) || rate <= 0) {
    throw new NormalizationError("UNKNOWN_CURRENCY", `No FX rate for ${currency} → ${options.baseCurrency}`, {
      currency,
      baseCurrency: options.baseCurrency,
    });
  }
  return rate;
}

function normalizeLine(name: string, raw: RawLine, ctx: LineContext): StatementValue {
  const value = typeof raw === "number" ? raw : raw.value;
  const explicitUnit = typeof raw === "number" ? undefined : raw.unit;
  const scale =
    typeof raw !== "number" && raw.scaleMarker !== undefined ? detectScale(raw.scaleMarker) : ctx.scale;
  const unit = explicitUnit ?? LINE_UNITS[name] ?? ctx.currency;

  if (UNSCALED_UNITS.has(unit)) return { value, unit };
  if (isCurrencyUnit(unit)) {
    return { value: value * scale * fxRate(unit, ctx.options), unit: ctx.options.baseCurrency };
  }
  return { value: value * scale, unit };
}

function normalizeLines(
  lines: Record<string, RawLine>,
  scaleMarker: string | undefined,
  currency: string,
  options: NormalizeOptions,
): StatementLines {
  const ctx: LineContext = { scale: detectScale(scaleMarker), currency, options };
  const out: StatementLines = {};
  for (const [name, raw] of Object.entries(lines)) {
    out[name] = normalizeLine(name, raw, ctx);
  }
  return out;
}

function normalizeStatement(statement: RawStatement, fallbackCurrency: string, options: NormalizeOptions): StatementLines {
  return normalizeLines(statement.lines, statement.scaleMarker, statement.currency ?? fallbackCurrency, options);
}

function assertAligned(raw: RawQuarter, period: string, toleranceDays: number): void {
  const { income, balance, cashflow } = raw.statements;
  const ends = [income.periodEnd, balance.periodEnd, cashflow.periodEnd];
  const parsed = ends.map(parseIsoDate);
  const times: number[] = [];
  for (let i = 0; i < parsed.length; i++) {
    const t = parsed[i];
    if (t === undefined) {
      throw new NormalizationError("INVALID_PERIOD", `${period}: invalid period end date "${ends[i]}"`, { period });
    }
    times.push(t);
  }
  const spreadDays = (Math.max(...times) - Math.min(...times)) / MS_PER_DAY;
  if (spreadDays > toleranceDays) {
    throw new NormalizationError(
      "PERIOD_MISALIGNED",
      `${period}: statement period ends misaligned by ${spreadDays} days ` +
        `(income ${income.periodEnd}, balance ${balance.periodEnd}, cash flow ${cashflow.periodEnd}; tolerance ${toleranceDays})`,
      { period, income: income.periodEnd, balance: balance.periodEnd, cashflow: cashflow.periodEnd, toleranceDays },
    );
  }
}

/**
 * Normalize a single raw quarter. TTM values are left empty; use
 * normalizeHistory to roll them up across periods.
 */
export function normalizeQuarter(raw: RawQuarter, options: NormalizeOptions): CompanyQuarter {
  if (!Number.isInteger(raw.fiscalQuarter) || raw.fiscalQuarter < 1 || raw.fiscalQuarter > 4) {
    throw new NormalizationError("INVALID_PERIOD", `${raw.ticker}: fiscal quarter ${raw.fiscalQuarter} out of range`, {
      ticker: raw.ticker,
    });
  }
  const period = quarterKey(raw.fiscalYear, raw.fiscalQuarter);
  assertAligned(raw, period, options.toleranceDays);

  const currency = raw.currency ?? options.baseCurrency;
  const segments: Record<string, StatementLines> = {};
  for (const [segment, lines] of Object.entries(raw.segments ?? {})) {
    segments[segment] = normalizeLines(lines, raw.segmentScaleMarker ?? raw.statements.income.scaleMarker, currency, options);
  }

  let footnotes: CompanyQuarter["footnotes"];
  if (raw.footnotes) {
    const { scaleMarker, debtDueWithin12m, debtDue12to24m } = raw.footnotes;
    const fnCtx: LineContext = { scale: detectScale(scaleMarker), currency, options };
    footnotes = {
      ...(debtDueWithin12m !== undefined ? { debtDueWithin12m: normalizeLine("debtDueWithin12m", debtDueWithin12m, fnCtx) } : {}),
      ...(debtDue12to24m !== undefined ? { debtDue12to24m: normalizeLine("debtDue12to24m", debtDue12to24m, fnCtx) } : {}),
    };
  }

  return {
    ticker: raw.ticker,
    period,
    fiscalYear: raw.fiscalYear,
    fiscalQuarter: raw.fiscalQuarter,
    periodEnd: raw.statements.income.periodEnd,
    currency: options.baseCurrency,
    ...(raw.businessModel ? { businessModel: raw.businessModel } : {}),
    income: normalizeStatement(raw.statements.income, currency, options),
    balance: normalizeStatement(raw.statements.balance, currency, options),
    cashflow: normalizeStatement(raw.statements.cashflow, currency, options),
    kpis: normalizeLines(raw.kpis ?? {}, undefined, currency, options),
    segments,
    ...(footnotes ? { footnotes } : {}),
    ttm: { key: ttmKey(raw.fiscalYear, raw.fiscalQuarter), values: {} },
  };
}

/**
 * Sum flow lines (income + cash flow) over the trailing four quarters.
 * A line is NA unless the four contiguous quarters all exist and carry it.
 * Income-statement names take precedence over cash-flow duplicates.
 */
export function rollUpTtm(current: CompanyQuarter, byPeriod: ReadonlyMap<string, CompanyQuarter>): Record<string, Maybe<number>> {
  const keys = trailingQuarterKeys(current.period, 4);
  const window = keys.map((k) => byPeriod.get(k));
  const complete = keys.length === 4 && window.every((q) => q !== undefined);

  const values: Record<string, Maybe<number>> = {};
  const flowStatements = ["income", "cashflow"] as const;
  for (const statement of flowStatements) {
    for (const name of Object.keys(current[statement])) {
      if (name in values) continue;
      if (!complete) {
        values[name] = NA;
        continue;
      }
      let sum = 0;
      let missing = false;
      for (const q of window) {
        const line = q?.[statement][name];
        if (line === undefined || line.unit !== current[statement][name].unit) {
          missing = true;
          break;
        }
        sum += line.value;
      }
      values[name] = missing ? NA : sum;
    }
  }
  return values;
}

function rawIndex(raw: RawQuarter): number {
  return raw.fiscalYear * 4 + raw.fiscalQuarter;
}

/**
 * Normalize a ticker's full history, oldest first, with TTM values filled.
 *
 * A misaligned historical quarter is dropped and reported in `dropped`;
 * TTM windows that need it become NA. A misaligned latest quarter, and
 * every other normalization failure, still throws.
 */
export function normalizeQuarters(raws: readonly RawQuarter[], options: NormalizeOptions): NormalizedHistory {
  const latest = raws.reduce<RawQuarter | undefined>((best, r) => (!best || rawIndex(r) > rawIndex(best) ? r : best), undefined);

  const quarters: CompanyQuarter[] = [];
  const dropped: DroppedPeriod[] = [];
  for (const raw of raws) {
    try {
      quarters.push(normalizeQuarter(raw, options));
    } catch (err) {
      if (raw === latest || !(err instanceof NormalizationError) || err.code !== "PERIOD_MISALIGNED") throw err;
      dropped.push({ period: quarterKey(raw.fiscalYear, raw.fiscalQuarter), code: err.code, message: err.message });
    }
  }
  quarters.sort((a, b) => compareQuarterKeys(a.period, b.period));
  dropped.sort((a, b) => compareQuarterKeys(a.period, b.period));

  const byPeriod = new Map<string, CompanyQuarter>();
  for (const q of quarters) {
    if (byPeriod.has(q.period)) {
      throw new NormalizationError("INVALID_PERIOD", `${q.ticker}: duplicate period ${q.period}`, {
        ticker: q.ticker,
        period: q.period,
      });
    }
    byPeriod.set(q.period, q);
  }

  return {
    quarters: quarters.map((q) => ({ ...q, ttm: { key: q.ttm.key, values: rollUpTtm(q, byPeriod) } })),
    dropped,
  };
}

/** Normalized quarters only; see normalizeQuarters for dropped periods. */
export function normalizeHistory(raws: readonly RawQuarter[], options: NormalizeOptions): CompanyQuarter[] {
  return normalizeQuarters(raws, options).quarters;
}
