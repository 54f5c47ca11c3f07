import { err, ok, type Result } from "neverthrow";
import {
  duplicateObservation,
  insufficientData,
  undefinedCorrelation,
  type DuplicateObservation,
  type InsufficientData,
  type UndefinedCorrelation,
} from "./errors";
import { mean, ols, pearson, sampleStdDev } from "./stats";
import { resolveState, stateCode } from "./states";
import {
  METRICS,
  metricValue,
  type Dataset,
  type Metric,
  type RankStatistic,
  type ReliabilityRecord,
  type SortOrder,
} from "./types";

export type MetricStats = {
  n: number;
  mean: Result<number, InsufficientData>;
  stdDev: Result<number, InsufficientData>;
};

export type NationalYearSummary = {
  year: number;
  records: number;
  metrics: Record<Metric, MetricStats>;
};

export type CorrelationMatrix = {
  n: number;
  metrics: readonly Metric[];
  coefficients: Record<Metric, Record<Metric, number>>;
};

export type StateTrend = {
  state: string;
  metric: Metric;
  slope: number; // metric units per year
  intercept: number;
  points: number;
  firstYear: number;
  lastYear: number;
};

export type RankedState = { state: string; code: string; value: number };

export type YearSnapshot = {
  year: number;
  metric: Metric;
  entries: { state: string; code: string; value: number }[];
};

export type Series = {
  name: string;
  points: { year: number; value: number }[];
};

export type CaidiFlag = {
  state: string;
  year: number;
  reported: number;
  implied: number;
  relativeError: number;
};

export const NATIONAL_AVERAGE = "National average";

const byStateName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function presentValues(rows: Iterable<ReliabilityRecord>, metric: Metric) {
  const out: number[] = [];
  for (const r of rows) {
    const v = metricValue(r, metric);
    if (v !== null) out.push(v);
  }
  return out;
}

function groupBy<K>(dataset: Dataset, key: (r: ReliabilityRecord) => K) {
  const groups = new Map<K, ReliabilityRecord[]>();
  for (const r of dataset) {
    const k = key(r);
    const g = groups.get(k);
    if (g) g.push(r);
    else groups.set(k, [r]);
  }
  return groups;
}

/** First repeated (state, year) pair in dataset order. */
export function findDuplicate(dataset: Dataset): DuplicateObservation | null {
  const seen = new Set<string>();
  for (const r of dataset) {
    const k = `${r.state}\u0000${r.year}`;
    if (seen.has(k)) return duplicateObservation(r.state, r.year);
    seen.add(k);
  }
  return null;
}

function metricStats(vals: number[]): MetricStats {
  return {
    n: vals.length,
    mean:
      vals.length > 0
        ? ok(mean(vals))
        : err(insufficientData(1, 0, "values for a mean")),
    stdDev:
      vals.length > 1
        ? ok(sampleStdDev(vals))
        : err(insufficientData(2, vals.length, "values for a standard deviation")),
  };
}

export function computeNationalYearSummary(
  dataset: Dataset
): Map<number, NationalYearSummary> {
  const years = groupBy(dataset, (r) => r.year);
  const out = new Map<number, NationalYearSummary>();
  for (const year of [...years.keys()].sort((a, b) => a - b)) {
    const rows = years.get(year) ?? [];
    out.set(year, {
      year,
      records: rows.length,
      metrics: {
        SAIDI: metricStats(presentValues(rows, "SAIDI")),
        SAIFI: metricStats(presentValues(rows, "SAIFI")),
        CAIDI: metricStats(presentValues(rows, "CAIDI")),
      },
    });
  }
  return out;
}

/**
 * Pearson correlations over pooled (state, year) rows. Rows missing any
 * of the three metrics are dropped before pairing.
 */
export function computeCorrelationMatrix(
  dataset: Dataset
): Result<CorrelationMatrix, UndefinedCorrelation> {
  const cols: Record<Metric, number[]> = { SAIDI: [], SAIFI: [], CAIDI: [] };
  for (const r of dataset) {
    if (r.saidi === null || r.saifi === null || r.caidi === null) continue;
    cols.SAIDI.push(r.saidi);
    cols.SAIFI.push(r.saifi);
    cols.CAIDI.push(r.caidi);
  }
  const n = cols.SAIDI.length;
  for (const m of METRICS) {
    const first = cols[m][0];
    if (n < 2 || cols[m].every((v) => v === first)) {
      return err(undefinedCorrelation(m, n));
    }
  }

  const coefficients = {
    SAIDI: { SAIDI: 1, SAIFI: 0, CAIDI: 0 },
    SAIFI: { SAIDI: 0, SAIFI: 1, CAIDI: 0 },
    CAIDI: { SAIDI: 0, SAIFI: 0, CAIDI: 1 },
  } satisfies CorrelationMatrix["coefficients"];
  for (let i = 0; i < METRICS.length; i++) {
    for (let j = i + 1; j < METRICS.length; j++) {
      const a = METRICS[i];
      const b = METRICS[j];
      const r = pearson(cols[a], cols[b]);
      if (Number.isNaN(r)) return err(undefinedCorrelation(a, n));
      coefficients[a][b] = r;
      coefficients[b][a] = r;
    }
  }
  return ok({ n, metrics: METRICS, coefficients });
}

function fitTrend(
  state: string,
  rows: readonly ReliabilityRecord[],
  metric: Metric
): Result<StateTrend, InsufficientData> {
  const pts = rows
    .flatMap((r) => {
      const v = metricValue(r, metric);
      return v === null ? [] : [{ year: r.year, value: v }];
    })
    .sort((a, b) => a.year - b.year);
  if (pts.length < 2) {
    return err(insufficientData(2, pts.length, "distinct years"));
  }
  const { slope, intercept } = ols(
    pts.map((p) => p.year),
    pts.map((p) => p.value)
  );
  return ok({
    state,
    metric,
    slope,
    intercept,
    points: pts.length,
    firstYear: pts[0].year,
    lastYear: pts[pts.length - 1].year,
  });
}

export function computeStateTrend(
  dataset: Dataset,
  state: string,
  metric: Metric
): Result<StateTrend, InsufficientData | DuplicateObservation> {
  const rows = dataset.filter((r) => r.state === state);
  const dup = findDuplicate(rows);
  if (dup) return err(dup);
  return fitTrend(state, rows, metric);
}

/**
 * OLS slope of `metric` on year for every state. States with fewer than
 * two years of values are left out; duplicated rows fail the whole call.
 */
export function computeStateTrends(
  dataset: Dataset,
  metric: Metric
): Result<Map<string, StateTrend>, DuplicateObservation> {
  const dup = findDuplicate(dataset);
  if (dup) return err(dup);

  const states = groupBy(dataset, (r) => r.state);
  const out = new Map<string, StateTrend>();
  for (const state of [...states.keys()].sort(byStateName)) {
    const fit = fitTrend(state, states.get(state) ?? [], metric);
    if (fit.isOk()) out.set(state, fit.value);
  }
  return ok(out);
}

export function computeStateMeans(
  dataset: Dataset,
  metric: Metric
): Map<string, number> {
  const states = groupBy(dataset, (r) => r.state);
  const out = new Map<string, number>();
  for (const state of [...states.keys()].sort(byStateName)) {
    const vals = presentValues(states.get(state) ?? [], metric);
    if (vals.length) out.set(state, mean(vals));
  }
  return out;
}

export function rankStates(
  dataset: Dataset,
  metric: Metric,
  statistic: RankStatistic,
  order: SortOrder = "asc"
): Result<RankedState[], DuplicateObservation> {
  const dup = findDuplicate(dataset);
  if (dup) return err(dup);

  let values: [string, number][];
  if (statistic === "mean") {
    values = [...computeStateMeans(dataset, metric)];
  } else {
    const trends = computeStateTrends(dataset, metric);
    if (trends.isErr()) return err(trends.error);
    values = [...trends.value].map(([s, t]) => [s, t.slope]);
  }

  const sign = order === "asc" ? 1 : -1;
  return ok(
    values
      .sort(([sa, a], [sb, b]) => (a === b ? byStateName(sa, sb) : sign * (a - b)))
      .map(([state, value]) => ({ state, code: stateCode(state), value }))
  );
}

export function snapshotYear(
  dataset: Dataset,
  metric: Metric,
  year: number
): YearSnapshot {
  const entries = dataset.flatMap((r) => {
    const v = metricValue(r, metric);
    return r.year === year && v !== null
      ? [{ state: r.state, code: stateCode(r.state), value: v }]
      : [];
  });
  return { year, metric, entries };
}

/**
 * Line-chart data for the given states, or the national yearly mean when
 * no state is requested. States may be named by full name or postal code,
 * in any case; unknown names yield an empty series under the name given.
 */
export function metricSeries(
  dataset: Dataset,
  metric: Metric,
  states: readonly string[] = []
): Series[] {
  if (!states.length) {
    const points: Series["points"] = [];
    for (const s of computeNationalYearSummary(dataset).values()) {
      const m = s.metrics[metric].mean;
      if (m.isOk()) points.push({ year: s.year, value: m.value });
    }
    return [{ name: NATIONAL_AVERAGE, points }];
  }
  return states.map((requested) => {
    const name = resolveState(requested) ?? requested;
    return {
      name,
      points: dataset
        .flatMap((r) => {
          const v = metricValue(r, metric);
          return r.state === name && v !== null ? [{ year: r.year, value: v }] : [];
        })
        .sort((a, b) => a.year - b.year),
    };
  });
}

/**
 * Rows whose reported CAIDI strays from SAIDI / SAIFI by more than the
 * relative `tolerance`. Rows with a missing value or a zero SAIFI have
 * no implied CAIDI and are skipped. A zero SAIDI implies a zero CAIDI, so
 * any positive reported CAIDI is flagged with an infinite relative error.
 */
export function flagCaidiInconsistencies(
  dataset: Dataset,
  tolerance = 0.05
): CaidiFlag[] {
  const flags: CaidiFlag[] = [];
  for (const r of dataset) {
    if (r.saidi === null || r.saifi === null || r.caidi === null) continue;
    if (r.saifi === 0) continue;
    const implied = r.saidi / r.saifi;
    const relativeError =
      implied === 0
        ? r.caidi === 0
          ? 0
          : Infinity
        : Math.abs(r.caidi - implied) / implied;
    if (relativeError > tolerance) {
      flags.push({
        state: r.state,
        year: r.year,
        reported: r.caidi,
        implied,
        relativeError,
      });
    }
  }
  return flags;
}
