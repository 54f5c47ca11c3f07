import type { Result } from "neverthrow";
import {
  computeCorrelationMatrix,
  computeNationalYearSummary,
  computeStateTrends,
  flagCaidiInconsistencies,
  metricSeries,
  rankStates,
  snapshotYear,
  type CaidiFlag,
  type MetricStats,
  type RankedState,
  type Series,
} from "../reliability/engine";
import type { AnalyticsError } from "../reliability/errors";
import { computeYearInsight, describeYearInsight, METRIC_UNIT } from "../reliability/insight";
import { stateCode } from "../reliability/states";
import {
  METRICS,
  type Category,
  type Dataset,
  type Metric,
  type RankStatistic,
  type SortOrder,
} from "../reliability/types";

export type ErrorView = { error: AnalyticsError["kind"]; message: string };

// consumers render an ErrorView as "N/A"
export function valueOrError<T, U>(r: Result<T, AnalyticsError>, f: (v: T) => U): U | ErrorView {
  return r.isOk() ? f(r.value) : { error: r.error.kind, message: r.error.message };
}

const statView = (s: MetricStats) => ({
  n: s.n,
  mean: valueOrError(s.mean, (v) => v),
  stdDev: valueOrError(s.stdDev, (v) => v),
});

export function summaryView(dataset: Dataset) {
  return [...computeNationalYearSummary(dataset).values()].map((s) => ({
    year: s.year,
    records: s.records,
    metrics: {
      SAIDI: statView(s.metrics.SAIDI),
      SAIFI: statView(s.metrics.SAIFI),
      CAIDI: statView(s.metrics.CAIDI),
    },
  }));
}

export const correlationView = (dataset: Dataset) =>
  valueOrError(computeCorrelationMatrix(dataset), (m) => ({
    n: m.n,
    metrics: [...METRICS],
    coefficients: m.coefficients,
    matrix: METRICS.map((a) => METRICS.map((b) => m.coefficients[a][b])),
  }));

export const trendsView = (dataset: Dataset, metric: Metric) =>
  valueOrError(computeStateTrends(dataset, metric), (trends) => ({
    metric,
    trends: [...trends.values()].map((t) => ({ ...t, code: stateCode(t.state) })),
  }));

export const rankingsView = (
  dataset: Dataset,
  metric: Metric,
  statistic: RankStatistic,
  order: SortOrder,
  limit?: number
) =>
  valueOrError(rankStates(dataset, metric, statistic, order), (ranked): {
    metric: Metric;
    statistic: RankStatistic;
    order: SortOrder;
    states: RankedState[];
  } => ({
    metric,
    statistic,
    order,
    states: limit === undefined ? ranked : ranked.slice(0, limit),
  }));

export function snapshotView(dataset: Dataset, metric: Metric, year: number, category: Category) {
  const snapshot = snapshotYear(dataset, metric, year);
  const insight = computeYearInsight(snapshot);
  return {
    ...snapshot,
    category,
    insight: valueOrError(insight, (v) => v),
    text: describeYearInsight(insight, category),
  };
}

export const seriesView = (
  dataset: Dataset,
  metric: Metric,
  states: readonly string[]
): { metric: Metric; unit: string; series: Series[] } => ({
  metric,
  unit: METRIC_UNIT[metric],
  series: metricSeries(dataset, metric, states),
});

export const qualityView = (
  dataset: Dataset,
  tolerance: number
): { tolerance: number; flags: CaidiFlag[] } => ({
  tolerance,
  flags: flagCaidiInconsistencies(dataset, tolerance),
});
