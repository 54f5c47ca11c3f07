import { err, ok, type Result } from "neverthrow";
import { insufficientData, type InsufficientData } from "./errors";
import type { YearSnapshot } from "./engine";
import type { Category, Metric } from "./types";

export type YearInsight = {
  year: number;
  metric: Metric;
  highest: { state: string; value: number };
  lowest: { state: string; value: number };
  gap: number;
};

export const METRIC_LABEL: Record<Metric, string> = {
  CAIDI: "average restoration time (CAIDI)",
  SAIDI: "total outage duration (SAIDI)",
  SAIFI: "outage frequency (SAIFI)",
};

export const METRIC_UNIT: Record<Metric, string> = {
  CAIDI: "Minutes per interruption",
  SAIDI: "Minutes per year",
  SAIFI: "Interruptions per year",
};

const CATEGORY_DESC: Record<Category, string> = {
  "All Events": "including major events",
  "Without Major Event Days": "excluding major event days",
  "Loss of Supply Removed": "excluding loss of supply",
};

export const NO_DATA_TEXT = "No data available for the selected filters.";

// first occurrence wins on ties
export function computeYearInsight(
  snapshot: YearSnapshot
): Result<YearInsight, InsufficientData> {
  const [first, ...rest] = snapshot.entries;
  if (!first) return err(insufficientData(1, 0, "states reporting"));
  let hi = first;
  let lo = first;
  for (const e of rest) {
    if (e.value > hi.value) hi = e;
    if (e.value < lo.value) lo = e;
  }
  return ok({
    year: snapshot.year,
    metric: snapshot.metric,
    highest: { state: hi.state, value: hi.value },
    lowest: { state: lo.state, value: lo.value },
    gap: hi.value - lo.value,
  });
}

export function describeYearInsight(
  insight: Result<YearInsight, InsufficientData>,
  category: Category
): string {
  if (insight.isErr()) return NO_DATA_TEXT;
  const { year, metric, highest, lowest, gap } = insight.value;
  return (
    `The highest ${METRIC_LABEL[metric]} ${CATEGORY_DESC[category]} in ${year} occurs in ${highest.state} ` +
    `(${highest.value.toFixed(1)}), while the lowest is in ${lowest.state} ` +
    `(${lowest.value.toFixed(1)}). This represents a gap of ${gap.toFixed(1)}.`
  );
}
