import {
  computeCorrelationMatrix,
  computeNationalYearSummary,
  rankStates,
  type NationalYearSummary,
  type RankedState,
} from "../reliability/engine";
import { METRICS, type Category, type Dataset, type Metric } from "../reliability/types";

export type NationalChange = {
  first: number | null;
  last: number | null;
  change: number | null;
};

export type ReportFacts = {
  category: Category;
  years: { first: number; last: number } | null;
  national: Record<Metric, NationalChange>;
  correlations: { saidiSaifi: number; saidiCaidi: number; saifiCaidi: number } | null;
  saidiTrend: { largestIncrease: RankedState | null; largestDecrease: RankedState | null };
  saidiMean: { shortest: RankedState | null; longest: RankedState | null };
};

const DIGITS: Record<Metric, number> = { SAIDI: 1, SAIFI: 2, CAIDI: 1 };

const UNIT: Record<Metric, string> = {
  SAIDI: "minutes",
  SAIFI: "interruptions",
  CAIDI: "minutes",
};

const signed = (v: number, digits: number) =>
  `${v >= 0 ? "+" : ""}${v.toFixed(digits)}`;

export function buildReportFacts(dataset: Dataset, category: Category): ReportFacts {
  const summary = [...computeNationalYearSummary(dataset).values()];
  const first: NationalYearSummary | undefined = summary[0];
  const last: NationalYearSummary | undefined = summary[summary.length - 1];

  const change = (metric: Metric): NationalChange => {
    if (!first || !last) return { first: null, last: null, change: null };
    const a = first.metrics[metric].mean;
    const b = last.metrics[metric].mean;
    const fv = a.isOk() ? a.value : null;
    const lv = b.isOk() ? b.value : null;
    return { first: fv, last: lv, change: fv !== null && lv !== null ? lv - fv : null };
  };

  const corr = computeCorrelationMatrix(dataset);
  const slopesDesc = rankStates(dataset, "SAIDI", "trendSlope", "desc");
  const slopesAsc = rankStates(dataset, "SAIDI", "trendSlope", "asc");
  const means = rankStates(dataset, "SAIDI", "mean", "asc");
  const meansList = means.isOk() ? means.value : [];

  const increase = slopesDesc.isOk() ? slopesDesc.value[0] ?? null : null;
  const decrease = slopesAsc.isOk() ? slopesAsc.value[0] ?? null : null;

  return {
    category,
    years: first && last ? { first: first.year, last: last.year } : null,
    national: { SAIDI: change("SAIDI"), SAIFI: change("SAIFI"), CAIDI: change("CAIDI") },
    correlations: corr.isOk()
      ? {
          saidiSaifi: corr.value.coefficients.SAIDI.SAIFI,
          saidiCaidi: corr.value.coefficients.SAIDI.CAIDI,
          saifiCaidi: corr.value.coefficients.SAIFI.CAIDI,
        }
      : null,
    saidiTrend: {
      largestIncrease: increase && increase.value > 0 ? increase : null,
      largestDecrease: decrease && decrease.value < 0 ? decrease : null,
    },
    saidiMean: {
      shortest: meansList[0] ?? null,
      longest: meansList[meansList.length - 1] ?? null,
    },
  };
}

export function renderReportTemplate(facts: ReportFacts): string {
  const lines = [`**Executive summary** (${facts.category})`, ""];

  if (facts.years) {
    const { first, last } = facts.years;
    for (const m of METRICS) {
      const n = facts.national[m];
      if (n.first === null || n.last === null || n.change === null) continue;
      const d = DIGITS[m];
      lines.push(
        `- National mean ${m}: ${n.first.toFixed(d)} in ${first}, ${n.last.toFixed(d)} in ${last} (${signed(n.change, d)}).`
      );
    }
  } else {
    lines.push("- No data available for the selected filters.");
  }

  const c = facts.correlations;
  lines.push(
    c
      ? `- SAIDI and SAIFI correlate at r = ${c.saidiSaifi.toFixed(2)}; SAIDI and CAIDI at r = ${c.saidiCaidi.toFixed(2)}; SAIFI and CAIDI at r = ${c.saifiCaidi.toFixed(2)}.`
      : "- Correlations between metrics: N/A."
  );

  const { largestIncrease: up, largestDecrease: down } = facts.saidiTrend;
  if (up) {
    lines.push(`- Largest SAIDI increase: ${up.state} (${signed(up.value, 1)} ${UNIT.SAIDI} per year).`);
  }
  if (down) {
    lines.push(`- Largest SAIDI decrease: ${down.state} (${signed(down.value, 1)} ${UNIT.SAIDI} per year).`);
  }

  const { shortest, longest } = facts.saidiMean;
  if (shortest && longest) {
    lines.push(
      `- Shortest average outages (SAIDI): ${shortest.state} (${shortest.value.toFixed(1)}); longest: ${longest.state} (${longest.value.toFixed(1)}).`
    );
  }
  return lines.join("\n");
}
