import { readFile } from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import { parseCsv } from "./csv";
import {
  RecordValidationError,
  duplicateObservation,
  type DatasetLoadError,
} from "./errors";
import { resolveState } from "./states";
import {
  CATEGORY_COLUMN,
  type Category,
  type Dataset,
  type Metric,
  type ReliabilityRecord,
} from "./types";

export type RawCell = string | number | null;
export type RawRow = { line: number; values: Record<string, RawCell> };

export type DatasetOptions = { minYear: number; maxYear: number };

export const DEFAULT_YEARS: DatasetOptions = { minYear: 2013, maxYear: 2023 };

export const metricColumn = (metric: Metric, category: Category) =>
  `${metric}_${CATEGORY_COLUMN[category]}`;

const text = (cell: RawCell | undefined) =>
  cell === null || cell === undefined ? "" : String(cell).trim();

function parseMetric(
  line: number,
  column: string,
  cell: RawCell | undefined
): Result<number | null, RecordValidationError> {
  const raw = text(cell);
  if (raw === "") return ok(null);
  const v = Number(raw);
  if (!Number.isFinite(v)) {
    return err(new RecordValidationError(line, column, `is not a number: "${raw}"`));
  }
  if (v < 0) {
    return err(new RecordValidationError(line, column, `must be non-negative, got ${v}`));
  }
  return ok(v);
}

function parseRow(
  row: RawRow,
  category: Category,
  opts: DatasetOptions
): Result<ReliabilityRecord, RecordValidationError> {
  const rawState = text(row.values.State);
  const state = resolveState(rawState);
  if (!state) {
    return err(
      new RecordValidationError(row.line, "State", `is not a U.S. state or DC: "${rawState}"`)
    );
  }

  const rawYear = text(row.values.Year);
  const year = Number(rawYear);
  if (!/^\d{4}$/.test(rawYear) || year < opts.minYear || year > opts.maxYear) {
    return err(
      new RecordValidationError(
        row.line,
        "Year",
        `must be an integer year in ${opts.minYear}-${opts.maxYear}, got "${rawYear}"`
      )
    );
  }

  const saidiCol = metricColumn("SAIDI", category);
  const saifiCol = metricColumn("SAIFI", category);
  const caidiCol = metricColumn("CAIDI", category);
  return parseMetric(row.line, saidiCol, row.values[saidiCol]).andThen((saidi) =>
    parseMetric(row.line, saifiCol, row.values[saifiCol]).andThen((saifi) =>
      parseMetric(row.line, caidiCol, row.values[caidiCol]).map(
        (caidi): ReliabilityRecord => Object.freeze({ state, year, saidi, saifi, caidi })
      )
    )
  );
}

/**
 * Validates wide rows (State, Year and the nine metric columns) and
 * projects them onto one reporting category. Stops at the first bad row.
 */
export function buildDataset(
  columns: readonly string[],
  rows: readonly RawRow[],
  category: Category,
  opts: DatasetOptions = DEFAULT_YEARS
): Result<Dataset, DatasetLoadError> {
  const required = [
    "State",
    "Year",
    metricColumn("SAIDI", category),
    metricColumn("SAIFI", category),
    metricColumn("CAIDI", category),
  ];
  const missing = required.find((c) => !columns.includes(c));
  if (missing) return err(new RecordValidationError(1, missing, "column is missing"));

  const records: ReliabilityRecord[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    const rec = parseRow(row, category, opts);
    if (rec.isErr()) return err(rec.error);
    const key = `${rec.value.state}\u0000${rec.value.year}`;
    if (seen.has(key)) return err(duplicateObservation(rec.value.state, rec.value.year));
    seen.add(key);
    records.push(rec.value);
  }
  return ok(Object.freeze(records));
}

export function parseDataset(
  content: string,
  category: Category,
  opts: DatasetOptions = DEFAULT_YEARS
): Result<Dataset, DatasetLoadError> {
  const { headers, rows } = parseCsv(content);
  return buildDataset(headers, rows, category, opts);
}

export async function loadDatasetFromFile(
  path: string,
  category: Category,
  opts: DatasetOptions = DEFAULT_YEARS
) {
  const content = await readFile(path, "utf-8");
  return parseDataset(content, category, opts);
}

export async function loadDatasetFromUrl(
  url: string,
  category: Category,
  opts: DatasetOptions = DEFAULT_YEARS
) {
  const res = await fetch(url);
  if (!res.ok) throw new Error(`GET ${url} failed: ${res.status} ${res.statusText}`);
  return parseDataset(await res.text(), category, opts);
}
