import type { Metric } from "./types";

export type InsufficientData = {
  kind: "InsufficientData";
  message: string;
  required: number;
  available: number;
};

export type UndefinedCorrelation = {
  kind: "UndefinedCorrelation";
  message: string;
  metric: Metric;
};

export type DuplicateObservation = {
  kind: "DuplicateObservation";
  message: string;
  state: string;
  year: number;
};

export type AnalyticsError =
  | InsufficientData
  | UndefinedCorrelation
  | DuplicateObservation;

export const insufficientData = (
  required: number,
  available: number,
  what = "observations"
): InsufficientData => ({
  kind: "InsufficientData",
  message: `need at least ${required} ${what}, got ${available}`,
  required,
  available,
});

export const undefinedCorrelation = (
  metric: Metric,
  n: number
): UndefinedCorrelation => ({
  kind: "UndefinedCorrelation",
  message:
    n < 2
      ? `correlation needs at least 2 complete rows, got ${n}`
      : `${metric} is constant across ${n} observations`,
  metric,
});

export const duplicateObservation = (
  state: string,
  year: number
): DuplicateObservation => ({
  kind: "DuplicateObservation",
  message: `more than one row for ${state} in ${year}`,
  state,
  year,
});

/**
 * A row of the source document that cannot enter the dataset.
 * `row` is the 1-based line of the source document, the header being
 * line 1; rows read from Postgres count 1-based from the first result row.
 */
export class RecordValidationError extends Error {
  readonly kind = "RecordValidationError";

  constructor(
    readonly row: number,
    readonly field: string,
    readonly reason: string
  ) {
    super(`row ${row}: ${field} ${reason}`);
    this.name = "RecordValidationError";
  }
}

export type DatasetLoadError = RecordValidationError | DuplicateObservation;
