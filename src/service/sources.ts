import type { Result } from "neverthrow";
import type { Env } from "../env";
import { PgReliabilityRepository, type Queryable } from "../db/repo";
import {
  loadDatasetFromFile,
  loadDatasetFromUrl,
  type DatasetOptions,
} from "../reliability/dataset";
import type { DatasetLoadError } from "../reliability/errors";
import type { Category, Dataset } from "../reliability/types";

export type DatasetSource = {
  describe: string;
  load: (category: Category) => Promise<Result<Dataset, DatasetLoadError>>;
};

export const fileSource = (path: string, opts: DatasetOptions): DatasetSource => ({
  describe: `file ${path}`,
  load: (category) => loadDatasetFromFile(path, category, opts),
});

export const urlSource = (url: string, opts: DatasetOptions): DatasetSource => ({
  describe: `url ${url}`,
  load: (category) => loadDatasetFromUrl(url, category, opts),
});

export const pgSource = (db: Queryable, opts: DatasetOptions): DatasetSource => {
  const repo = new PgReliabilityRepository(db);
  return {
    describe: "postgres reliability_by_state_year",
    load: (category) => repo.load(category, opts),
  };
};

/** DATABASE_URL wins over DATA_URL, which wins over DATA_PATH. */
export function sourceFromEnv(
  e: Pick<Env, "DATA_PATH" | "DATA_URL" | "MIN_YEAR" | "MAX_YEAR">,
  db: Queryable | null
): DatasetSource {
  const opts = { minYear: e.MIN_YEAR, maxYear: e.MAX_YEAR };
  if (db) return pgSource(db, opts);
  if (e.DATA_URL) return urlSource(e.DATA_URL, opts);
  return fileSource(e.DATA_PATH, opts);
}
