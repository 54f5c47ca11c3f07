import { z } from "zod";
import { buildDataset, metricColumn, type DatasetOptions } from "../reliability/dataset";
import { CATEGORIES, METRICS, type Category } from "../reliability/types";

// satisfied by pg's Pool and Client
export interface Queryable {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
}

const Cell = z.union([z.string(), z.number(), z.null()]);
const Row = z.record(Cell);

// table columns are the CSV headers, lower-cased
const WIDE_COLUMNS = [
  "State",
  "Year",
  ...METRICS.flatMap((m) => CATEGORIES.map((c) => metricColumn(m, c))),
];

export class PgReliabilityRepository {
  constructor(
    private readonly db: Queryable,
    private readonly table = "reliability_by_state_year"
  ) {}

  async load(category: Category, opts: DatasetOptions) {
    const select = WIDE_COLUMNS.map((c) => `${c.toLowerCase()} AS "${c}"`).join(", ");
    const r = await this.db.query(
      `SELECT ${select} FROM ${this.table} ORDER BY state ASC, year ASC`,
      []
    );
    const rows = r.rows.map((raw, i) => ({ line: i + 1, values: Row.parse(raw) }));
    return buildDataset(WIDE_COLUMNS, rows, category, opts);
  }
}
