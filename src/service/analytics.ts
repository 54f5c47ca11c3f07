import { createHash } from "node:crypto";
import { DateTime } from "luxon";
import { err, ok, type Result } from "neverthrow";
import { cacheGet, cacheSet, cached } from "../cache";
import { buildReportFacts, type ReportFacts } from "../narrative/report";
import { narrateReport, type Narrative } from "../narrative/narrator";
import type { DatasetLoadError } from "../reliability/errors";
import type {
  Category,
  Dataset,
  Metric,
  RankStatistic,
  SortOrder,
} from "../reliability/types";
import type { DatasetSource } from "./sources";
import {
  correlationView,
  qualityView,
  rankingsView,
  seriesView,
  snapshotView,
  summaryView,
  trendsView,
} from "./views";

export type LoadedDataset = {
  category: Category;
  records: Dataset;
  fingerprint: string;
};

export type ServiceOptions = {
  cacheTtlSec: number;
  caidiTolerance: number;
  reportTz: string;
  narrate?: (facts: ReportFacts) => Promise<Narrative>;
};

export type Report = {
  generatedAt: string;
  facts: ReportFacts;
  narrative: Narrative;
};

const fingerprint = (records: Dataset) =>
  createHash("sha256").update(JSON.stringify(records)).digest("hex").slice(0, 16);

/**
 * Holds one dataset per category and serves cached JSON views over it.
 * Cache keys carry the dataset fingerprint, so a reload that changes the
 * data never reads views computed from the old rows.
 */
export class AnalyticsService {
  private datasets = new Map<Category, Promise<Result<LoadedDataset, DatasetLoadError>>>();

  constructor(
    private readonly source: DatasetSource,
    private readonly opts: ServiceOptions
  ) {}

  dataset(category: Category): Promise<Result<LoadedDataset, DatasetLoadError>> {
    const existing = this.datasets.get(category);
    if (existing) return existing;
    // a failed load is forgotten so the next request retries, unless
    // reload() has already replaced it
    const pending = this.load(category).then(
      (r) => {
        if (r.isErr()) this.forget(category, pending);
        return r;
      },
      (e: unknown) => {
        this.forget(category, pending);
        throw e;
      }
    );
    this.datasets.set(category, pending);
    return pending;
  }

  private forget(category: Category, pending: Promise<Result<LoadedDataset, DatasetLoadError>>) {
    if (this.datasets.get(category) === pending) this.datasets.delete(category);
  }

  private async load(category: Category): Promise<Result<LoadedDataset, DatasetLoadError>> {
    const r = await this.source.load(category);
    if (r.isErr()) {
      console.warn(`[dataset] ${this.source.describe} (${category}): ${r.error.message}`);
      return err(r.error);
    }
    const loaded = { category, records: r.value, fingerprint: fingerprint(r.value) };
    console.log(
      `[dataset] loaded ${loaded.records.length} rows for ${category} from ${this.source.describe}`
    );
    return ok(loaded);
  }

  reload(): void {
    this.datasets.clear();
  }

  private async view<T extends object>(
    category: Category,
    name: string,
    compute: (records: Dataset) => T
  ): Promise<Result<T, DatasetLoadError>> {
    const ds = await this.dataset(category);
    if (ds.isErr()) return err(ds.error);
    const { records, fingerprint: fp } = ds.value;
    const value = await cached(`reliability:${category}:${fp}:${name}`, () => compute(records), {
      ttlSec: this.opts.cacheTtlSec,
    });
    return ok(value);
  }

  summary(category: Category) {
    return this.view(category, "summary", summaryView);
  }

  correlations(category: Category) {
    return this.view(category, "correlations", correlationView);
  }

  trends(category: Category, metric: Metric) {
    return this.view(category, `trends:${metric}`, (d) => trendsView(d, metric));
  }

  rankings(
    category: Category,
    metric: Metric,
    statistic: RankStatistic,
    order: SortOrder,
    limit?: number
  ) {
    return this.view(category, `rankings:${metric}:${statistic}:${order}:${limit ?? "all"}`, (d) =>
      rankingsView(d, metric, statistic, order, limit)
    );
  }

  snapshot(category: Category, metric: Metric, year: number) {
    return this.view(category, `snapshot:${metric}:${year}`, (d) =>
      snapshotView(d, metric, year, category)
    );
  }

  series(category: Category, metric: Metric, states: readonly string[]) {
    return this.view(category, `series:${metric}:${states.join("|")}`, (d) =>
      seriesView(d, metric, states)
    );
  }

  quality(category: Category) {
    const tolerance = this.opts.caidiTolerance;
    return this.view(category, `quality:${tolerance}`, (d) => qualityView(d, tolerance));
  }

  async report(category: Category): Promise<Result<Report, DatasetLoadError>> {
    const ds = await this.dataset(category);
    if (ds.isErr()) return err(ds.error);
    const key = `reliability:${category}:${ds.value.fingerprint}:report`;
    const hit = await cacheGet<Report>(key);
    if (hit) return ok(hit);

    const facts = buildReportFacts(ds.value.records, category);
    const narrative = await (this.opts.narrate ?? narrateReport)(facts);
    const report: Report = {
      generatedAt: DateTime.now().setZone(this.opts.reportTz).toISO() ?? new Date().toISOString(),
      facts,
      narrative,
    };
    await cacheSet(key, report, { ttlSec: this.opts.cacheTtlSec });
    return ok(report);
  }
}
