import { err, ok } from "neverthrow";
import { describe, expect, it, vi } from "vitest";
import { RecordValidationError } from "../reliability/errors";
import type { Dataset } from "../reliability/types";
import { AnalyticsService } from "./analytics";
import type { DatasetSource } from "./sources";

const ROWS: Dataset = [
  { state: "Ohio", year: 2013, saidi: 100, saifi: 1, caidi: 100 },
  { state: "Ohio", year: 2014, saidi: 120, saifi: 1.2, caidi: 100 },
  { state: "Texas", year: 2013, saidi: 200, saifi: 2, caidi: 100 },
  { state: "Texas", year: 2014, saidi: 260, saifi: 2, caidi: 150 },
];

function memorySource(rows: Dataset = ROWS) {
  const load = vi.fn(async () => ok(rows));
  const source: DatasetSource = { describe: "memory", load };
  return { source, load };
}

const options = {
  cacheTtlSec: 60,
  caidiTolerance: 0.05,
  reportTz: "America/New_York",
  narrate: async () => ({ source: "template" as const, text: "summary" }),
};

describe("AnalyticsService", () => {
  it("loads a category once and serves cached views", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const { source, load } = memorySource();
    const service = new AnalyticsService(source, options);

    const first = (await service.summary("All Events"))._unsafeUnwrap();
    const second = (await service.summary("All Events"))._unsafeUnwrap();

    expect(load).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(first.map((y) => y.year)).toEqual([2013, 2014]);
    expect(first[0].metrics.SAIDI).toEqual({ n: 2, mean: 150, stdDev: Math.sqrt(5000) });
  });

  it("reads the source again after a reload", async () => {
    const { source, load } = memorySource();
    const service = new AnalyticsService(source, options);

    await service.trends("All Events", "SAIDI");
    service.reload();
    await service.trends("All Events", "SAIDI");

    expect(load).toHaveBeenCalledTimes(2);
  });

  it("renders engine errors as error views", async () => {
    const { source } = memorySource([
      { state: "Ohio", year: 2013, saidi: 100, saifi: 1, caidi: 100 },
    ]);
    const service = new AnalyticsService(source, options);

    const corr = (await service.correlations("Loss of Supply Removed"))._unsafeUnwrap();
    expect(corr).toEqual({
      error: "UndefinedCorrelation",
      message: "correlation needs at least 2 complete rows, got 1",
    });

    const summary = (await service.summary("Loss of Supply Removed"))._unsafeUnwrap();
    expect(summary[0].metrics.SAIDI.stdDev).toEqual({
      error: "InsufficientData",
      message: "need at least 2 values for a standard deviation, got 1",
    });
  });

  it("flags CAIDI rows beyond the configured tolerance", async () => {
    const service = new AnalyticsService(memorySource().source, options);
    const quality = (await service.quality("All Events"))._unsafeUnwrap();

    expect(quality.tolerance).toBe(0.05);
    expect(quality.flags.map((f) => [f.state, f.year])).toEqual([["Texas", 2014]]);
  });

  it("does not keep a failed load", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const load = vi
      .fn<[], ReturnType<DatasetSource["load"]>>()
      .mockResolvedValueOnce(err(new RecordValidationError(4, "Year", "must be an integer year")))
      .mockResolvedValueOnce(ok(ROWS));
    const service = new AnalyticsService({ describe: "memory", load }, options);

    const failed = await service.rankings("All Events", "SAIDI", "mean", "asc");
    expect(failed._unsafeUnwrapErr().message).toBe("row 4: Year must be an integer year");

    const ranked = (await service.rankings("All Events", "SAIDI", "mean", "desc", 1))._unsafeUnwrap();
    expect(ranked).toEqual({
      metric: "SAIDI",
      statistic: "mean",
      order: "desc",
      states: [{ state: "Texas", code: "TX", value: 230 }],
    });
  });

  it("keeps a load started after reload when the earlier load fails", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    let settleFirst: (r: Awaited<ReturnType<DatasetSource["load"]>>) => void = () => {};
    const load = vi
      .fn<[], ReturnType<DatasetSource["load"]>>()
      .mockImplementationOnce(
        () =>
          new Promise((resolve) => {
            settleFirst = resolve;
          })
      )
      .mockResolvedValueOnce(ok(ROWS));
    const service = new AnalyticsService({ describe: "memory", load }, options);

    const stale = service.dataset("All Events");
    service.reload();
    const fresh = service.dataset("All Events");
    settleFirst(err(new RecordValidationError(2, "State", "is not a known state")));

    expect((await stale).isErr()).toBe(true);
    expect((await fresh).isOk()).toBe(true);
    expect(service.dataset("All Events")).toBe(fresh);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("builds a timestamped report", async () => {
    const service = new AnalyticsService(memorySource().source, options);
    const report = (await service.report("All Events"))._unsafeUnwrap();

    expect(report.narrative).toEqual({ source: "template", text: "summary" });
    expect(report.facts.saidiTrend.largestIncrease?.state).toBe("Texas");
    expect(report.generatedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}-0[45]:00$/);
  });
});
