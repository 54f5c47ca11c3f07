import express, { type Response } from "express";
import type { Result } from "neverthrow";
import type { AnalyticsService } from "../service/analytics";
import type { DatasetLoadError } from "../reliability/errors";
import { adminRouter } from "./admin";
import {
  CategoryQuery,
  MetricParam,
  RankingsQuery,
  SeriesQuery,
  YearParam,
  issues,
} from "./params";

function send<T>(res: Response, r: Result<T, DatasetLoadError>) {
  if (r.isErr()) {
    const e = r.error;
    return res.status(422).json(
      e.kind === "RecordValidationError"
        ? { error: e.kind, message: e.message, row: e.row, field: e.field }
        : { error: e.kind, message: e.message, state: e.state, year: e.year }
    );
  }
  return res.json(r.value);
}

export function createApp(service: AnalyticsService) {
  const app = express();
  app.use(express.json({ limit: "100kb" }));
  app.use("/admin", adminRouter(service));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/summary", async (req, res, next) => {
    try {
      const q = CategoryQuery.safeParse(req.query);
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      send(res, await service.summary(q.data.category));
    } catch (e) {
      next(e);
    }
  });

  app.get("/correlations", async (req, res, next) => {
    try {
      const q = CategoryQuery.safeParse(req.query);
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      send(res, await service.correlations(q.data.category));
    } catch (e) {
      next(e);
    }
  });

  app.get("/trends/:metric", async (req, res, next) => {
    try {
      const metric = MetricParam.safeParse(req.params.metric);
      const q = CategoryQuery.safeParse(req.query);
      if (!metric.success) return res.status(400).json({ error: issues(metric.error) });
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      send(res, await service.trends(q.data.category, metric.data));
    } catch (e) {
      next(e);
    }
  });

  app.get("/rankings/:metric", async (req, res, next) => {
    try {
      const metric = MetricParam.safeParse(req.params.metric);
      const q = RankingsQuery.safeParse(req.query);
      if (!metric.success) return res.status(400).json({ error: issues(metric.error) });
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      const { category, statistic, order, limit } = q.data;
      send(res, await service.rankings(category, metric.data, statistic, order, limit));
    } catch (e) {
      next(e);
    }
  });

  app.get("/years/:year/:metric", async (req, res, next) => {
    try {
      const year = YearParam.safeParse(req.params.year);
      const metric = MetricParam.safeParse(req.params.metric);
      const q = CategoryQuery.safeParse(req.query);
      if (!year.success) return res.status(400).json({ error: issues(year.error) });
      if (!metric.success) return res.status(400).json({ error: issues(metric.error) });
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      send(res, await service.snapshot(q.data.category, metric.data, year.data));
    } catch (e) {
      next(e);
    }
  });

  app.get("/series/:metric", async (req, res, next) => {
    try {
      const metric = MetricParam.safeParse(req.params.metric);
      const q = SeriesQuery.safeParse(req.query);
      if (!metric.success) return res.status(400).json({ error: issues(metric.error) });
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      send(res, await service.series(q.data.category, metric.data, q.data.states));
    } catch (e) {
      next(e);
    }
  });

  app.get("/quality", async (req, res, next) => {
    try {
      const q = CategoryQuery.safeParse(req.query);
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      send(res, await service.quality(q.data.category));
    } catch (e) {
      next(e);
    }
  });

  app.get("/report", async (req, res, next) => {
    try {
      const q = CategoryQuery.safeParse(req.query);
      if (!q.success) return res.status(400).json({ error: issues(q.error) });
      send(res, await service.report(q.data.category));
    } catch (e) {
      next(e);
    }
  });

  app.use(
    (e: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      console.error("[http]", e);
      res.status(500).json({ error: e instanceof Error ? e.message : "internal error" });
    }
  );

  return app;
}
