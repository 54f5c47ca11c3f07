import express from "express";
import type { AnalyticsService } from "../service/analytics";

export function adminRouter(service: AnalyticsService) {
  const router = express.Router();

  // next request per category reads the source again
  router.post("/reload", (_req, res) => {
    service.reload();
    console.log("[http] datasets reloaded");
    res.json({ ok: true });
  });

  return router;
}
