import { env } from "../env";
import { pool } from "../db/pool";
import { AnalyticsService } from "../service/analytics";
import { sourceFromEnv } from "../service/sources";
import { createApp } from "./app";

const service = new AnalyticsService(sourceFromEnv(env, pool), {
  cacheTtlSec: env.CACHE_TTL_SEC,
  caidiTolerance: env.CAIDI_TOLERANCE,
  reportTz: env.REPORT_TZ,
});

const app = createApp(service);
app.listen(env.PORT, () => console.log(`[http] listening on http://localhost:${env.PORT}`));
