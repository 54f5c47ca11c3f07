import { env } from "./env";
import { pool } from "./db/pool";
import { redis } from "./cache/redis";
import { AnalyticsService } from "./service/analytics";
import { sourceFromEnv } from "./service/sources";
import { CATEGORIES, type Category } from "./reliability/types";

// usage: npm run report -- "Without Major Event Days"
function categoryArg(): Category {
  const arg = process.argv[2];
  const match = CATEGORIES.find((c) => c === arg);
  return match ?? "All Events";
}

async function run() {
  const service = new AnalyticsService(sourceFromEnv(env, pool), {
    cacheTtlSec: env.CACHE_TTL_SEC,
    caidiTolerance: env.CAIDI_TOLERANCE,
    reportTz: env.REPORT_TZ,
  });

  try {
    const report = await service.report(categoryArg());
    if (report.isErr()) {
      console.error(report.error.message);
      process.exitCode = 1;
      return;
    }
    console.log(report.value.narrative.text);
    console.log(`\n(generated ${report.value.generatedAt}, ${report.value.narrative.source})`);
  } finally {
    await pool?.end();
    redis?.disconnect();
  }
}

run().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
