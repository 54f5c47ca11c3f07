import "dotenv/config";
import { z } from "zod";

const Env = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_PATH: z
    .string()
    .min(1)
    .default("data/consolidated_ieee_data_by_state_year.csv"),
  DATA_URL: z.string().url().optional(),
  DATABASE_URL: z.string().min(1).optional(),
  REDIS_URL: z.string().optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash-001"),
  MIN_YEAR: z.coerce.number().int().default(2013),
  MAX_YEAR: z.coerce.number().int().default(2023),
  CAIDI_TOLERANCE: z.coerce.number().positive().default(0.05),
  CACHE_TTL_SEC: z.coerce.number().int().positive().default(3600),
  REPORT_TZ: z.string().default("America/New_York"),
});

export type Env = z.infer<typeof Env>;

export const env = Env.parse(process.env);
