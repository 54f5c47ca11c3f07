import { z } from "zod";
import { CATEGORIES, METRICS } from "../reliability/types";

export const MetricParam = z
  .string()
  .transform((s) => s.toUpperCase())
  .pipe(z.enum(METRICS));

export const CategoryQuery = z.object({
  category: z.enum(CATEGORIES).default("All Events"),
});

export const RankingsQuery = CategoryQuery.extend({
  statistic: z.enum(["mean", "trendSlope"]).default("mean"),
  order: z.enum(["asc", "desc"]).default("asc"),
  limit: z.coerce.number().int().positive().optional(),
});

export const SeriesQuery = CategoryQuery.extend({
  states: z
    .string()
    .optional()
    .transform((s) =>
      (s ?? "")
        .split(",")
        .map((x) => x.trim())
        .filter(Boolean)
    ),
});

export const YearParam = z.coerce.number().int();

export function issues(e: z.ZodError) {
  return e.issues.map((i) => `${i.path.join(".") || "value"}: ${i.message}`).join("; ");
}
