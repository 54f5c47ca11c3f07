export const METRICS = ["SAIDI", "SAIFI", "CAIDI"] as const;
export type Metric = (typeof METRICS)[number];

export const CATEGORIES = [
  "All Events",
  "Without Major Event Days",
  "Loss of Supply Removed",
] as const;
export type Category = (typeof CATEGORIES)[number];

// column suffix in the consolidated CSV, e.g. SAIDI_All_Events
export const CATEGORY_COLUMN: Record<Category, string> = {
  "All Events": "All_Events",
  "Without Major Event Days": "Without_Major_Event_Days",
  "Loss of Supply Removed": "Loss_of_Supply_Removed",
};

export type ReliabilityRecord = {
  readonly state: string;
  readonly year: number;
  readonly saidi: number | null; // minutes / customer / year
  readonly saifi: number | null; // interruptions / customer / year
  readonly caidi: number | null; // minutes / interruption
};

export type Dataset = ReadonlyArray<ReliabilityRecord>;

export const metricValue = (r: ReliabilityRecord, metric: Metric) =>
  metric === "SAIDI" ? r.saidi : metric === "SAIFI" ? r.saifi : r.caidi;

export type SortOrder = "asc" | "desc";
export type RankStatistic = "mean" | "trendSlope";
