import { describe, expect, it, vi } from "vitest";
import { PgReliabilityRepository, type Queryable } from "./repo";

const opts = { minYear: 2013, maxYear: 2023 };

describe("PgReliabilityRepository", () => {
  it("selects the wide columns and validates the rows", async () => {
    const query = vi.fn(async (_text: string, _values: unknown[]) => ({
      rows: [
        { State: "Ohio", Year: 2013, SAIDI_All_Events: "120.5", SAIFI_All_Events: 1.2, CAIDI_All_Events: null },
        { State: "IA", Year: 2014, SAIDI_All_Events: 80, SAIFI_All_Events: "0.8", CAIDI_All_Events: "100" },
      ],
    }));
    const db: Queryable = { query };

    const ds = (await new PgReliabilityRepository(db).load("All Events", opts))._unsafeUnwrap();

    expect(ds).toEqual([
      { state: "Ohio", year: 2013, saidi: 120.5, saifi: 1.2, caidi: null },
      { state: "Iowa", year: 2014, saidi: 80, saifi: 0.8, caidi: 100 },
    ]);
    const sql = query.mock.calls[0][0];
    expect(sql).toContain('saidi_all_events AS "SAIDI_All_Events"');
    expect(sql).toContain("FROM reliability_by_state_year ORDER BY state ASC, year ASC");
  });

  it("reports the offending row", async () => {
    const db: Queryable = {
      query: async () => ({
        rows: [{ State: "Ohio", Year: 2013, SAIDI_All_Events: -1, SAIFI_All_Events: 1, CAIDI_All_Events: 1 }],
      }),
    };
    const e = (await new PgReliabilityRepository(db).load("All Events", opts))._unsafeUnwrapErr();
    expect(e).toMatchObject({ kind: "RecordValidationError", row: 1, field: "SAIDI_All_Events" });
  });
});
