import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it, vi } from "vitest";
import { parseCsv } from "./csv";
import { loadDatasetFromFile, loadDatasetFromUrl, parseDataset } from "./dataset";
import { RecordValidationError } from "./errors";

const HEADER = "State,Year,SAIDI_All_Events,SAIFI_All_Events,CAIDI_All_Events";
const csv = (...rows: string[]) => [HEADER, ...rows].join("\n");

describe("parseCsv", () => {
  it("handles quoted fields and escaped quotes", () => {
    const { headers, rows } = parseCsv('a,b\n"x, y","he said ""hi"""\n');
    expect(headers).toEqual(["a", "b"]);
    expect(rows).toEqual([{ line: 2, values: { a: "x, y", b: 'he said "hi"' } }]);
  });

  it("strips a BOM, accepts CRLF and skips blank rows", () => {
    const { headers, rows } = parseCsv("\uFEFFa,b\r\n1,2\r\n,\r\n\r\n3,4\r\n");
    expect(headers).toEqual(["a", "b"]);
    expect(rows.map((r) => r.line)).toEqual([2, 5]);
    expect(rows[1].values).toEqual({ a: "3", b: "4" });
  });
});

describe("parseDataset", () => {
  it("projects the selected category and normalizes state codes", () => {
    const ds = parseDataset(
      csv("Ohio,2013,120,1.2,100", "TX,2014,200,2,100", '"New York",2015,,1.1,'),
      "All Events"
    )._unsafeUnwrap();

    expect(ds).toEqual([
      { state: "Ohio", year: 2013, saidi: 120, saifi: 1.2, caidi: 100 },
      { state: "Texas", year: 2014, saidi: 200, saifi: 2, caidi: 100 },
      { state: "New York", year: 2015, saidi: null, saifi: 1.1, caidi: null },
    ]);
    expect(Object.isFrozen(ds)).toBe(true);
    expect(Object.isFrozen(ds[0])).toBe(true);
  });

  it("rejects a negative value naming the row and column", () => {
    const e = parseDataset(csv("Ohio,2013,120,1.2,100", "Ohio,2014,-5,1,1"), "All Events")._unsafeUnwrapErr();

    expect(e).toBeInstanceOf(RecordValidationError);
    expect(e.message).toBe("row 3: SAIDI_All_Events must be non-negative, got -5");
  });

  it("rejects a non-numeric value", () => {
    const e = parseDataset(csv("Ohio,2013,120,abc,100"), "All Events")._unsafeUnwrapErr();
    expect(e).toMatchObject({ kind: "RecordValidationError", row: 2, field: "SAIFI_All_Events" });
    expect(e.message).toBe('row 2: SAIFI_All_Events is not a number: "abc"');
  });

  it("rejects unknown states and years outside the range", () => {
    const state = parseDataset(csv("Atlantis,2013,1,1,1"), "All Events")._unsafeUnwrapErr();
    expect(state).toMatchObject({ field: "State", row: 2 });

    const early = parseDataset(csv("Ohio,2012,1,1,1"), "All Events")._unsafeUnwrapErr();
    expect(early).toMatchObject({ field: "Year", row: 2 });

    const fractional = parseDataset(csv("Ohio,2013.5,1,1,1"), "All Events")._unsafeUnwrapErr();
    expect(fractional).toMatchObject({ field: "Year" });
  });

  it("accepts a wider year range when configured", () => {
    const ds = parseDataset(csv("Ohio,2005,1,1,1"), "All Events", { minYear: 2000, maxYear: 2030 });
    expect(ds._unsafeUnwrap()).toHaveLength(1);
  });

  it("rejects duplicated state and year", () => {
    const e = parseDataset(csv("Ohio,2013,1,1,1", "OH,2013,2,1,2"), "All Events")._unsafeUnwrapErr();
    expect(e).toMatchObject({ kind: "DuplicateObservation", state: "Ohio", year: 2013 });
  });

  it("requires the columns of the selected category", () => {
    const e = parseDataset(csv("Ohio,2013,1,1,1"), "Without Major Event Days")._unsafeUnwrapErr();
    expect(e).toMatchObject({ row: 1, field: "SAIDI_Without_Major_Event_Days", reason: "column is missing" });
  });
});

describe("loadDatasetFromFile", () => {
  it("reads the bundled consolidated dataset", async () => {
    const path = fileURLToPath(
      new URL("../../data/consolidated_ieee_data_by_state_year.csv", import.meta.url)
    );
    const ds = (await loadDatasetFromFile(path, "All Events"))._unsafeUnwrap();

    expect(ds).toHaveLength(66);
    expect(ds[0]).toEqual({ state: "California", year: 2013, saidi: 130.2, saifi: 1.005, caidi: 129.6 });
  });
});

describe("loadDatasetFromUrl", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("parses the fetched document", async () => {
    const fetchMock = vi.fn(async () => new Response(csv("Ohio,2013,120,1.2,100")));
    vi.stubGlobal("fetch", fetchMock);

    const ds = (await loadDatasetFromUrl("https://example.test/d.csv", "All Events"))._unsafeUnwrap();

    expect(fetchMock).toHaveBeenCalledWith("https://example.test/d.csv");
    expect(ds).toEqual([{ state: "Ohio", year: 2013, saidi: 120, saifi: 1.2, caidi: 100 }]);
  });

  it("throws on a non-success status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("nope", { status: 404, statusText: "Not Found" }))
    );

    await expect(loadDatasetFromUrl("https://example.test/d.csv", "All Events")).rejects.toThrow(
      "GET https://example.test/d.csv failed: 404 Not Found"
    );
  });
});
