import { describe, expect, it } from "vitest";
import { sourceFromEnv } from "./sources";

const base = { DATA_PATH: "data/x.csv", DATA_URL: undefined, MIN_YEAR: 2013, MAX_YEAR: 2023 };

describe("sourceFromEnv", () => {
  it("prefers postgres, then a url, then the file", () => {
    const db = { query: async () => ({ rows: [] }) };
    expect(sourceFromEnv({ ...base, DATA_URL: "https://example.test/d.csv" }, db).describe).toBe(
      "postgres reliability_by_state_year"
    );
    expect(sourceFromEnv({ ...base, DATA_URL: "https://example.test/d.csv" }, null).describe).toBe(
      "url https://example.test/d.csv"
    );
    expect(sourceFromEnv(base, null).describe).toBe("file data/x.csv");
  });
});
