import { readFileSync } from "node:fs";
import { z } from "zod";

const StateList = z.array(
  z.object({ name: z.string().min(1), code: z.string().length(2) })
);

export const STATES = StateList.parse(
  JSON.parse(
    readFileSync(new URL("../../data/states.json", import.meta.url), "utf-8")
  )
);

const byName = new Map(STATES.map((s) => [s.name.toLowerCase(), s]));
const byCode = new Map(STATES.map((s) => [s.code, s]));

/** Full state name for a name or postal code, or null when unknown. */
export function resolveState(raw: string): string | null {
  const key = raw.trim();
  return (
    byName.get(key.toLowerCase())?.name ??
    byCode.get(key.toUpperCase())?.name ??
    null
  );
}

// choropleth locations; unknown names pass through unchanged
export const stateCode = (name: string): string =>
  byName.get(name.toLowerCase())?.code ?? name;
