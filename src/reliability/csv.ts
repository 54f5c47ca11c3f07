export type CsvRow = { line: number; values: Record<string, string> };

function splitLine(line: string): string[] {
  const out: string[] = [];
  let cur = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cur += '"';
        i++;
      } else if (ch === '"') quoted = false;
      else cur += ch;
    } else if (ch === '"') quoted = true;
    else if (ch === ",") {
      out.push(cur.trim());
      cur = "";
    } else cur += ch;
  }
  out.push(cur.trim());
  return out;
}

/**
 * Header-keyed rows of a CSV document. Handles quoted fields, CRLF line
 * endings and a UTF-8 BOM; blank rows are skipped. `line` is the 1-based
 * line number in the document.
 */
export function parseCsv(content: string): { headers: string[]; rows: CsvRow[] } {
  const lines = content
    .replace(/^\uFEFF/, "")
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .split("\n");

  const headerIdx = lines.findIndex((l) => l.trim() !== "");
  if (headerIdx === -1) return { headers: [], rows: [] };
  const headers = splitLine(lines[headerIdx]);

  const rows: CsvRow[] = [];
  for (let i = headerIdx + 1; i < lines.length; i++) {
    const vals = splitLine(lines[i]);
    if (vals.every((v) => !v)) continue;
    rows.push({
      line: i + 1,
      values: Object.fromEntries(headers.map((h, j) => [h, vals[j] ?? ""])),
    });
  }
  return { headers, rows };
}
