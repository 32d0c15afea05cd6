/**
 * Run-info table parsing. The catalog returns comma-separated text with a
 * header row; quoted cells may contain commas, doubled quotes and line
 * breaks.
 */

export type RunInfoRow = Record<string, string>;

function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(cell);
      rows.push(row);
      row = [];
      cell = "";
    } else {
      cell += ch;
    }
  }
  if (cell !== "" || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }
  return rows.filter((r) => r.some((c) => c.trim() !== ""));
}

/**
 * Rows keyed by header. Repeated header lines (the catalog emits one per
 * chunk for large tables) are skipped.
 */
export function parseRunInfo(text: string, maxRows = 0): RunInfoRow[] {
  const [header, ...body] = parseCsv(text);
  if (!header) {
    return [];
  }
  const columns = header.map((c) => c.trim());
  const out: RunInfoRow[] = [];

  for (const cells of body) {
    if (cells[0] === columns[0] && cells.length === columns.length) {
      continue;
    }
    const row: RunInfoRow = {};
    columns.forEach((column, index) => {
      if (column) {
        row[column] = (cells[index] ?? "").trim();
      }
    });
    out.push(row);
    if (maxRows > 0 && out.length >= maxRows) {
      break;
    }
  }
  return out;
}
