import { stripAnsi } from "../formatters";
import { StreamWriter } from "./streamWriters";

export type TsvRow = Record<string, unknown>;

function sanitizeCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  const raw = Array.isArray(value)
    ? value.join(",")
    : typeof value === "object"
      ? JSON.stringify(value)
      : String(value);
  return stripAnsi(raw).replaceAll("\t", " ").replaceAll("\n", " ");
}

function collectColumns(rows: readonly TsvRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  const ordered = Array.from(columns).sort();
  // Identifying columns lead, in this order.
  for (const key of ["id", "seq"]) {
    const index = ordered.indexOf(key);
    if (index > 0) {
      ordered.splice(index, 1);
      ordered.unshift(key);
    }
  }
  return ordered;
}

export class TsvWriter extends StreamWriter<readonly TsvRow[]> {
  public readonly format = "tsv" as const;

  write(rows: readonly TsvRow[]): void {
    if (!Array.isArray(rows)) {
      throw new Error("TsvWriter expects an array of row objects.");
    }
    if (rows.length === 0) return;

    const columns = collectColumns(rows);
    const lines = [columns.join("\t")];
    for (const row of rows) {
      lines.push(columns.map((col) => sanitizeCell(row[col])).join("\t"));
    }

    this.stdout.write(`${lines.join("\n")}\n`);
  }
}
