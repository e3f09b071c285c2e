import { stripAnsi } from "../formatters";
import type { OutputWriterOptions } from "../outputWriter";
import { StreamWriter } from "../writers/streamWriters";
import type { ColumnAlign, TableColumn } from "./columns";

export type TableSpec<T> = {
  columns: TableColumn<T>[];
  rows: T[];
};

const COLUMN_GAP = "  ";
const ELLIPSIS = "…";

function normalizeCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  const raw = Array.isArray(value)
    ? value.join(",")
    : typeof value === "object"
      ? JSON.stringify(value)
      : String(value);
  return raw.replaceAll("\t", " ").replaceAll("\n", " ");
}

// Clipping drops any color: offsets into colored text would split escapes.
function clip(value: string, maxWidth: number | undefined): string {
  if (maxWidth === undefined) return value;
  const plain = stripAnsi(value);
  if (plain.length <= maxWidth) return value;
  return `${plain.slice(0, Math.max(0, maxWidth - 1))}${ELLIPSIS}`;
}

function pad(value: string, width: number, align: ColumnAlign = "left"): string {
  const padding = " ".repeat(Math.max(0, width - stripAnsi(value).length));
  return align === "right" ? `${padding}${value}` : `${value}${padding}`;
}

export class TableWriter<T = unknown> extends StreamWriter<TableSpec<T>> {
  public readonly format = "table" as const;
  private readonly stripColors: boolean;

  constructor(options: OutputWriterOptions = {}) {
    super(options);
    this.stripColors = Boolean(options.noColor);
  }

  write(spec: TableSpec<T>): void {
    if (!spec || !Array.isArray(spec.columns) || !Array.isArray(spec.rows)) {
      throw new Error("TableWriter expects { columns, rows }.");
    }
    const { columns, rows } = spec;
    if (columns.length === 0) return;

    const cells = rows.map((row) =>
      columns.map((col) => {
        const raw = col.getValue(row);
        const text = clip(col.format ? col.format(raw, row) : normalizeCell(raw), col.maxWidth);
        return this.stripColors ? stripAnsi(text) : text;
      }),
    );
    const widths = columns.map((col, index) =>
      Math.max(col.header.length, ...cells.map((row) => stripAnsi(row[index] ?? "").length)),
    );

    const render = (values: readonly string[]) =>
      values.map((value, index) => pad(value, widths[index] ?? 0, columns[index]?.align)).join(COLUMN_GAP);

    const lines = [
      render(columns.map((col) => col.header)),
      widths.map((width) => "-".repeat(width)).join(COLUMN_GAP),
      ...cells.map(render),
    ];
    this.stdout.write(`${lines.join("\n")}\n`);
  }
}
