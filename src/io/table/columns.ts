import { colorizeStatus } from "../formatters";

export type ColumnAlign = "left" | "right";

export type TableColumn<T> = {
  header: string;
  getValue: (row: T) => unknown;
  align?: ColumnAlign;
  /** Longer cells are cut to this many characters, ending in an ellipsis. */
  maxWidth?: number;
  format?: (value: unknown, row: T) => string;
};

type ColumnOptions<T> = Omit<TableColumn<T>, "header" | "getValue"> & { header?: string };

export function fieldColumn<T extends Record<string, unknown>>(
  key: keyof T & string,
  options: ColumnOptions<T> = {},
): TableColumn<T> {
  const { header, ...rest } = options;
  return { header: header ?? key, getValue: (row) => row[key], ...rest };
}

/** Outcome, undo and journal states, colored by how they went. */
export function statusColumn<T extends Record<string, unknown>>(
  key: keyof T & string,
  header = "Status",
): TableColumn<T> {
  return fieldColumn<T>(key, { header, format: (value) => colorizeStatus(String(value ?? "")) });
}
