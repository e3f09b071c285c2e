export {
  colorize,
  colorizeStatus,
  formatAmount,
  formatDate,
  formatTimestamp,
  stripAnsi,
} from "./formatters";
export type { TextColor } from "./formatters";
export { OUTPUT_FORMATS, createOutputWriter } from "./outputWriter";
export type { OutputFormat, OutputWriter, OutputWriterOptions } from "./outputWriter";
export { fieldColumn, statusColumn } from "./table/columns";
export type { ColumnAlign, TableColumn } from "./table/columns";
export { TableWriter } from "./table/tableWriter";
export type { TableSpec } from "./table/tableWriter";
export { IdsWriter, JsonWriter } from "./writers/streamWriters";
export { TsvWriter } from "./writers/tsvWriter";
export type { TsvRow } from "./writers/tsvWriter";
