import { TableWriter } from "./table/tableWriter";
import { IdsWriter, JsonWriter } from "./writers/streamWriters";
import { TsvWriter } from "./writers/tsvWriter";

export const OUTPUT_FORMATS = ["table", "json", "tsv", "ids"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface OutputWriter<T = unknown> {
  format: OutputFormat;
  write(value: T): void;
}

export type OutputWriterOptions = {
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Strip ANSI colors from table output. */
  noColor?: boolean;
  /** Drop informational lines written to stderr. */
  quiet?: boolean;
};

type OutputWriterFactory = (options?: OutputWriterOptions) => OutputWriter;

const factories: Record<OutputFormat, OutputWriterFactory> = {
  table: (options) => new TableWriter(options),
  json: (options) => new JsonWriter(options),
  tsv: (options) => new TsvWriter(options),
  ids: (options) => new IdsWriter(options),
};

export function createOutputWriter(format: OutputFormat, options?: OutputWriterOptions): OutputWriter {
  return factories[format](options);
}
