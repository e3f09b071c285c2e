import type { OutputFormat, OutputWriter, OutputWriterOptions } from "../outputWriter";

/** Base for writers that render one value to stdout. */
export abstract class StreamWriter<T> implements OutputWriter<T> {
  abstract readonly format: OutputFormat;
  protected readonly stdout: NodeJS.WritableStream;

  constructor(options: OutputWriterOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
  }

  abstract write(value: T): void;
}

export class JsonWriter extends StreamWriter<unknown> {
  public readonly format = "json" as const;

  write(value: unknown): void {
    this.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
  }
}

/**
 * One id per line for piping into another command. Blank and repeated ids are
 * dropped; the first occurrence keeps its place.
 */
export class IdsWriter extends StreamWriter<readonly string[]> {
  public readonly format = "ids" as const;

  write(ids: readonly string[]): void {
    if (!Array.isArray(ids)) {
      throw new Error("IdsWriter expects an array of ids.");
    }
    const unique = [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
    this.stdout.write(unique.length ? `${unique.join("\n")}\n` : "");
  }
}
