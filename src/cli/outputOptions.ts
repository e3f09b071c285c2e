import type { OutputWriterOptions } from "@/io";
import type { CliRuntime } from "./types";

export function getOutputWriterOptions(
  argv: {
    quiet?: boolean;
    color?: boolean;
  },
  runtime?: CliRuntime,
): OutputWriterOptions {
  return {
    stdout: runtime?.stdout,
    stderr: runtime?.stderr,
    quiet: Boolean(argv.quiet),
    noColor: argv.color === false,
  };
}

/** Informational line on stderr, dropped under --quiet. */
export function writeNotice(options: OutputWriterOptions, message: string): void {
  if (options.quiet) return;
  (options.stderr ?? process.stderr).write(`${message}\n`);
}
