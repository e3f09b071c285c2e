import type { Argv } from "yargs";

import { OUTPUT_FORMATS } from "@/io";

export const outputFormats = OUTPUT_FORMATS;
export type OutputFormatOption = (typeof outputFormats)[number];

export function withGlobalOptions<T>(y: Argv<T>) {
  return y
    .option("format", {
      type: "string",
      describe: "Output format",
      choices: outputFormats,
      default: "table" as const,
    })
    .option("quiet", {
      type: "boolean",
      default: false,
      describe: "Suppress non-essential output",
    })
    .option("color", {
      type: "boolean",
      default: true,
      describe: "Colorize table output (--no-color to disable)",
    })
    .option("dry-run", {
      type: "boolean",
      default: false,
      describe: "Preview changes without applying mutations",
    })
    .option("yes", {
      type: "boolean",
      default: false,
      describe: "Skip interactive confirmation prompts",
    })
    .option("token", {
      type: "string",
      describe: "Copilot bearer token (overrides COPILOT_TOKEN and config)",
    })
    .option("base-url", {
      type: "string",
      describe: "Copilot base URL (overrides COPILOT_BASE_URL and config)",
    })
    .group(
      ["format", "quiet", "color", "dry-run", "yes", "token", "base-url"],
      "Global Options",
    );
}
