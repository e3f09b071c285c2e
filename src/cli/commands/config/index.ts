import type { CommandModule } from "yargs";
import { z } from "zod";

import { resolveJournalPath } from "@/app/createAppContext";
import { GlobalArgsSchema, defineCommand } from "@/cli/command";
import { getOutputWriterOptions } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import { getConfigDir } from "@/config/paths";
import { type Config, CONFIG_KEYS } from "@/config/schema";
import { type OutputFormat, type OutputWriterOptions, createOutputWriter, fieldColumn } from "@/io";
import { resolveLogPath } from "@/logging";

type ConfigRow = { key: string; value: string };

const SETTABLE_KEYS = ["baseUrl", "journalPath"] as const;

const ConfigSetArgsSchema = GlobalArgsSchema.extend({
  key: z.enum(SETTABLE_KEYS),
  value: z.string().trim().min(1),
});

const ConfigClearArgsSchema = GlobalArgsSchema.extend({
  keys: z.array(z.enum(CONFIG_KEYS)).default([]),
});

export function writeConfig(config: Config, format: OutputFormat, options?: OutputWriterOptions): void {
  if (format === "json") {
    createOutputWriter("json", options).write(config);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(CONFIG_KEYS.filter((key) => config[key] !== undefined));
    return;
  }

  const rows: ConfigRow[] = CONFIG_KEYS.map((key) => ({ key, value: config[key] ?? "" }));

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<ConfigRow>("key", { header: "Key" }),
      fieldColumn<ConfigRow>("value", { header: "Value" }),
    ],
    rows,
  });
}

function writeLine(stdout: NodeJS.WritableStream | undefined, line: string): void {
  (stdout ?? process.stdout).write(`${line}\n`);
}

export const configCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "config <command>",
  describe: "Manage local configuration",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "path",
          describe: "Print the config file path",
          args: GlobalArgsSchema,
          handler: (_args, ctx) => writeLine(ctx.runtime.stdout, ctx.configStore.path),
        }),
      )
      .command(
        defineCommand({
          command: "dir",
          describe: "Print the config directory",
          args: GlobalArgsSchema,
          handler: (_args, ctx) => writeLine(ctx.runtime.stdout, getConfigDir()),
        }),
      )
      .command(
        defineCommand({
          command: "journal-path",
          describe: "Print the journal database path",
          args: GlobalArgsSchema,
          handler: (_args, ctx) =>
            writeLine(
              ctx.runtime.stdout,
              resolveJournalPath(ctx.config, ctx.runtime.env ?? process.env, ctx.runtime.journalPath),
            ),
        }),
      )
      .command(
        defineCommand({
          command: "log-path",
          describe: "Print the run log file path",
          args: GlobalArgsSchema,
          handler: (_args, ctx) => writeLine(ctx.runtime.stdout, resolveLogPath(ctx.runtime.env ?? process.env)),
        }),
      )
      .command(
        defineCommand({
          command: "show",
          describe: "Show current config (the token is redacted)",
          args: GlobalArgsSchema,
          handler: (args, ctx) => {
            writeConfig(
              ctx.configStore.redact(ctx.config),
              args.format,
              getOutputWriterOptions(args, ctx.runtime),
            );
          },
        }),
      )
      .command(
        defineCommand({
          command: "set <key> <value>",
          describe: "Set a config value",
          builder: (yy) =>
            yy
              .positional("key", { type: "string", choices: SETTABLE_KEYS, describe: "Config key" })
              .positional("value", { type: "string", describe: "Value to store" }),
          args: ConfigSetArgsSchema,
          handler: async (args, ctx) => {
            const update: Partial<Config> =
              args.key === "baseUrl" ? { baseUrl: args.value } : { journalPath: args.value };
            const next = await ctx.configStore.save(update);
            writeConfig(
              ctx.configStore.redact(next),
              args.format,
              getOutputWriterOptions(args, ctx.runtime),
            );
          },
        }),
      )
      .command(
        defineCommand({
          command: "clear [keys..]",
          describe: "Clear config values (all when no key is given)",
          builder: (yy) =>
            yy.positional("keys", {
              type: "string",
              array: true,
              choices: CONFIG_KEYS,
              describe: "Keys to clear",
            }),
          args: ConfigClearArgsSchema,
          handler: async (args, ctx) => {
            const next = await ctx.configStore.clear(args.keys.length ? args.keys : "all");
            writeConfig(
              ctx.configStore.redact(next),
              args.format,
              getOutputWriterOptions(args, ctx.runtime),
            );
          },
        }),
      )
      .demandCommand(1, "Specify a config subcommand")
      .strict(),
  handler: () => {},
};
