import type { CommandModule } from "yargs";
import { z } from "zod";

import { GlobalArgsSchema, defineCommand, requireJournal } from "@/cli/command";
import { getOutputWriterOptions } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import { ENTITY_KINDS, entityRef, formatFieldValue } from "@/domain/entities";
import {
  type OutputFormat,
  type OutputWriterOptions,
  createOutputWriter,
  fieldColumn,
  formatTimestamp,
  statusColumn,
} from "@/io";
import type { JournalEntry } from "@/journal/JournalStore";

type HistoryRow = {
  seq: number;
  createdAt: string;
  state: string;
  action: string;
  entity: string;
  fields: string;
};

type HistoryFieldRow = {
  field: string;
  old: string;
  new: string;
  state: string;
};

const HistoryListArgsSchema = GlobalArgsSchema.extend({
  kind: z.enum(ENTITY_KINDS).optional(),
  id: z.coerce.string().optional(),
  limit: z.number().int().positive().default(20),
  since: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), "must be an ISO 8601 timestamp")
    // Entries store UTC ISO strings and are compared as text.
    .transform((value) => new Date(value).toISOString())
    .optional(),
}).refine((args) => args.id === undefined || args.kind !== undefined, {
  message: "--id requires --kind.",
});

const HistoryShowArgsSchema = GlobalArgsSchema.extend({
  seq: z.coerce.number().int().positive(),
});

function describeAction(entry: JournalEntry): string {
  if (entry.undoOf !== undefined) return `${entry.actionType} #${entry.undoOf}`;
  return entry.actionType;
}

export function writeHistoryList(
  entries: JournalEntry[],
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(entries);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(entries.map((entry) => String(entry.seq)));
    return;
  }

  const rows: HistoryRow[] = entries.map((entry) => ({
    seq: entry.seq,
    createdAt: formatTimestamp(entry.createdAt),
    state: entry.state,
    action: describeAction(entry),
    entity: `${entry.ref.kind}:${entry.ref.id}`,
    fields: entry.changes.map((change) => change.field).join(","),
  }));

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<HistoryRow>("seq", { header: "Seq", align: "right" }),
      fieldColumn<HistoryRow>("createdAt", { header: "Created At" }),
      statusColumn<HistoryRow>("state", "State"),
      fieldColumn<HistoryRow>("action", { header: "Action" }),
      fieldColumn<HistoryRow>("entity", { header: "Entity" }),
      fieldColumn<HistoryRow>("fields", { header: "Fields" }),
    ],
    rows,
  });
}

export function writeHistoryDetail(
  entry: JournalEntry,
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(entry);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write([String(entry.seq)]);
    return;
  }

  const rows: HistoryFieldRow[] = entry.changes.map((change) => ({
    field: change.field,
    old: formatFieldValue(change.oldValue),
    new: formatFieldValue(change.newValue),
    state:
      change.state === "superseded" && change.supersededBy !== undefined
        ? `superseded by ${change.supersededBy}`
        : change.state,
  }));

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  const stdout = options?.stdout ?? process.stdout;
  stdout.write(
    `Entry ${entry.seq} (${entry.state}) ${describeAction(entry)} ${entry.ref.kind}:${entry.ref.id} at ${formatTimestamp(entry.createdAt)}\n`,
  );
  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<HistoryFieldRow>("field", { header: "Field" }),
      fieldColumn<HistoryFieldRow>("old", { header: "Old", maxWidth: 40 }),
      fieldColumn<HistoryFieldRow>("new", { header: "New", maxWidth: 40 }),
      statusColumn<HistoryFieldRow>("state", "State"),
    ],
    rows,
  });
}

export const historyCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "history <command>",
  describe: "Inspect the local mutation journal",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "list",
          describe: "List journal entries, most recent first",
          requirements: { journal: true },
          builder: (yy) =>
            yy
              .option("kind", {
                type: "string",
                choices: ENTITY_KINDS,
                describe: "Only entries for this entity kind",
              })
              .option("id", {
                type: "string",
                describe: "Only entries for this entity id (requires --kind)",
              })
              .option("limit", {
                type: "number",
                default: 20,
                describe: "Maximum number of entries to show",
              })
              .option("since", {
                type: "string",
                describe: "Only include entries on/after this timestamp (ISO 8601)",
              }),
          args: HistoryListArgsSchema,
          handler: (args, ctx) => {
            const journal = requireJournal(ctx);
            const entries = journal.list({
              limit: args.limit,
              since: args.since,
              kind: args.kind,
              ref: args.kind && args.id ? entityRef(args.kind, args.id) : undefined,
            });
            writeHistoryList(entries, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .command(
        defineCommand({
          command: "show <seq>",
          describe: "Show one journal entry with its field changes",
          requirements: { journal: true },
          builder: (yy) =>
            yy.positional("seq", {
              type: "number",
              describe: "Journal sequence number",
            }),
          args: HistoryShowArgsSchema,
          handler: (args, ctx) => {
            const entry = requireJournal(ctx).requireEntry(args.seq);
            writeHistoryDetail(entry, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .demandCommand(1, "Specify a history subcommand")
      .strict(),
  handler: () => {},
};
