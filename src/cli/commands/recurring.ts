import type { CommandModule } from "yargs";
import { z } from "zod";

import type { Recurring } from "@/api/models";
import { GlobalArgsSchema, defineCommand, requireCopilot } from "@/cli/command";
import { amountOrUnset, collectEditValues, textOrUnset } from "@/cli/editValues";
import { runMutationCommand } from "@/cli/mutations";
import { getOutputWriterOptions } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import { type OutputFormat, type OutputWriterOptions, createOutputWriter, fieldColumn } from "@/io";

type RecurringRow = {
  id: string;
  name: string;
  frequency: string;
  state: string;
  categoryId: string;
  rule: string;
};

const RecurringListArgsSchema = GlobalArgsSchema.extend({
  categoryId: z.string().optional(),
  nameContains: z.string().optional(),
});

const RecurringEditArgsSchema = GlobalArgsSchema.extend({
  id: z.coerce.string().trim().min(1),
  nameContains: z.string().optional(),
  minAmount: z.union([z.string(), z.number()]).optional(),
  maxAmount: z.union([z.string(), z.number()]).optional(),
});

export function filterRecurrings(
  recurrings: Recurring[],
  filters: { categoryId?: string; nameContains?: string },
): Recurring[] {
  const needle = filters.nameContains?.trim().toLowerCase();
  return recurrings.filter((recurring) => {
    if (filters.categoryId && recurring.categoryId !== filters.categoryId) return false;
    if (needle && !(recurring.name ?? "").toLowerCase().includes(needle)) return false;
    return true;
  });
}

export function describeRule(recurring: Recurring): string {
  const rule = recurring.rule;
  if (!rule) return "";
  const parts: string[] = [];
  if (rule.nameContains) parts.push(`name~"${rule.nameContains}"`);
  if (rule.minAmount !== null && rule.minAmount !== undefined) parts.push(`>=${rule.minAmount}`);
  if (rule.maxAmount !== null && rule.maxAmount !== undefined) parts.push(`<=${rule.maxAmount}`);
  return parts.join(" ");
}

export function writeRecurringList(
  recurrings: Recurring[],
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(recurrings);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(recurrings.map((recurring) => recurring.id));
    return;
  }

  const rows: RecurringRow[] = recurrings.map((recurring) => ({
    id: recurring.id,
    name: recurring.name ?? "",
    frequency: recurring.frequency ?? "",
    state: recurring.state ?? "",
    categoryId: recurring.categoryId ?? "",
    rule: describeRule(recurring),
  }));

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<RecurringRow>("name", { header: "Name" }),
      fieldColumn<RecurringRow>("frequency", { header: "Frequency" }),
      fieldColumn<RecurringRow>("state", { header: "State" }),
      fieldColumn<RecurringRow>("rule", { header: "Rule" }),
      fieldColumn<RecurringRow>("categoryId", { header: "Category" }),
      fieldColumn<RecurringRow>("id", { header: "Id" }),
    ],
    rows,
  });
}

export const recurringCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "recurring <command>",
  describe: "List recurrings and edit their matching rules",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "list",
          describe: "List recurrings",
          requirements: { auth: true },
          builder: (yy) =>
            yy
              .option("category-id", { type: "string", describe: "Filter by category id" })
              .option("name-contains", {
                type: "string",
                describe: "Filter by name substring (case-insensitive)",
              }),
          args: RecurringListArgsSchema,
          handler: async (args, ctx) => {
            const recurrings = await requireCopilot(ctx).listRecurrings();
            writeRecurringList(
              filterRecurrings(recurrings, args),
              args.format,
              getOutputWriterOptions(args, ctx.runtime),
            );
          },
        }),
      )
      .command(
        defineCommand({
          command: "edit <id>",
          describe: "Edit a recurring's matching rule",
          requirements: { auth: true, journal: true },
          builder: (yy) =>
            yy
              .positional("id", { type: "string", describe: "Recurring id" })
              .option("name-contains", {
                type: "string",
                describe: 'Match transactions whose name contains this text, or "none"',
              })
              .option("min-amount", { type: "string", describe: 'Minimum amount, or "none"' })
              .option("max-amount", { type: "string", describe: 'Maximum amount, or "none"' }),
          args: RecurringEditArgsSchema,
          handler: async (args, ctx) => {
            await runMutationCommand(ctx, args, {
              kind: "recurring",
              ids: [args.id],
              values: collectEditValues({
                nameContains:
                  args.nameContains === undefined ? undefined : textOrUnset(args.nameContains),
                minAmount:
                  args.minAmount === undefined
                    ? undefined
                    : amountOrUnset(args.minAmount, "--min-amount"),
                maxAmount:
                  args.maxAmount === undefined
                    ? undefined
                    : amountOrUnset(args.maxAmount, "--max-amount"),
              }),
              actionType: "recurring.edit",
              summary: `Edit recurring ${args.id}`,
            });
          },
        }),
      )
      .demandCommand(1, "Specify a recurring subcommand")
      .strict(),
  handler: () => {},
};
