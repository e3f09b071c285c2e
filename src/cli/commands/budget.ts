import type { CommandModule } from "yargs";

import type { BudgetMonth } from "@/api/models";
import { GlobalArgsSchema, defineCommand, requireCopilot } from "@/cli/command";
import { getOutputWriterOptions } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import {
  type OutputFormat,
  type OutputWriterOptions,
  createOutputWriter,
  fieldColumn,
  formatAmount,
} from "@/io";

type BudgetMonthRow = {
  month: string;
  amount: string;
};

export function writeBudgetMonths(
  months: BudgetMonth[],
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(months);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(months.map((month) => month.month));
    return;
  }

  const rows: BudgetMonthRow[] = months.map((month) => ({
    month: month.month,
    amount: formatAmount(month.amount),
  }));

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<BudgetMonthRow>("month", { header: "Month" }),
      fieldColumn<BudgetMonthRow>("amount", { header: "Budgeted", align: "right" }),
    ],
    rows,
  });
}

export const budgetCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "budget <command>",
  describe: "Read budget totals",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "months",
          describe: "List budgeted totals per month",
          requirements: { auth: true },
          args: GlobalArgsSchema,
          handler: async (args, ctx) => {
            const months = await requireCopilot(ctx).listBudgetMonths();
            writeBudgetMonths(months, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .demandCommand(1, "Specify a budget subcommand")
      .strict(),
  handler: () => {},
};
