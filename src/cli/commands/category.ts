import type { CommandModule } from "yargs";
import { z } from "zod";

import type { Category } from "@/api/models";
import { GlobalArgsSchema, defineCommand, requireCopilot } from "@/cli/command";
import { collectEditValues, textOrUnset } from "@/cli/editValues";
import { runMutationCommand } from "@/cli/mutations";
import { getOutputWriterOptions } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import { type OutputFormat, type OutputWriterOptions, createOutputWriter, fieldColumn } from "@/io";

type CategoryRow = {
  id: string;
  name: string;
  emoji: string;
  color: string;
  excluded: string;
};

const CategoryListArgsSchema = GlobalArgsSchema.extend({
  nameContains: z.string().optional(),
});

const CategoryEditArgsSchema = GlobalArgsSchema.extend({
  id: z.coerce.string().trim().min(1),
  name: z.string().optional(),
  emoji: z.string().optional(),
  colorName: z.string().optional(),
  excluded: z.boolean().optional(),
});

export function filterCategories(categories: Category[], nameContains?: string): Category[] {
  const needle = nameContains?.trim().toLowerCase();
  if (!needle) return categories;
  return categories.filter((category) => (category.name ?? "").toLowerCase().includes(needle));
}

export function writeCategoryList(
  categories: Category[],
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(categories);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(categories.map((category) => category.id));
    return;
  }

  const rows: CategoryRow[] = categories.map((category) => ({
    id: category.id,
    name: category.name ?? "",
    emoji: category.emoji ?? "",
    color: category.colorName ?? "",
    excluded: category.isExcluded ? "yes" : "no",
  }));

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<CategoryRow>("emoji", { header: "" }),
      fieldColumn<CategoryRow>("name", { header: "Name" }),
      fieldColumn<CategoryRow>("color", { header: "Color" }),
      fieldColumn<CategoryRow>("excluded", { header: "Excluded" }),
      fieldColumn<CategoryRow>("id", { header: "Id" }),
    ],
    rows,
  });
}

export const categoryCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "category <command>",
  describe: "List and edit categories",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "list",
          describe: "List categories",
          requirements: { auth: true },
          builder: (yy) =>
            yy.option("name-contains", {
              type: "string",
              describe: "Filter by name substring (case-insensitive)",
            }),
          args: CategoryListArgsSchema,
          handler: async (args, ctx) => {
            const categories = await requireCopilot(ctx).listCategories();
            writeCategoryList(
              filterCategories(categories, args.nameContains),
              args.format,
              getOutputWriterOptions(args, ctx.runtime),
            );
          },
        }),
      )
      .command(
        defineCommand({
          command: "edit <id>",
          describe: "Edit a category",
          requirements: { auth: true, journal: true },
          builder: (yy) =>
            yy
              .positional("id", { type: "string", describe: "Category id" })
              .option("name", { type: "string", describe: "New name" })
              .option("emoji", { type: "string", describe: 'Emoji, or "none" to clear' })
              .option("color-name", { type: "string", describe: 'Color name, or "none" to clear' })
              .option("excluded", {
                type: "boolean",
                describe: "Exclude from spending totals",
              }),
          args: CategoryEditArgsSchema,
          handler: async (args, ctx) => {
            await runMutationCommand(ctx, args, {
              kind: "category",
              ids: [args.id],
              values: collectEditValues({
                name: args.name,
                emoji: args.emoji === undefined ? undefined : textOrUnset(args.emoji),
                colorName: args.colorName === undefined ? undefined : textOrUnset(args.colorName),
                excluded: args.excluded,
              }),
              actionType: "category.edit",
              summary: `Edit category ${args.id}`,
            });
          },
        }),
      )
      .demandCommand(1, "Specify a category subcommand")
      .strict(),
  handler: () => {},
};
