import type { CommandModule } from "yargs";
import { z } from "zod";

import type { Tag } from "@/api/models";
import { GlobalArgsSchema, defineCommand, requireCopilot } from "@/cli/command";
import { collectEditValues, textOrUnset } from "@/cli/editValues";
import { runMutationCommand } from "@/cli/mutations";
import { getOutputWriterOptions } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import { type OutputFormat, type OutputWriterOptions, createOutputWriter, fieldColumn } from "@/io";

type TagRow = {
  id: string;
  name: string;
  color: string;
};

const TagEditArgsSchema = GlobalArgsSchema.extend({
  id: z.coerce.string().trim().min(1),
  name: z.string().optional(),
  colorName: z.string().optional(),
});

export function writeTagList(tags: Tag[], format: OutputFormat, options?: OutputWriterOptions): void {
  if (format === "json") {
    createOutputWriter("json", options).write(tags);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(tags.map((tag) => tag.id));
    return;
  }

  const rows: TagRow[] = tags.map((tag) => ({
    id: tag.id,
    name: tag.name ?? "",
    color: tag.colorName ?? "",
  }));

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<TagRow>("name", { header: "Name" }),
      fieldColumn<TagRow>("color", { header: "Color" }),
      fieldColumn<TagRow>("id", { header: "Id" }),
    ],
    rows,
  });
}

export const tagCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "tag <command>",
  describe: "List and edit tags",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "list",
          describe: "List tags",
          requirements: { auth: true },
          args: GlobalArgsSchema,
          handler: async (args, ctx) => {
            const tags = await requireCopilot(ctx).listTags();
            writeTagList(tags, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .command(
        defineCommand({
          command: "edit <id>",
          describe: "Edit a tag",
          requirements: { auth: true, journal: true },
          builder: (yy) =>
            yy
              .positional("id", { type: "string", describe: "Tag id" })
              .option("name", { type: "string", describe: "New name" })
              .option("color-name", { type: "string", describe: 'Color name, or "none" to clear' }),
          args: TagEditArgsSchema,
          handler: async (args, ctx) => {
            await runMutationCommand(ctx, args, {
              kind: "tag",
              ids: [args.id],
              values: collectEditValues({
                name: args.name,
                colorName: args.colorName === undefined ? undefined : textOrUnset(args.colorName),
              }),
              actionType: "tag.edit",
              summary: `Edit tag ${args.id}`,
            });
          },
        }),
      )
      .demandCommand(1, "Specify a tag subcommand")
      .strict(),
  handler: () => {},
};
