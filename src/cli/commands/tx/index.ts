import type { Argv, CommandModule } from "yargs";
import { z } from "zod";

import type { CopilotApi } from "@/api/CopilotClient";
import { TRANSACTION_MAX_PAGES, TRANSACTION_PAGE_SIZE, findTransaction } from "@/api/gateway";
import type { Transaction } from "@/api/models";
import {
  type CommandContext,
  GlobalArgsSchema,
  defineCommand,
  requireCopilot,
} from "@/cli/command";
import { normalizeIds, runMutationCommand } from "@/cli/mutations";
import { getOutputWriterOptions } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import { TRANSACTION_TYPES } from "@/domain/changeModel";
import { type DesiredValue, type EntityKind, entityRef } from "@/domain/entities";
import { EntityNotFoundError } from "@/domain/errors";
import {
  type OutputFormat,
  type OutputWriterOptions,
  createOutputWriter,
  fieldColumn,
  formatAmount,
  formatDate,
} from "@/io";

const TxIdsArgsSchema = GlobalArgsSchema.extend({
  ids: z.array(z.coerce.string()).default([]),
});

type TxIdsArgs = z.infer<typeof TxIdsArgsSchema>;

const TxListArgsSchema = GlobalArgsSchema.extend({
  limit: z.number().int().positive().default(50),
  reviewed: z.boolean().optional(),
  unreviewed: z.boolean().optional(),
  categoryId: z.string().optional(),
  nameContains: z.string().optional(),
});

const TxShowArgsSchema = GlobalArgsSchema.extend({
  id: z.coerce.string().trim().min(1),
});

const TxSearchArgsSchema = GlobalArgsSchema.extend({
  query: z.coerce.string().trim().min(1),
  limit: z.number().int().positive().default(200),
  reviewed: z.boolean().optional(),
  unreviewed: z.boolean().optional(),
});

export type TxListFilters = {
  reviewed?: boolean;
  categoryId?: string;
  nameContains?: string;
};

type TransactionRow = {
  id: string;
  date: string;
  name: string;
  amount: string;
  categoryId: string;
  reviewed: string;
  tags: string;
  notes: string;
};

export function matchesTxFilters(transaction: Transaction, filters: TxListFilters): boolean {
  if (filters.reviewed !== undefined && Boolean(transaction.isReviewed) !== filters.reviewed) {
    return false;
  }
  if (filters.categoryId && transaction.categoryId !== filters.categoryId) return false;
  if (filters.nameContains) {
    const needle = filters.nameContains.toLowerCase();
    if (!(transaction.name ?? "").toLowerCase().includes(needle)) return false;
  }
  return true;
}

export async function collectTransactions(
  client: CopilotApi,
  limit: number,
  filters: TxListFilters,
): Promise<Transaction[]> {
  const collected: Transaction[] = [];
  let after: string | null = null;
  for (let page = 0; page < TRANSACTION_MAX_PAGES && collected.length < limit; page += 1) {
    const result = await client.listTransactionsPage(TRANSACTION_PAGE_SIZE, after);
    for (const transaction of result.transactions) {
      if (matchesTxFilters(transaction, filters)) collected.push(transaction);
      if (collected.length >= limit) break;
    }
    if (!result.pageInfo.hasNextPage || !result.pageInfo.endCursor) break;
    after = result.pageInfo.endCursor;
  }
  return collected;
}

function transactionRows(transactions: Transaction[]): TransactionRow[] {
  return transactions.map((transaction) => ({
    id: transaction.id,
    date: formatDate(transaction.date),
    name: transaction.name ?? "",
    amount: formatAmount(transaction.amount),
    categoryId: transaction.categoryId ?? "",
    reviewed: transaction.isReviewed ? "yes" : "no",
    tags: (transaction.tags ?? []).map((tag) => tag.name ?? tag.id).join(","),
    notes: transaction.userNotes ?? "",
  }));
}

export function writeTransactionList(
  transactions: Transaction[],
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(transactions);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(transactions.map((transaction) => transaction.id));
    return;
  }

  const rows = transactionRows(transactions);

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<TransactionRow>("date", { header: "Date" }),
      fieldColumn<TransactionRow>("name", { header: "Name", maxWidth: 40 }),
      fieldColumn<TransactionRow>("amount", { header: "Amount", align: "right" }),
      fieldColumn<TransactionRow>("reviewed", { header: "Reviewed" }),
      fieldColumn<TransactionRow>("categoryId", { header: "Category" }),
      fieldColumn<TransactionRow>("tags", { header: "Tags" }),
      fieldColumn<TransactionRow>("id", { header: "Id" }),
    ],
    rows,
  });
}

type DetailRow = { field: string; value: string };

function detailRows(transaction: Transaction): DetailRow[] {
  const [row] = transactionRows([transaction]);
  if (!row) return [];
  return [
    { field: "id", value: row.id },
    { field: "date", value: row.date },
    { field: "name", value: row.name },
    { field: "amount", value: row.amount },
    { field: "type", value: transaction.type ?? "" },
    { field: "reviewed", value: row.reviewed },
    { field: "categoryId", value: row.categoryId },
    { field: "recurringId", value: transaction.recurringId ?? "" },
    { field: "tags", value: row.tags },
    { field: "notes", value: row.notes },
    { field: "accountId", value: transaction.accountId ?? "" },
    { field: "itemId", value: transaction.itemId ?? "" },
  ];
}

export function writeTransactionDetail(
  transaction: Transaction,
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(transaction);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write([transaction.id]);
    return;
  }

  const rows = detailRows(transaction);

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<DetailRow>("field", { header: "Field" }),
      fieldColumn<DetailRow>("value", { header: "Value", maxWidth: 80 }),
    ],
    rows,
  });
}

function reviewedFilter(args: { reviewed?: boolean; unreviewed?: boolean }): boolean | undefined {
  return args.reviewed ? true : args.unreviewed ? false : undefined;
}

function withTxIds(y: Argv<CliGlobalArgs>): Argv<CliGlobalArgs> {
  return y.positional("ids", {
    type: "string",
    array: true,
    describe: "Transaction ids",
  });
}

function txMutationCommand<S extends z.ZodType<TxIdsArgs, z.ZodTypeDef, unknown>>(spec: {
  command: string;
  describe: string;
  actionType: string;
  builder?: (y: Argv<CliGlobalArgs>) => Argv<CliGlobalArgs>;
  args: S;
  values: (args: z.output<S>) => Record<string, DesiredValue>;
  validateAgainst?: EntityKind[];
}): CommandModule<CliGlobalArgs, CliGlobalArgs> {
  return defineCommand({
    command: spec.command,
    describe: spec.describe,
    requirements: { auth: true, journal: true },
    builder: (y) => (spec.builder ? spec.builder(withTxIds(y)) : withTxIds(y)),
    args: spec.args,
    handler: async (args, ctx: CommandContext) => {
      const ids = normalizeIds(args.ids);
      await runMutationCommand(ctx, args, {
        kind: "transaction",
        ids,
        values: spec.values(args),
        actionType: spec.actionType,
        summary: `${spec.describe}: ${ids.join(", ")}`,
        validateAgainst: spec.validateAgainst,
      });
    },
  });
}

const SetCategoryArgsSchema = TxIdsArgsSchema.extend({ categoryId: z.string().min(1) });

const SetNotesArgsSchema = TxIdsArgsSchema.extend({
  notes: z.string().optional(),
  clear: z.boolean().default(false),
}).refine((args) => args.clear || args.notes !== undefined, {
  message: "Use --notes <TEXT> or --clear.",
});

const SetTagsArgsSchema = TxIdsArgsSchema.extend({
  mode: z.enum(["set", "add", "remove"]).default("set"),
  tagId: z.array(z.coerce.string()).default([]),
}).refine((args) => args.mode === "set" || args.tagId.length > 0, {
  message: "--tag-id is required for --mode add/remove.",
});

const AssignRecurringArgsSchema = TxIdsArgsSchema.extend({ recurringId: z.string().min(1) });

const SetTypeArgsSchema = TxIdsArgsSchema.extend({ type: z.enum(TRANSACTION_TYPES) });

export function tagValue(mode: "set" | "add" | "remove", tagIds: string[]): DesiredValue {
  return mode === "set" ? tagIds : { op: mode, values: tagIds };
}

export const txCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "tx <command>",
  describe: "Query and edit transactions",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "list",
          describe: "List transactions",
          requirements: { auth: true },
          builder: (yy) =>
            yy
              .option("limit", {
                type: "number",
                default: 50,
                describe: "Maximum number of transactions to show",
              })
              .option("reviewed", {
                type: "boolean",
                describe: "Only reviewed transactions",
              })
              .option("unreviewed", {
                type: "boolean",
                describe: "Only unreviewed transactions",
              })
              .option("category-id", {
                type: "string",
                describe: "Filter by category id",
              })
              .option("name-contains", {
                type: "string",
                describe: "Filter by name substring (case-insensitive)",
              })
              .conflicts("reviewed", "unreviewed"),
          args: TxListArgsSchema,
          handler: async (args, ctx) => {
            const transactions = await collectTransactions(requireCopilot(ctx), args.limit, {
              reviewed: reviewedFilter(args),
              categoryId: args.categoryId,
              nameContains: args.nameContains,
            });
            writeTransactionList(transactions, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .command(
        defineCommand({
          command: "show <id>",
          describe: "Show one transaction",
          requirements: { auth: true },
          builder: (yy) =>
            yy.positional("id", {
              type: "string",
              describe: "Transaction id",
            }),
          args: TxShowArgsSchema,
          handler: async (args, ctx) => {
            const transaction = await findTransaction(requireCopilot(ctx), args.id);
            if (!transaction) throw new EntityNotFoundError(entityRef("transaction", args.id));
            writeTransactionDetail(transaction, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .command(
        defineCommand({
          command: "search <query>",
          describe: "Find transactions whose name contains a text",
          requirements: { auth: true },
          builder: (yy) =>
            yy
              .positional("query", {
                type: "string",
                describe: "Text to look for (case-insensitive)",
              })
              .option("limit", {
                type: "number",
                default: 200,
                describe: "Maximum number of transactions to show",
              })
              .option("reviewed", {
                type: "boolean",
                describe: "Only reviewed transactions",
              })
              .option("unreviewed", {
                type: "boolean",
                describe: "Only unreviewed transactions",
              })
              .conflicts("reviewed", "unreviewed"),
          args: TxSearchArgsSchema,
          handler: async (args, ctx) => {
            const transactions = await collectTransactions(requireCopilot(ctx), args.limit, {
              reviewed: reviewedFilter(args),
              nameContains: args.query,
            });
            writeTransactionList(transactions, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .command(
        txMutationCommand({
          command: "review <ids..>",
          describe: "Mark transactions reviewed",
          actionType: "tx.review",
          args: TxIdsArgsSchema,
          values: () => ({ reviewed: true }),
        }),
      )
      .command(
        txMutationCommand({
          command: "unreview <ids..>",
          describe: "Mark transactions unreviewed",
          actionType: "tx.unreview",
          args: TxIdsArgsSchema,
          values: () => ({ reviewed: false }),
        }),
      )
      .command(
        txMutationCommand({
          command: "set-category <ids..>",
          describe: "Set the category of transactions",
          actionType: "tx.set-category",
          builder: (yy) =>
            yy.option("category-id", {
              type: "string",
              demandOption: true,
              describe: "Category id",
            }),
          args: SetCategoryArgsSchema,
          values: (args) => ({ categoryId: args.categoryId }),
          validateAgainst: ["category"],
        }),
      )
      .command(
        txMutationCommand({
          command: "set-notes <ids..>",
          describe: "Set or clear transaction notes",
          actionType: "tx.set-notes",
          builder: (yy) =>
            yy
              .option("notes", {
                type: "string",
                describe: "Note text",
              })
              .option("clear", {
                type: "boolean",
                default: false,
                describe: "Remove the note",
              })
              .conflicts("notes", "clear"),
          args: SetNotesArgsSchema,
          values: (args) => ({ notes: args.clear ? null : (args.notes ?? null) }),
        }),
      )
      .command(
        txMutationCommand({
          command: "set-tags <ids..>",
          describe: "Replace, add or remove transaction tags",
          actionType: "tx.set-tags",
          builder: (yy) =>
            yy
              .option("mode", {
                type: "string",
                choices: ["set", "add", "remove"] as const,
                default: "set",
                describe: "How --tag-id values combine with existing tags",
              })
              .option("tag-id", {
                type: "string",
                array: true,
                describe: "Tag id (repeatable)",
              }),
          args: SetTagsArgsSchema,
          values: (args) => ({ tagIds: tagValue(args.mode, args.tagId) }),
          validateAgainst: ["tag"],
        }),
      )
      .command(
        txMutationCommand({
          command: "assign-recurring <ids..>",
          describe: "Attach transactions to a recurring",
          actionType: "tx.assign-recurring",
          builder: (yy) =>
            yy.option("recurring-id", {
              type: "string",
              demandOption: true,
              describe: "Recurring id",
            }),
          args: AssignRecurringArgsSchema,
          values: (args) => ({ recurringId: args.recurringId }),
          validateAgainst: ["recurring"],
        }),
      )
      .command(
        txMutationCommand({
          command: "set-type <ids..>",
          describe: "Set the transaction type",
          actionType: "tx.set-type",
          builder: (yy) =>
            yy.option("type", {
              type: "string",
              choices: TRANSACTION_TYPES,
              demandOption: true,
              describe: "Transaction type",
            }),
          args: SetTypeArgsSchema,
          values: (args) => ({ type: args.type }),
        }),
      )
      .demandCommand(1, "Specify a tx subcommand")
      .strict(),
  handler: () => {},
};
