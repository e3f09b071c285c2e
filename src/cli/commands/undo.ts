import type { CommandModule } from "yargs";
import { z } from "zod";

import { GlobalArgsSchema, defineCommand, requireGateway, requireJournal } from "@/cli/command";
import { resolveApplyDecision, setExitCode } from "@/cli/mutations";
import { getOutputWriterOptions, writeNotice } from "@/cli/outputOptions";
import type { CliGlobalArgs } from "@/cli/types";
import { formatEntityRef, formatFieldValue } from "@/domain/entities";
import { type UndoReport, type UndoTarget, UndoExecutor } from "@/domain/UndoExecutor";
import {
  type OutputFormat,
  type OutputWriterOptions,
  createOutputWriter,
  fieldColumn,
  statusColumn,
} from "@/io";
import { normalizeArgv } from "@/journal/argv";
import type { JournalStore } from "@/journal/JournalStore";
import { exitCodeForUndo } from "@/util/exitCodes";

const VALUE_WIDTH = 40;

type UndoFieldRow = {
  field: string;
  result: string;
  expected: string;
  actual: string;
  restoredTo: string;
  detail: string;
};

const UndoArgsSchema = GlobalArgsSchema.extend({
  seq: z.number().int().positive().optional(),
});

export function undoTarget(seq?: number): UndoTarget {
  return seq === undefined ? { target: "last" } : { target: "seq", seq };
}

export function describeUndoTarget(journal: JournalStore, target: UndoTarget): string {
  const entry =
    target.target === "seq" ? journal.getEntry(target.seq) : journal.lastApplied();
  if (!entry) return "Undo the last journal entry";
  const fields = entry.changes.map((change) => change.field).join(", ");
  return `Undo entry ${entry.seq} (${entry.actionType} on ${formatEntityRef(entry.ref)}: ${fields})`;
}

export function undoRows(report: UndoReport): UndoFieldRow[] {
  return report.fields.map((field) => ({
    field: field.field,
    result: field.status,
    expected: formatFieldValue(field.expected),
    actual: field.actual === undefined ? "" : formatFieldValue(field.actual),
    restoredTo: field.restoredTo === undefined ? "" : formatFieldValue(field.restoredTo),
    detail: field.detail ?? "",
  }));
}

export function summarizeUndo(report: UndoReport): string {
  const count = (status: string) => report.fields.filter((field) => field.status === status).length;
  const restored = count("restored");
  const tail = `${count("conflict")} conflicted, ${count("failed")} failed, ${count("not-eligible")} not eligible.`;
  if (report.dryRun) {
    return `Dry run: entry ${report.seq} would restore ${restored} field(s); ${tail}`;
  }
  const undoSeq = report.undoEntry ? ` as entry ${report.undoEntry.seq}` : "";
  return `Undo of entry ${report.seq}${undoSeq}: restored ${restored}; ${tail}`;
}

export function writeUndoReport(
  report: UndoReport,
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write({
      seq: report.seq,
      dryRun: report.dryRun,
      strategy: report.strategy,
      state: report.entry.state,
      undoSeq: report.undoEntry?.seq ?? null,
      fields: report.fields,
    });
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(report.fields.map((field) => field.field));
    return;
  }

  const rows = undoRows(report);

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<UndoFieldRow>("field", { header: "Field" }),
      statusColumn<UndoFieldRow>("result", "Result"),
      fieldColumn<UndoFieldRow>("expected", { header: "Expected", maxWidth: VALUE_WIDTH }),
      fieldColumn<UndoFieldRow>("actual", { header: "Actual", maxWidth: VALUE_WIDTH }),
      fieldColumn<UndoFieldRow>("restoredTo", { header: "Restored To", maxWidth: VALUE_WIDTH }),
      fieldColumn<UndoFieldRow>("detail", { header: "Detail" }),
    ],
    rows,
  });
}

export const undoCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = defineCommand({
  command: "undo",
  describe: "Undo the last journal entry, or a specific one with --seq",
  requirements: { auth: true, journal: true },
  builder: (y) =>
    y.option("seq", {
      type: "number",
      describe: "Journal sequence number to undo",
    }),
  args: UndoArgsSchema,
  handler: async (args, ctx) => {
    const journal = requireJournal(ctx);
    const target = undoTarget(args.seq);
    const decision = await resolveApplyDecision(
      args,
      ctx.runtime,
      describeUndoTarget(journal, target),
    );

    const executor = new UndoExecutor(requireGateway(ctx), journal, { logger: ctx.logger });
    const report = await executor.undo(target, {
      argv: normalizeArgv(args),
      dryRun: decision.action === "dry-run",
    });

    const options = getOutputWriterOptions(args, ctx.runtime);
    writeUndoReport(report, args.format, options);
    writeNotice(options, summarizeUndo(report));
    setExitCode(ctx.runtime, exitCodeForUndo(report));
  },
});
