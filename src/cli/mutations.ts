import { loadValidationContext } from "@/api/gateway";
import { ConfirmationDeclinedError, ConfirmationRequiredError } from "@/app/errors";
import { type ResolvedDecision, decideApply } from "@/domain/applyGate";
import type { DesiredValue, EntityKind } from "@/domain/entities";
import { formatFieldValue } from "@/domain/entities";
import type { PerIdOutcome } from "@/domain/MutationPlanner";
import { type BatchReport, MutationService } from "@/domain/MutationService";
import { type OutputWriterOptions, createOutputWriter, fieldColumn, statusColumn } from "@/io";
import { normalizeArgv } from "@/journal/argv";
import { exitCodeForBatch } from "@/util/exitCodes";
import {
  type CommandContext,
  type GlobalArgs,
  requireCopilot,
  requireGateway,
  requireJournal,
} from "./command";
import { getOutputWriterOptions, writeNotice } from "./outputOptions";
import { confirmYes, isInteractive } from "./prompts";
import type { CliRuntime } from "./types";

export const CONFIRM_QUESTION = "Proceed? Type 'yes' to confirm: ";

export function normalizeIds(ids: string[] | string | undefined): string[] {
  if (!ids) return [];
  const values = Array.isArray(ids) ? ids : [ids];
  const cleaned = values.map((value) => value.trim()).filter((value) => value.length > 0);
  return Array.from(new Set(cleaned));
}

export function setExitCode(runtime: CliRuntime, code: number): void {
  if (runtime.setExitCode) {
    runtime.setExitCode(code);
    return;
  }
  process.exitCode = code;
}

/**
 * Runs the apply gate for one request. Prompts when the session allows it and
 * throws when confirmation is missing or declined.
 */
export async function resolveApplyDecision(
  args: Pick<GlobalArgs, "dryRun" | "yes">,
  runtime: CliRuntime,
  summary: string,
): Promise<ResolvedDecision> {
  const decision = decideApply({
    isWrite: true,
    dryRun: args.dryRun,
    confirmed: args.yes,
    interactive: runtime.interactive ?? isInteractive(),
  });
  if (decision.action !== "require-confirmation") return decision;
  if (!decision.canPrompt) throw new ConfirmationRequiredError();

  (runtime.stderr ?? process.stderr).write(`${summary}\n`);
  const confirm = runtime.confirm ?? confirmYes;
  if (!(await confirm(CONFIRM_QUESTION))) throw new ConfirmationDeclinedError();
  return { action: "execute" };
}

export type MutationCommandInput = {
  kind: EntityKind;
  ids: string[];
  values: Record<string, DesiredValue>;
  actionType: string;
  /** Shown before the confirmation prompt. */
  summary: string;
  /** Kinds whose ids must be checked against the remote lists before writing. */
  validateAgainst?: EntityKind[];
};

export async function runMutationCommand(
  ctx: CommandContext,
  args: GlobalArgs,
  input: MutationCommandInput,
): Promise<BatchReport> {
  if (input.ids.length === 0) {
    throw new Error("Provide at least one id.");
  }
  const decision = await resolveApplyDecision(args, ctx.runtime, input.summary);
  const service = new MutationService(requireGateway(ctx), requireJournal(ctx), ctx.logger);
  const validation = input.validateAgainst?.length
    ? await loadValidationContext(requireCopilot(ctx), input.validateAgainst)
    : undefined;

  const report = await service.apply(
    { kind: input.kind, ids: input.ids, values: input.values },
    { decision, actionType: input.actionType, argv: normalizeArgv(args), validation },
  );

  const options = getOutputWriterOptions(args, ctx.runtime);
  writeBatchReport(report, args.format, options);
  writeNotice(options, summarizeBatch(report));
  setExitCode(ctx.runtime, exitCodeForBatch(report.summary));
  return report;
}

type OutcomeRow = {
  id: string;
  status: string;
  changes: string;
  error: string;
  seq: string;
};

export function describeChanges(outcome: PerIdOutcome): string {
  return outcome.changes
    .map(
      (change) =>
        `${change.field}: ${formatFieldValue(change.oldValue)} -> ${formatFieldValue(change.newValue)}`,
    )
    .join("; ");
}

export function describeOutcomeError(outcome: PerIdOutcome): string {
  const parts: string[] = [];
  if (outcome.error) parts.push(`${outcome.error.code}: ${outcome.error.message}`);
  for (const [field, detail] of Object.entries(outcome.rejectedFields ?? {})) {
    parts.push(`rejected ${field}: ${detail}`);
  }
  if (outcome.journalError !== undefined) parts.push(`journal: ${outcome.journalError}`);
  return parts.join("; ");
}

export function outcomeRows(report: BatchReport): OutcomeRow[] {
  const seqByRef = new Map(report.entries.map((entry) => [entry.ref.id, String(entry.seq)]));
  return report.outcomes.map((outcome) => ({
    id: outcome.ref.id,
    status: outcome.status,
    changes: describeChanges(outcome),
    error: describeOutcomeError(outcome),
    seq: outcome.status === "applied" ? (seqByRef.get(outcome.ref.id) ?? "") : "",
  }));
}

export function summarizeBatch(report: BatchReport): string {
  const count = (status: PerIdOutcome["status"]) =>
    report.outcomes.filter((outcome) => outcome.status === status).length;
  if (report.dryRun) {
    return `Dry run: ${count("dry-run")} would change, ${count("noop")} unchanged, ${count("failed")} failed.`;
  }
  return `Applied ${count("applied")}, unchanged ${count("noop")}, failed ${count("failed")}.`;
}

export function writeBatchReport(
  report: BatchReport,
  format: GlobalArgs["format"],
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write({
      summary: report.summary,
      dryRun: report.dryRun,
      outcomes: report.outcomes,
      entries: report.entries.map((entry) => entry.seq),
    });
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(report.outcomes.map((outcome) => outcome.ref.id));
    return;
  }

  const rows = outcomeRows(report);

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      statusColumn<OutcomeRow>("status"),
      fieldColumn<OutcomeRow>("changes", { header: "Changes", maxWidth: 80 }),
      fieldColumn<OutcomeRow>("error", { header: "Error" }),
      fieldColumn<OutcomeRow>("seq", { header: "Seq" }),
      fieldColumn<OutcomeRow>("id", { header: "Id" }),
    ],
    rows,
  });
}
