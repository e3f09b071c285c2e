import type { Logger } from "pino";

import type { JsonValue } from "@/journal/argv";
import type { AppendResult, JournalEntry, JournalStore } from "@/journal/JournalStore";
import { formatError } from "@/util/errors";
import type { ResolvedDecision } from "./applyGate";
import type { ValidationContext } from "./changeModel";
import { type EntityRef, formatEntityRef } from "./entities";
import type { EntityGateway } from "./gateway";
import { type MutationRequest, type PerIdOutcome, MutationPlanner } from "./MutationPlanner";

export type BatchSummary = "success" | "partial-failure" | "total-failure";

export type BatchReport = {
  outcomes: PerIdOutcome[];
  entries: JournalEntry[];
  summary: BatchSummary;
  dryRun: boolean;
};

export type ApplyOptions = {
  decision: ResolvedDecision;
  actionType: string;
  argv?: Record<string, JsonValue>;
  validation?: ValidationContext;
};

export function summarizeOutcomes(outcomes: readonly PerIdOutcome[]): BatchSummary {
  const failures = outcomes.filter((outcome) => outcome.status === "failed").length;
  if (failures === 0) return "success";
  return failures === outcomes.length ? "total-failure" : "partial-failure";
}

export class MutationService {
  private readonly planner: MutationPlanner;

  constructor(
    gateway: EntityGateway,
    private readonly journal: JournalStore,
    private readonly logger?: Logger,
  ) {
    this.planner = new MutationPlanner(gateway);
  }

  /**
   * Applies (or previews) `request` and journals every applied id in request
   * order, each right after its write.
   */
  async apply(request: MutationRequest, options: ApplyOptions): Promise<BatchReport> {
    const dryRun = options.decision.action === "dry-run";
    const entries: JournalEntry[] = [];
    const journalErrors = new Map<PerIdOutcome, string>();

    const planned = await this.planner.planAndApply(request, {
      dryRun,
      validation: options.validation,
      onApplied: (outcome) => {
        let appended: AppendResult;
        try {
          appended = this.journal.append({
            ref: outcome.ref,
            changes: outcome.changes,
            actionType: options.actionType,
            argv: options.argv,
          });
        } catch (err) {
          // The write already happened; the batch carries on and the id is flagged.
          const message = formatError(err);
          journalErrors.set(outcome, message);
          this.logger?.error({
            event: "journal.append",
            status: "failed",
            ref: formatEntityRef(outcome.ref),
            fields: outcome.changes.map((change) => change.field),
            error: message,
          });
          return;
        }
        const { entry, superseded } = appended;
        this.logger?.info({
          event: "journal.append",
          seq: entry.seq,
          ref: formatEntityRef(entry.ref),
          fields: entry.changes.map((change) => change.field),
          superseded,
        });
        entries.push(entry);
      },
    });

    const outcomes = planned.map((outcome) => {
      const journalError = journalErrors.get(outcome);
      return journalError === undefined ? outcome : { ...outcome, journalError };
    });

    for (const outcome of outcomes) {
      const payload = {
        event: "mutation.outcome",
        actionType: options.actionType,
        ref: formatEntityRef(outcome.ref),
        status: outcome.status,
        fields: outcome.changes.map((change) => change.field),
        noopFields: outcome.noopFields,
        rejectedFields: outcome.rejectedFields,
        error: outcome.error,
        journalError: outcome.journalError,
      };
      if (outcome.status === "failed" || outcome.journalError !== undefined) {
        this.logger?.warn(payload);
      } else {
        this.logger?.debug(payload);
      }
    }

    return { outcomes, entries, summary: summarizeOutcomes(outcomes), dryRun };
  }

  /** Journal entries for `ref` (or all entries), most recent first. */
  history(ref?: EntityRef): JournalEntry[] {
    return ref ? this.journal.entriesFor(ref) : this.journal.list();
  }
}
