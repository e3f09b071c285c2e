import type { Logger } from "pino";

import type { JsonValue } from "@/journal/argv";
import type { JournalEntry, JournalFieldChange, JournalStore } from "@/journal/JournalStore";
import { formatError } from "@/util/errors";
import {
  type EntityKind,
  type FieldChange,
  type FieldValue,
  type FieldValues,
  fieldValuesEqual,
  formatEntityRef,
} from "./entities";
import { AlreadyUndoneError, NoHistoryError, SupersededError } from "./errors";
import type { EntityGateway } from "./gateway";
import { MutationPlanner } from "./MutationPlanner";
import { capturePreconditions } from "./preconditions";

export type UndoCapability = "native-undo" | "journal-replay";

export type UndoTarget = { target: "last" } | { target: "seq"; seq: number };

export type UndoFieldStatus = "restored" | "conflict" | "not-eligible" | "failed";

export type UndoFieldResult = {
  field: string;
  status: UndoFieldStatus;
  /** The value the undone entry set. */
  expected: FieldValue;
  /** The value found at undo time, when it was read. */
  actual?: FieldValue;
  restoredTo?: FieldValue;
  detail?: string;
};

export type UndoReport = {
  seq: number;
  /** Statuses describe what would happen; nothing was written. */
  dryRun: boolean;
  strategy: UndoCapability;
  fields: UndoFieldResult[];
  /** The original entry as it stands after the undo. */
  entry: JournalEntry;
  /** The entry journaling the restore, when anything was written. */
  undoEntry?: JournalEntry;
};

export type UndoExecutorOptions = {
  capabilities?: Partial<Record<EntityKind, UndoCapability>>;
  logger?: Logger;
};

export type UndoRunOptions = {
  argv?: Record<string, JsonValue>;
  dryRun?: boolean;
};

type ResolvedTarget = {
  entry: JournalEntry;
  eligible: JournalFieldChange[];
};

type RestorePlan = {
  write: FieldValues;
  trivial: string[];
  results: Map<string, UndoFieldResult>;
};

export const UNDO_ACTION_TYPE = "undo";

export function undoFailed(report: UndoReport): boolean {
  return report.fields.some((field) => field.status === "failed");
}

export function undoConflicted(report: UndoReport): boolean {
  return report.fields.some((field) => field.status === "conflict");
}

export class UndoExecutor {
  private readonly planner: MutationPlanner;
  private readonly capabilities: Partial<Record<EntityKind, UndoCapability>>;
  private readonly logger?: Logger;

  constructor(
    private readonly gateway: EntityGateway,
    private readonly journal: JournalStore,
    options: UndoExecutorOptions = {},
  ) {
    this.planner = new MutationPlanner(gateway);
    this.capabilities = options.capabilities ?? {};
    this.logger = options.logger;
  }

  strategyFor(kind: EntityKind): UndoCapability {
    const configured = this.capabilities[kind] ?? "journal-replay";
    if (configured === "native-undo" && !this.gateway.nativeUndo) {
      this.logger?.warn({ event: "undo.strategy", kind, reason: "native undo unavailable" });
      return "journal-replay";
    }
    return configured;
  }

  async undo(target: UndoTarget, options: UndoRunOptions = {}): Promise<UndoReport> {
    // Eligibility is decided from fresh journal state under the write lock.
    const { entry, eligible } = this.journal.withLock(() => this.resolveTarget(target));
    const strategy = this.strategyFor(entry.ref.kind);

    const results = new Map<string, UndoFieldResult>();
    for (const change of entry.changes) {
      if (change.state === "applied") continue;
      results.set(change.field, {
        field: change.field,
        status: "not-eligible",
        expected: change.newValue,
        detail:
          change.state === "undone"
            ? "already undone"
            : `superseded by entry ${change.supersededBy ?? "?"}`,
      });
    }

    let current: FieldValues;
    try {
      current = await capturePreconditions(
        this.gateway,
        entry.ref,
        eligible.map((change) => change.field),
      );
    } catch (err) {
      for (const change of eligible) {
        results.set(change.field, {
          field: change.field,
          status: "failed",
          expected: change.newValue,
          detail: formatError(err),
        });
      }
      return this.finish(entry, strategy, results, { dryRun: Boolean(options.dryRun) });
    }

    const plan = this.planRestore(eligible, current, results);
    if (options.dryRun) {
      return this.finish(entry, strategy, results, { dryRun: true });
    }

    const restoredWithoutWrite = [...plan.trivial];
    let written: FieldChange[] = [];

    if (Object.keys(plan.write).length > 0) {
      if (strategy === "native-undo") {
        written = await this.restoreNatively(entry, plan, current);
      } else {
        const replay = await this.restoreByReplay(entry, plan, current);
        written = replay.written;
        restoredWithoutWrite.push(...replay.alreadyRestored);
      }
    }

    const undoEntry = this.journal.withLock(() => {
      let appended: JournalEntry | undefined;
      if (written.length > 0) {
        appended = this.journal.append({
          ref: entry.ref,
          changes: written,
          actionType: UNDO_ACTION_TYPE,
          argv: options.argv,
          origin: strategy === "native-undo" ? "native-undo" : "undo",
          undoOf: entry.seq,
        }).entry;
      }
      if (restoredWithoutWrite.length > 0) {
        this.journal.mark(entry.seq, "undone", restoredWithoutWrite);
      }
      return appended;
    });

    if (undoEntry) {
      this.logger?.info({
        event: "journal.append",
        seq: undoEntry.seq,
        undoOf: entry.seq,
        origin: undoEntry.origin,
        ref: formatEntityRef(undoEntry.ref),
      });
    }
    if (restoredWithoutWrite.length > 0) {
      this.logger?.info({ event: "journal.mark", seq: entry.seq, state: "undone", fields: restoredWithoutWrite });
    }

    return this.finish(entry, strategy, results, { dryRun: false, undoEntry });
  }

  private resolveTarget(target: UndoTarget): ResolvedTarget {
    const entry =
      target.target === "seq" ? this.journal.getEntry(target.seq) : this.journal.lastApplied();
    if (!entry) {
      throw target.target === "seq"
        ? new NoHistoryError(`Nothing to undo: journal entry ${target.seq} does not exist.`)
        : new NoHistoryError();
    }

    const eligible = entry.changes.filter((change) => change.state === "applied");
    if (eligible.length === 0) {
      const superseded = entry.changes
        .filter((change) => change.state === "superseded")
        .map((change) => change.field);
      if (superseded.length > 0) throw new SupersededError(entry.seq, superseded);
      throw new AlreadyUndoneError(entry.seq);
    }
    return { entry, eligible };
  }

  /**
   * A field still holding the entry's new value is restored. A field already back
   * at the old value needs no write. Anything else drifted and is left alone.
   */
  private planRestore(
    eligible: readonly JournalFieldChange[],
    current: FieldValues,
    results: Map<string, UndoFieldResult>,
  ): RestorePlan {
    const write: FieldValues = {};
    const trivial: string[] = [];

    for (const change of eligible) {
      const actual = current[change.field] ?? null;
      if (fieldValuesEqual(actual, change.oldValue)) {
        trivial.push(change.field);
        results.set(change.field, {
          field: change.field,
          status: "restored",
          expected: change.newValue,
          actual,
          restoredTo: change.oldValue,
          detail: "already at the previous value",
        });
        continue;
      }
      if (fieldValuesEqual(actual, change.newValue)) {
        write[change.field] = change.oldValue;
        results.set(change.field, {
          field: change.field,
          status: "restored",
          expected: change.newValue,
          actual,
          restoredTo: change.oldValue,
        });
        continue;
      }
      results.set(change.field, {
        field: change.field,
        status: "conflict",
        expected: change.newValue,
        actual,
        detail: "changed since this entry was applied",
      });
    }

    return { write, trivial, results };
  }

  private async restoreNatively(
    entry: JournalEntry,
    plan: RestorePlan,
    current: FieldValues,
  ): Promise<FieldChange[]> {
    const fields = Object.keys(plan.write);
    try {
      await this.gateway.nativeUndo?.(entry.ref, plan.write);
    } catch (err) {
      this.failFields(plan.results, fields, formatError(err));
      return [];
    }
    return fields.map((field) => ({
      field,
      oldValue: current[field] ?? null,
      newValue: plan.write[field] ?? null,
    }));
  }

  private async restoreByReplay(
    entry: JournalEntry,
    plan: RestorePlan,
    current: FieldValues,
  ): Promise<{ written: FieldChange[]; alreadyRestored: string[] }> {
    const fields = Object.keys(plan.write);
    const outcome = await this.planner.restore(entry.ref, plan.write, current);

    if (outcome.status === "failed") {
      this.failFields(plan.results, fields, outcome.error?.message ?? "restore failed");
      return { written: [], alreadyRestored: [] };
    }

    const rejected = outcome.rejectedFields ?? {};
    for (const [field, detail] of Object.entries(rejected)) {
      this.failFields(plan.results, [field], detail);
    }
    return { written: outcome.changes, alreadyRestored: outcome.noopFields };
  }

  private failFields(results: Map<string, UndoFieldResult>, fields: readonly string[], detail: string): void {
    for (const field of fields) {
      const previous = results.get(field);
      if (!previous) continue;
      results.set(field, {
        field,
        status: "failed",
        expected: previous.expected,
        actual: previous.actual,
        detail,
      });
    }
  }

  private finish(
    original: JournalEntry,
    strategy: UndoCapability,
    results: Map<string, UndoFieldResult>,
    outcome: { dryRun: boolean; undoEntry?: JournalEntry },
  ): UndoReport {
    const fields = original.changes.flatMap((change) => {
      const result = results.get(change.field);
      return result ? [result] : [];
    });
    for (const field of fields) {
      const payload = { event: "undo.field", seq: original.seq, ...field };
      if (field.status === "failed" || field.status === "conflict") {
        this.logger?.warn(payload);
      } else {
        this.logger?.debug(payload);
      }
    }
    return {
      seq: original.seq,
      dryRun: outcome.dryRun,
      strategy,
      fields,
      entry: this.journal.requireEntry(original.seq),
      undoEntry: outcome.undoEntry,
    };
  }
}
