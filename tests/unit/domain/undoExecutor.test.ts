import { afterEach, expect, test } from "vitest";

import { entityRef } from "@/domain/entities";
import { AlreadyUndoneError, NoHistoryError, SupersededError } from "@/domain/errors";
import type { EntityGateway } from "@/domain/gateway";
import { MutationService } from "@/domain/MutationService";
import { UndoExecutor, type UndoExecutorOptions } from "@/domain/UndoExecutor";
import type { JournalDb } from "@/journal/db";
import { ExitCode, exitCodeForUndo } from "@/util/exitCodes";
import { openTestJournal } from "../../helpers/journal";
import { MemoryGateway, NativeUndoGateway } from "../../helpers/memoryGateway";

const t1 = entityRef("transaction", "t1");

const opened: JournalDb[] = [];

afterEach(() => {
  for (const db of opened.splice(0)) db.close();
});

async function setup<G extends MemoryGateway>(gateway: G, options: UndoExecutorOptions = {}) {
  const { db, journal } = await openTestJournal();
  opened.push(db);
  gateway.seed(t1, { reviewed: false, notes: null, tagIds: [] });
  const service = new MutationService(gateway, journal);
  const apply = (values: Record<string, string | boolean | null | string[]>) =>
    service.apply(
      { kind: "transaction", ids: ["t1"], values },
      { decision: { action: "execute" }, actionType: "tx.edit" },
    );
  const executor = new UndoExecutor(gateway, journal, options);
  return { gateway, journal, apply, executor };
}

test("undo restores every field of the last entry and journals the restore", async () => {
  const { gateway, journal, apply, executor } = await setup(new MemoryGateway());
  await apply({ reviewed: true, notes: "lunch" });

  const report = await executor.undo({ target: "last" }, { argv: { seq: null } });

  expect(report.seq).toBe(1);
  expect(report.strategy).toBe("journal-replay");
  expect(report.fields).toEqual([
    { field: "reviewed", status: "restored", expected: true, actual: true, restoredTo: false },
    { field: "notes", status: "restored", expected: "lunch", actual: "lunch", restoredTo: null },
  ]);
  expect(gateway.value(t1, "reviewed")).toBe(false);
  expect(gateway.value(t1, "notes")).toBeNull();
  expect(report.entry.state).toBe("undone");
  expect(report.undoEntry).toMatchObject({
    seq: 2,
    origin: "undo",
    undoOf: 1,
    actionType: "undo",
    argv: { seq: null },
    changes: [
      { field: "reviewed", oldValue: true, newValue: false, state: "applied" },
      { field: "notes", oldValue: "lunch", newValue: null, state: "applied" },
    ],
  });
  expect(journal.requireEntry(1).state).toBe("undone");
  expect(exitCodeForUndo(report)).toBe(ExitCode.Success);
});

test("undoing the same entry twice is not eligible", async () => {
  const { apply, executor } = await setup(new MemoryGateway());
  await apply({ notes: "lunch" });
  await executor.undo({ target: "seq", seq: 1 });

  await expect(executor.undo({ target: "seq", seq: 1 })).rejects.toBeInstanceOf(AlreadyUndoneError);
});

test("undo of an undo re-applies the original change", async () => {
  const { gateway, apply, executor } = await setup(new MemoryGateway());
  await apply({ notes: "lunch" });
  await executor.undo({ target: "last" });

  const redo = await executor.undo({ target: "last" });

  expect(redo.seq).toBe(2);
  expect(redo.fields[0]).toMatchObject({ field: "notes", status: "restored", restoredTo: "lunch" });
  expect(gateway.value(t1, "notes")).toBe("lunch");
  expect(redo.undoEntry?.undoOf).toBe(2);
});

test("an entry whose fields were all overwritten later is superseded", async () => {
  const { apply, executor } = await setup(new MemoryGateway());
  await apply({ notes: "a" });
  await apply({ notes: "b" });

  const error = await executor.undo({ target: "seq", seq: 1 }).catch((err: unknown) => err);

  expect(error).toBeInstanceOf(SupersededError);
  expect(error).toHaveProperty("fields", ["notes"]);
});

test("a field changed outside the journal is a conflict and is left alone", async () => {
  const { gateway, journal, apply, executor } = await setup(new MemoryGateway());
  await apply({ notes: "a" });
  gateway.edit(t1, "notes", "edited elsewhere");
  const writesBefore = gateway.writes.length;

  const report = await executor.undo({ target: "last" });

  expect(report.fields).toEqual([
    {
      field: "notes",
      status: "conflict",
      expected: "a",
      actual: "edited elsewhere",
      detail: "changed since this entry was applied",
    },
  ]);
  expect(gateway.writes).toHaveLength(writesBefore);
  expect(gateway.value(t1, "notes")).toBe("edited elsewhere");
  expect(report.undoEntry).toBeUndefined();
  expect(journal.requireEntry(1).state).toBe("applied");
  expect(exitCodeForUndo(report)).toBe(ExitCode.UndoConflict);
});

test("conflicting fields do not block restoring the others", async () => {
  const { gateway, journal, apply, executor } = await setup(new MemoryGateway());
  await apply({ reviewed: true, notes: "a" });
  gateway.edit(t1, "notes", "b");

  const report = await executor.undo({ target: "last" });

  expect(report.fields.map((field) => [field.field, field.status])).toEqual([
    ["reviewed", "restored"],
    ["notes", "conflict"],
  ]);
  expect(gateway.writes.at(-1)?.values).toEqual({ reviewed: false });
  expect(journal.requireEntry(1).changes.map((change) => change.state)).toEqual([
    "undone",
    "applied",
  ]);
});

test("a field already back at its old value is restored without a write", async () => {
  const { gateway, journal, apply, executor } = await setup(new MemoryGateway());
  await apply({ notes: "a" });
  gateway.edit(t1, "notes", null);
  const writesBefore = gateway.writes.length;

  const report = await executor.undo({ target: "last" });

  expect(report.fields).toEqual([
    {
      field: "notes",
      status: "restored",
      expected: "a",
      actual: null,
      restoredTo: null,
      detail: "already at the previous value",
    },
  ]);
  expect(gateway.writes).toHaveLength(writesBefore);
  expect(report.undoEntry).toBeUndefined();
  expect(journal.requireEntry(1).state).toBe("undone");
});

test("a failed restore write leaves the entry applied", async () => {
  const { gateway, journal, apply, executor } = await setup(new MemoryGateway());
  await apply({ notes: "a" });
  gateway.failWritesFor(t1);

  const report = await executor.undo({ target: "last" });

  expect(report.fields).toEqual([
    {
      field: "notes",
      status: "failed",
      expected: "a",
      actual: "a",
      detail: "Writing transaction:t1 failed: HTTP 502",
    },
  ]);
  expect(report.undoEntry).toBeUndefined();
  expect(journal.requireEntry(1).state).toBe("applied");
  expect(exitCodeForUndo(report)).toBe(ExitCode.Failure);
});

test("a failed capture read fails every eligible field", async () => {
  const { gateway, apply, executor } = await setup(new MemoryGateway());
  await apply({ reviewed: true, notes: "a" });
  gateway.failReadsFor(t1);

  const report = await executor.undo({ target: "last" });

  expect(report.fields.map((field) => field.status)).toEqual(["failed", "failed"]);
  expect(report.fields[0]?.detail).toBe("Reading transaction:t1 failed: connection reset");
});

test("a restore the service partly rejects reports the rejected field as failed", async () => {
  const { gateway, journal, apply, executor } = await setup(new MemoryGateway());
  await apply({ reviewed: true, notes: "a" });
  gateway.rejectFieldsFor(t1, { notes: "locked" });

  const report = await executor.undo({ target: "last" });

  expect(report.fields.map((field) => [field.field, field.status, field.detail])).toEqual([
    ["reviewed", "restored", undefined],
    ["notes", "failed", "locked"],
  ]);
  expect(report.undoEntry?.changes.map((change) => change.field)).toEqual(["reviewed"]);
  expect(journal.requireEntry(1).changes.map((change) => change.state)).toEqual([
    "undone",
    "applied",
  ]);
});

test("an empty journal has nothing to undo", async () => {
  const { executor } = await setup(new MemoryGateway());

  await expect(executor.undo({ target: "last" })).rejects.toBeInstanceOf(NoHistoryError);
  await expect(executor.undo({ target: "seq", seq: 99 })).rejects.toThrow(
    "Nothing to undo: journal entry 99 does not exist.",
  );
});

test("a dry run reports what would happen without writing or journaling", async () => {
  const { gateway, journal, apply, executor } = await setup(new MemoryGateway());
  await apply({ notes: "a" });
  const writesBefore = gateway.writes.length;

  const report = await executor.undo({ target: "last" }, { dryRun: true });

  expect(report.dryRun).toBe(true);
  expect(report.fields[0]).toMatchObject({ field: "notes", status: "restored", restoredTo: null });
  expect(report.undoEntry).toBeUndefined();
  expect(gateway.writes).toHaveLength(writesBefore);
  expect(gateway.value(t1, "notes")).toBe("a");
  expect(journal.list()).toHaveLength(1);
  expect(journal.requireEntry(1).state).toBe("applied");
});

test("native undo uses the service endpoint and journals an undone entry", async () => {
  const { gateway, journal, apply, executor } = await setup(new NativeUndoGateway(), {
    capabilities: { transaction: "native-undo" },
  });
  await apply({ reviewed: true });
  const writesBefore = gateway.writes.length;

  const report = await executor.undo({ target: "last" });

  expect(report.strategy).toBe("native-undo");
  expect(gateway.nativeUndos).toEqual([{ ref: t1, values: { reviewed: false } }]);
  expect(gateway.writes).toHaveLength(writesBefore);
  expect(report.undoEntry).toMatchObject({ origin: "native-undo", state: "undone", undoOf: 1 });
  expect(journal.requireEntry(1).state).toBe("undone");
  expect(journal.lastApplied()).toBeUndefined();
});

test("native undo falls back to replay when the gateway has no endpoint", async () => {
  const gateway: MemoryGateway = new MemoryGateway();
  const { executor } = await setup(gateway, { capabilities: { transaction: "native-undo" } });
  const plain: EntityGateway = gateway;

  expect(plain.nativeUndo).toBeUndefined();
  expect(executor.strategyFor("transaction")).toBe("journal-replay");
  expect(executor.strategyFor("category")).toBe("journal-replay");
});

test("undo restores an unset transaction type", async () => {
  const { gateway, apply, executor } = await setup(new MemoryGateway());
  gateway.seed(t1, { type: null });
  await apply({ type: "INCOME" });

  const report = await executor.undo({ target: "last" });

  expect(report.fields).toEqual([
    { field: "type", status: "restored", expected: "INCOME", actual: "INCOME", restoredTo: null },
  ]);
  expect(gateway.value(t1, "type")).toBeNull();
  expect(gateway.writes.at(-1)).toEqual({ ref: t1, values: { type: null } });
});

test("undo restores a category name that was unset before a rename", async () => {
  const { gateway, journal, executor } = await setup(new MemoryGateway());
  const c1 = entityRef("category", "c1");
  gateway.seed(c1, { name: null });
  await new MutationService(gateway, journal).apply(
    { kind: "category", ids: ["c1"], values: { name: "Food" } },
    { decision: { action: "execute" }, actionType: "category.edit" },
  );

  const report = await executor.undo({ target: "last" });

  expect(report.fields).toEqual([
    { field: "name", status: "restored", expected: "Food", actual: "Food", restoredTo: null },
  ]);
  expect(gateway.value(c1, "name")).toBeNull();
  expect(report.entry.state).toBe("undone");
});

test("undo restores notes longer than an edit would accept", async () => {
  const long = "x".repeat(2500);
  const { gateway, apply, executor } = await setup(new MemoryGateway());
  gateway.seed(t1, { notes: long });
  await apply({ notes: "short" });

  const report = await executor.undo({ target: "last" });

  expect(report.fields[0]).toMatchObject({ field: "notes", status: "restored", restoredTo: long });
  expect(gateway.value(t1, "notes")).toBe(long);
});

test("replay writes from the snapshot used for the conflict check", async () => {
  const { gateway, apply, executor } = await setup(new MemoryGateway());
  await apply({ reviewed: true });
  gateway.reads = 0;

  await executor.undo({ target: "last" });

  expect(gateway.reads).toBe(1);
  expect(gateway.value(t1, "reviewed")).toBe(false);
});
