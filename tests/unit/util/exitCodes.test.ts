import { expect, test } from "vitest";

import { ConfirmationDeclinedError, ConfirmationRequiredError } from "@/app/errors";
import { AlreadyUndoneError, NoHistoryError, SupersededError } from "@/domain/errors";
import { ExitCode, exitCodeForBatch, exitCodeForError } from "@/util/exitCodes";

test("exitCodeForError maps confirmation and undo eligibility errors", () => {
  expect(exitCodeForError(new ConfirmationRequiredError())).toBe(ExitCode.ConfirmationRequired);
  expect(exitCodeForError(new ConfirmationDeclinedError())).toBe(2);
  expect(exitCodeForError(new NoHistoryError())).toBe(ExitCode.UndoNotEligible);
  expect(exitCodeForError(new AlreadyUndoneError(3))).toBe(6);
  expect(exitCodeForError(new SupersededError(3, ["notes"]))).toBe(6);
  expect(exitCodeForError(new Error("boom"))).toBe(ExitCode.Failure);
});

test("exitCodeForBatch distinguishes partial and total failure", () => {
  expect(exitCodeForBatch("success")).toBe(0);
  expect(exitCodeForBatch("partial-failure")).toBe(3);
  expect(exitCodeForBatch("total-failure")).toBe(4);
});
