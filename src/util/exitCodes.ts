// Exit codes follow common CLI conventions.
// Keep within 0..255.

import { ConfirmationDeclinedError, ConfirmationRequiredError } from "@/app/errors";
import { UndoError } from "@/domain/errors";
import type { BatchSummary } from "@/domain/MutationService";
import { type UndoReport, undoConflicted, undoFailed } from "@/domain/UndoExecutor";

export enum ExitCode {
  Success = 0,
  Failure = 1,
  ConfirmationRequired = 2,
  PartialFailure = 3,
  TotalFailure = 4,
  UndoConflict = 5,
  UndoNotEligible = 6,
}

export function exitCodeForError(err: unknown): ExitCode {
  if (err instanceof ConfirmationRequiredError || err instanceof ConfirmationDeclinedError) {
    return ExitCode.ConfirmationRequired;
  }
  if (err instanceof UndoError) return ExitCode.UndoNotEligible;
  return ExitCode.Failure;
}

export function exitCodeForBatch(summary: BatchSummary): ExitCode {
  switch (summary) {
    case "success":
      return ExitCode.Success;
    case "partial-failure":
      return ExitCode.PartialFailure;
    case "total-failure":
      return ExitCode.TotalFailure;
  }
}

export function exitCodeForUndo(report: UndoReport): ExitCode {
  if (undoFailed(report)) return ExitCode.Failure;
  if (undoConflicted(report)) return ExitCode.UndoConflict;
  return ExitCode.Success;
}
