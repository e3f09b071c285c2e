import { type EntityRef, formatEntityRef } from "./entities";

export class EntityNotFoundError extends Error {
  constructor(
    public readonly ref: EntityRef,
    detail?: string,
  ) {
    super(detail ? `${formatEntityRef(ref)} not found: ${detail}` : `${formatEntityRef(ref)} not found`);
    this.name = "EntityNotFoundError";
  }
}

export class ReadFailedError extends Error {
  constructor(
    public readonly ref: EntityRef,
    public readonly detail: string,
    options?: ErrorOptions,
  ) {
    super(`Reading ${formatEntityRef(ref)} failed: ${detail}`, options);
    this.name = "ReadFailedError";
  }
}

export class WriteFailedError extends Error {
  constructor(
    public readonly ref: EntityRef,
    public readonly detail: string,
    options?: ErrorOptions,
  ) {
    super(`Writing ${formatEntityRef(ref)} failed: ${detail}`, options);
    this.name = "WriteFailedError";
  }
}

export type UndoErrorCode = "no-history" | "already-undone" | "superseded";

export class UndoError extends Error {
  constructor(
    public readonly code: UndoErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "UndoError";
  }
}

export class NoHistoryError extends UndoError {
  constructor(detail = "Nothing to undo: the journal has no eligible entries.") {
    super("no-history", detail);
    this.name = "NoHistoryError";
  }
}

export class AlreadyUndoneError extends UndoError {
  constructor(public readonly seq: number) {
    super("already-undone", `Journal entry ${seq} has already been undone.`);
    this.name = "AlreadyUndoneError";
  }
}

export class SupersededError extends UndoError {
  constructor(
    public readonly seq: number,
    public readonly fields: string[],
  ) {
    super(
      "superseded",
      `Journal entry ${seq} is superseded by a later change to ${fields.join(", ")}.`,
    );
    this.name = "SupersededError";
  }
}
