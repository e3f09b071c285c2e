import { z } from "zod";

import {
  type EntityKind,
  type EntityRef,
  type FieldChange,
  type FieldValue,
  parseEntityKind,
} from "@/domain/entities";
import { type JsonValue, ArgvSchema } from "./argv";
import type { JournalDb } from "./db";

export const ENTRY_STATES = ["applied", "undone", "superseded"] as const;
export type EntryState = (typeof ENTRY_STATES)[number];

export const ENTRY_ORIGINS = ["apply", "undo", "native-undo"] as const;
export type EntryOrigin = (typeof ENTRY_ORIGINS)[number];

export type JournalFieldChange = FieldChange & {
  state: EntryState;
  supersededBy?: number;
};

export type JournalEntry = {
  seq: number;
  createdAt: string;
  ref: EntityRef;
  state: EntryState;
  origin: EntryOrigin;
  undoOf?: number;
  actionType: string;
  argv: Record<string, JsonValue>;
  changes: JournalFieldChange[];
};

export type AppendInput = {
  ref: EntityRef;
  changes: FieldChange[];
  actionType: string;
  argv?: Record<string, JsonValue>;
  origin?: EntryOrigin;
  /** Sequence of the entry this one reverses; its restored fields become undone. */
  undoOf?: number;
};

export type AppendResult = {
  entry: JournalEntry;
  superseded: Array<{ seq: number; field: string }>;
  /** Fields of `undoOf` that moved to undone. */
  undone: string[];
};

export type ListOptions = {
  limit?: number;
  since?: string;
  ref?: EntityRef;
  kind?: EntityKind;
};

export type JournalStoreOptions = {
  now?: () => Date;
};

type EntryRow = {
  seq: number;
  createdAt: string;
  kind: string;
  entityId: string;
  state: string;
  origin: string;
  undoOf: number | null;
  actionType: string;
  argvJson: string;
};

type FieldRow = {
  field: string;
  oldJson: string;
  newJson: string;
  state: string;
  supersededBy: number | null;
};

const FieldValueSchema: z.ZodType<FieldValue> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
  z.null(),
]);
const EntryStateSchema = z.enum(ENTRY_STATES);
const EntryOriginSchema = z.enum(ENTRY_ORIGINS);

const ENTRY_COLUMNS = `
  seq,
  created_at as createdAt,
  entity_kind as kind,
  entity_id as entityId,
  state,
  origin,
  undo_of as undoOf,
  action_type as actionType,
  argv_json as argvJson
`;

export class JournalEntryNotFoundError extends Error {
  constructor(readonly seq: number) {
    super(`Journal entry ${seq} not found.`);
    this.name = "JournalEntryNotFoundError";
  }
}

export function deriveEntryState(fieldStates: readonly EntryState[]): EntryState {
  if (fieldStates.includes("applied")) return "applied";
  if (fieldStates.length > 0 && fieldStates.every((state) => state === "undone")) return "undone";
  return "superseded";
}

function parseJsonField(json: string): FieldValue {
  return FieldValueSchema.parse(JSON.parse(json));
}

export class JournalStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: JournalDb,
    options: JournalStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs `fn` holding the journal's write lock. Other processes block (up to the
   * busy timeout) until it returns. Nested calls join the outer lock.
   */
  withLock<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  append(input: AppendInput): AppendResult {
    if (input.changes.length === 0) {
      throw new Error("Journal entries need at least one field change.");
    }
    const origin = input.origin ?? "apply";
    if (origin !== "apply" && input.undoOf === undefined) {
      throw new Error(`Entries with origin ${origin} must name the entry they reverse.`);
    }

    return this.withLock(() => {
      const seq = this.nextSeq();
      const fieldState: EntryState = origin === "native-undo" ? "undone" : "applied";

      this.db
        .prepare(
          `insert into journal_entries
             (seq, created_at, entity_kind, entity_id, state, origin, undo_of, action_type, argv_json)
           values (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          seq,
          this.now().toISOString(),
          input.ref.kind,
          input.ref.id,
          fieldState,
          origin,
          input.undoOf ?? null,
          input.actionType,
          JSON.stringify(input.argv ?? {}),
        );

      const insertField = this.db.prepare(
        `insert into journal_fields (seq, position, field, old_json, new_json, state)
         values (?, ?, ?, ?, ?, ?)`,
      );
      input.changes.forEach((change, position) => {
        insertField.run(
          seq,
          position,
          change.field,
          JSON.stringify(change.oldValue),
          JSON.stringify(change.newValue),
          fieldState,
        );
      });

      const undone: string[] = [];
      if (input.undoOf !== undefined) {
        const markUndone = this.db.prepare(
          `update journal_fields set state = 'undone'
           where seq = ? and field = ? and state = 'applied'`,
        );
        for (const change of input.changes) {
          if (markUndone.run(input.undoOf, change.field).changes > 0) {
            undone.push(change.field);
          }
        }
        this.refreshEntryState(input.undoOf);
      }

      const superseded = this.supersedeOlder(input.ref, seq, input.changes);
      for (const touched of new Set(superseded.map((item) => item.seq))) {
        this.refreshEntryState(touched);
      }

      return { entry: this.requireEntry(seq), superseded, undone };
    });
  }

  /** Moves applied fields of `seq` (all of them unless `fields` is given) to `state`. */
  mark(seq: number, state: Exclude<EntryState, "applied">, fields?: readonly string[]): JournalEntry {
    return this.withLock(() => {
      const entry = this.requireEntry(seq);
      const targets = fields ?? entry.changes.map((change) => change.field);
      const update = this.db.prepare(
        `update journal_fields set state = ?
         where seq = ? and field = ? and state = 'applied'`,
      );
      for (const field of targets) {
        update.run(state, seq, field);
      }
      this.refreshEntryState(seq);
      return this.requireEntry(seq);
    });
  }

  getEntry(seq: number): JournalEntry | undefined {
    const row = this.db
      .prepare<[number], EntryRow>(`select ${ENTRY_COLUMNS} from journal_entries where seq = ?`)
      .get(seq);
    return row ? this.hydrate(row) : undefined;
  }

  requireEntry(seq: number): JournalEntry {
    const entry = this.getEntry(seq);
    if (!entry) throw new JournalEntryNotFoundError(seq);
    return entry;
  }

  /** Entries touching `ref`, most recent first. */
  entriesFor(ref: EntityRef): JournalEntry[] {
    return this.list({ ref });
  }

  lastEntry(): JournalEntry | undefined {
    const row = this.db
      .prepare<[], EntryRow>(`select ${ENTRY_COLUMNS} from journal_entries order by seq desc limit 1`)
      .get();
    return row ? this.hydrate(row) : undefined;
  }

  /** Most recent entry that still has an applied field. */
  lastApplied(): JournalEntry | undefined {
    const row = this.db
      .prepare<[], EntryRow>(
        `select ${ENTRY_COLUMNS} from journal_entries
         where state = 'applied'
         order by seq desc limit 1`,
      )
      .get();
    return row ? this.hydrate(row) : undefined;
  }

  list(options: ListOptions = {}): JournalEntry[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (options.ref) {
      clauses.push("entity_kind = ? and entity_id = ?");
      params.push(options.ref.kind, options.ref.id);
    } else if (options.kind) {
      clauses.push("entity_kind = ?");
      params.push(options.kind);
    }
    if (options.since) {
      clauses.push("created_at >= ?");
      params.push(options.since);
    }
    const where = clauses.length ? `where ${clauses.join(" and ")}` : "";
    const limit = options.limit !== undefined ? "limit ?" : "";
    if (options.limit !== undefined) params.push(options.limit);

    const rows = this.db
      .prepare<Array<string | number>, EntryRow>(
        `select ${ENTRY_COLUMNS} from journal_entries ${where} order by seq desc ${limit}`,
      )
      .all(...params);
    return rows.map((row) => this.hydrate(row));
  }

  private nextSeq(): number {
    const row = this.db
      .prepare<[], { lastSeq: number }>(
        "update journal_sequence set last_seq = last_seq + 1 where id = 1 returning last_seq as lastSeq",
      )
      .get();
    if (!row) {
      throw new Error("Journal sequence is missing; the database was not migrated.");
    }
    return row.lastSeq;
  }

  private supersedeOlder(
    ref: EntityRef,
    seq: number,
    changes: readonly FieldChange[],
  ): Array<{ seq: number; field: string }> {
    const select = this.db.prepare<[string, string, string, number], { seq: number }>(
      `select f.seq as seq from journal_fields f
       join journal_entries e on e.seq = f.seq
       where e.entity_kind = ? and e.entity_id = ? and f.field = ?
         and f.state = 'applied' and f.seq <> ?`,
    );
    const update = this.db.prepare(
      `update journal_fields set state = 'superseded', superseded_by = ?
       where seq = ? and field = ?`,
    );

    const superseded: Array<{ seq: number; field: string }> = [];
    for (const change of changes) {
      for (const row of select.all(ref.kind, ref.id, change.field, seq)) {
        update.run(seq, row.seq, change.field);
        superseded.push({ seq: row.seq, field: change.field });
      }
    }
    return superseded;
  }

  private refreshEntryState(seq: number): void {
    const states = this.db
      .prepare<[number], { state: string }>("select state from journal_fields where seq = ?")
      .all(seq)
      .map((row) => EntryStateSchema.parse(row.state));
    this.db
      .prepare("update journal_entries set state = ? where seq = ?")
      .run(deriveEntryState(states), seq);
  }

  private hydrate(row: EntryRow): JournalEntry {
    const fields = this.db
      .prepare<[number], FieldRow>(
        `select field, old_json as oldJson, new_json as newJson, state, superseded_by as supersededBy
         from journal_fields where seq = ? order by position`,
      )
      .all(row.seq);

    const entry: JournalEntry = {
      seq: row.seq,
      createdAt: row.createdAt,
      ref: { kind: parseEntityKind(row.kind), id: row.entityId },
      state: EntryStateSchema.parse(row.state),
      origin: EntryOriginSchema.parse(row.origin),
      actionType: row.actionType,
      argv: ArgvSchema.parse(JSON.parse(row.argvJson)),
      changes: fields.map((field) => {
        const change: JournalFieldChange = {
          field: field.field,
          oldValue: parseJsonField(field.oldJson),
          newValue: parseJsonField(field.newJson),
          state: EntryStateSchema.parse(field.state),
        };
        if (field.supersededBy !== null) change.supersededBy = field.supersededBy;
        return change;
      }),
    };
    if (row.undoOf !== null) entry.undoOf = row.undoOf;
    return entry;
  }
}
