import type Database from "better-sqlite3";

type Migration = {
  id: string;
  sql: string;
};

const migrations: Migration[] = [
  {
    id: "001_journal",
    sql: `
      create table if not exists journal_sequence (
        id integer primary key check (id = 1),
        last_seq integer not null
      );

      insert or ignore into journal_sequence (id, last_seq) values (1, 0);

      create table if not exists journal_entries (
        seq integer primary key,
        created_at text not null,
        entity_kind text not null,
        entity_id text not null,
        state text not null check (state in ('applied', 'undone', 'superseded')),
        origin text not null check (origin in ('apply', 'undo', 'native-undo')),
        undo_of integer references journal_entries(seq),
        action_type text not null,
        argv_json text not null default '{}'
      );

      create index if not exists idx_journal_entries_entity
      on journal_entries(entity_kind, entity_id, seq);

      create table if not exists journal_fields (
        seq integer not null references journal_entries(seq),
        position integer not null,
        field text not null,
        old_json text not null,
        new_json text not null,
        state text not null check (state in ('applied', 'undone', 'superseded')),
        superseded_by integer references journal_entries(seq),
        primary key (seq, field)
      );

      create index if not exists idx_journal_fields_state
      on journal_fields(field, state);
    `,
  },
];

export function latestMigrationId(): string {
  return migrations[migrations.length - 1]?.id ?? "0";
}

export function applyMigrations(db: Database.Database): void {
  db.exec(`
    create table if not exists schema_migrations (
      id text primary key,
      applied_at text not null default (datetime('now'))
    );
  `);
  db.exec(`
    create table if not exists schema_version (
      id integer primary key check (id = 1),
      version text not null
    );
  `);

  for (const migration of migrations) {
    // Another process may be migrating the same file; take the write lock first.
    db.exec("begin immediate");
    try {
      const applied = db
        .prepare<[string], { id: string }>("select id from schema_migrations where id = ?")
        .get(migration.id);
      if (!applied) {
        db.exec(migration.sql);
        db.prepare("insert into schema_migrations (id) values (?)").run(migration.id);
        db.prepare(
          `insert into schema_version (id, version) values (1, ?)
           on conflict(id) do update set version = excluded.version`,
        ).run(migration.id);
      }
      db.exec("commit");
    } catch (err) {
      db.exec("rollback");
      throw err;
    }
  }
}
