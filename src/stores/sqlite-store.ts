// SQLite snapshot store: one row per symbol seen in the last committed cycle.

import { FileSystem, Path } from "@effect/platform";
import Database from "better-sqlite3";
import { Config, Context, Effect, Layer, Schema } from "effect";
import { PersistenceError, SnapshotStore } from "../screener-api.ts";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS previous_ticker (
    ticker TEXT PRIMARY KEY NOT NULL
  )
`;

const TickerRows = Schema.Array(Schema.Struct({ ticker: Schema.String }));
const decodeRows = Schema.decodeUnknownSync(TickerRows);

export const IN_MEMORY = ":memory:";

/** Build a store over an open database, creating the table if needed. */
export function makeSqliteSnapshotStore(
  db: Database.Database,
): Effect.Effect<Context.Tag.Service<SnapshotStore>, PersistenceError> {
  return Effect.try({
    try: () => {
      db.exec(SCHEMA);
      const selectAll = db.prepare("SELECT ticker FROM previous_ticker");
      const deleteAll = db.prepare("DELETE FROM previous_ticker");
      const insert = db.prepare("INSERT INTO previous_ticker (ticker) VALUES (?)");

      // Delete and re-insert inside one transaction: all or nothing.
      const replace = db.transaction((symbols: ReadonlyArray<string>) => {
        deleteAll.run();
        for (const symbol of symbols) insert.run(symbol);
      });

      return SnapshotStore.of({
        load: Effect.try({
          try: () =>
            new Set(decodeRows(selectAll.all()).map((row) => row.ticker)),
          catch: (e) =>
            new PersistenceError({ message: `Snapshot load failed: ${String(e)}` }),
        }),
        replaceAll: (symbols) =>
          Effect.try({
            try: () => {
              replace(Array.from(symbols));
            },
            catch: (e) =>
              new PersistenceError({
                message: `Snapshot write failed: ${String(e)}`,
              }),
          }),
      });
    },
    catch: (e) =>
      new PersistenceError({ message: `Snapshot schema setup failed: ${String(e)}` }),
  });
}

// --- SQLite layer ---

export const SqliteSnapshotStoreLive = Layer.scoped(
  SnapshotStore,
  Effect.gen(function* () {
    const file = yield* Config.string("SNAPSHOT_PATH").pipe(
      Config.withDefault("data/screener.db"),
    );

    if (file !== IN_MEMORY) {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;
      yield* fs.makeDirectory(path.dirname(file), { recursive: true }).pipe(
        Effect.mapError(
          (e) => new PersistenceError({ message: `Cannot create ${file}: ${e.message}` }),
        ),
      );
    }

    const db = yield* Effect.acquireRelease(
      Effect.try({
        try: () => new Database(file),
        catch: (e) =>
          new PersistenceError({ message: `Cannot open ${file}: ${String(e)}` }),
      }),
      (db) => Effect.sync(() => db.close()),
    );

    yield* Effect.logDebug(`Snapshot store: sqlite at ${file}`);
    return yield* makeSqliteSnapshotStore(db);
  }),
);
