// JSON file snapshot store: `{ tickers, lastUpdate }`, replaced via rename.

import { FileSystem, Path } from "@effect/platform";
import { Clock, Config, Context, Effect, Layer, Schema } from "effect";
import { PersistenceError, SnapshotStore } from "../screener-api.ts";

const SnapshotFile = Schema.Struct({
  tickers: Schema.Array(Schema.String),
  lastUpdate: Schema.String,
});

const decodeSnapshotFile = Schema.decodeUnknown(Schema.parseJson(SnapshotFile));

const toPersistenceError =
  (action: string, file: string) => (e: { readonly message: string }) =>
    new PersistenceError({ message: `${action} ${file} failed: ${e.message}` });

export function makeJsonFileSnapshotStore(
  file: string,
): Effect.Effect<
  Context.Tag.Service<SnapshotStore>,
  never,
  FileSystem.FileSystem | Path.Path
> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const load = Effect.gen(function* () {
      if (!(yield* fs.exists(file))) return new Set<string>();
      const text = yield* fs.readFileString(file);
      const snapshot = yield* decodeSnapshotFile(text);
      return new Set(snapshot.tickers);
    }).pipe(Effect.mapError(toPersistenceError("Reading", file)));

    const replaceAll = (symbols: ReadonlySet<string>) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const body = JSON.stringify(
          {
            tickers: Array.from(symbols).sort(),
            lastUpdate: new Date(now).toISOString(),
          },
          null,
          2,
        );
        // Write beside the target, then swap it in.
        const temp = `${file}.tmp`;
        yield* fs.makeDirectory(path.dirname(file), { recursive: true });
        yield* fs.writeFileString(temp, body);
        yield* fs.rename(temp, file);
      }).pipe(Effect.mapError(toPersistenceError("Writing", file)));

    return SnapshotStore.of({ load, replaceAll });
  });
}

export const JsonFileSnapshotStoreLive = Layer.effect(
  SnapshotStore,
  Effect.gen(function* () {
    const file = yield* Config.string("SNAPSHOT_PATH").pipe(
      Config.withDefault("data/snapshot.json"),
    );
    yield* Effect.logDebug(`Snapshot store: json file at ${file}`);
    return yield* makeJsonFileSnapshotStore(file);
  }),
);
