// In-memory snapshot store. Lives as long as the process; for tests and dry runs.

import { Context, Effect, Layer, Ref } from "effect";
import { SnapshotStore } from "../screener-api.ts";

export function makeMemorySnapshotStore(
  initial: Iterable<string> = [],
): Effect.Effect<Context.Tag.Service<SnapshotStore>> {
  return Ref.make<ReadonlySet<string>>(new Set(initial)).pipe(
    Effect.map((ref) =>
      SnapshotStore.of({
        load: Ref.get(ref),
        replaceAll: (symbols) => Ref.set(ref, new Set(symbols)),
      }),
    ),
  );
}

export const MemorySnapshotStoreLive = Layer.effect(
  SnapshotStore,
  makeMemorySnapshotStore(),
);
