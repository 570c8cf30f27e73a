import { type Config, ConfigProvider, Duration, Effect, Either } from "effect";
import { expect, test } from "vitest";
import { OrchestratorSettings, SourceKind, StoreKind } from "./config.ts";

function load<A>(config: Config.Config<A>, env: Record<string, string> = {}) {
  return Effect.runPromise(
    Effect.gen(function* () {
      return yield* config;
    }).pipe(
      Effect.either,
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
    ),
  );
}

test("OrchestratorSettings: defaults", async () => {
  const result = await load(OrchestratorSettings);
  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) {
    const settings = result.right;
    expect(Duration.toMillis(Duration.decode(settings.interval))).toBe(300_000);
    expect(settings.parser).toEqual({
      minColumns: 11,
      rowSelector: "table.screener_table tbody tr",
    });
    expect(settings.countSelector).toBe("#screener-total");
  }
});

test("OrchestratorSettings: reads overrides from the environment", async () => {
  const result = await load(OrchestratorSettings, {
    POLL_INTERVAL: "30 seconds",
    MIN_COLUMNS: "9",
    ROW_SELECTOR: "table#listing tr",
  });
  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) {
    expect(Duration.toMillis(Duration.decode(result.right.interval))).toBe(30_000);
    expect(result.right.parser).toEqual({
      minColumns: 9,
      rowSelector: "table#listing tr",
    });
  }
});

test("OrchestratorSettings: rejects a column threshold below 2", async () => {
  const result = await load(OrchestratorSettings, { MIN_COLUMNS: "1" });
  expect(Either.isLeft(result)).toBe(true);
});

test("SourceKind and StoreKind: default to the live source and sqlite", async () => {
  const source = await load(SourceKind);
  const store = await load(StoreKind);
  expect(Either.getOrThrow(source)).toBe("finviz");
  expect(Either.getOrThrow(store)).toBe("sqlite");
});

test("StoreKind: unknown store is rejected", async () => {
  const result = await load(StoreKind, { SNAPSHOT_STORE: "postgres" });
  expect(Either.isLeft(result)).toBe(true);
});
