import { Command, Options } from "@effect/cli";
import { FetchHttpClient, type FileSystem, type HttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Config, type ConfigError, Console, Duration, Effect, Layer, Logger, LogLevel } from "effect";
import { OrchestratorSettings, SourceKind, StoreKind } from "./src/config.ts";
import { ConsoleReporterLive } from "./src/console-reporter.ts";
import { formatCrash, formatFailure } from "./src/format.ts";
import { makeOrchestrator } from "./src/orchestrator.ts";
import type { PersistenceError, ScreenerSource } from "./src/screener-api.ts";
import { FinvizSourceLive } from "./src/sources/finviz.ts";
import { StaticPageSourceLive } from "./src/sources/static-page.ts";
import { JsonFileSnapshotStoreLive } from "./src/stores/json-file-store.ts";
import { MemorySnapshotStoreLive } from "./src/stores/memory-store.ts";
import { SqliteSnapshotStoreLive } from "./src/stores/sqlite-store.ts";

// --- CLI ---

const once = Options.boolean("once").pipe(
  Options.withDescription("Run a single poll cycle and exit"),
);

const command = Command.make("screener-watch", { once }).pipe(
  Command.withHandler(({ once }) =>
    Effect.gen(function* () {
      const settings = yield* OrchestratorSettings;
      const orchestrator = yield* makeOrchestrator(settings);

      if (once) {
        const outcome = yield* orchestrator.runCycle;
        switch (outcome._tag) {
          case "Aborted":
          case "CommitFailed":
            yield* Console.error(formatFailure(outcome.error));
            break;
          case "Crashed":
            yield* Console.error(formatCrash(outcome.defect));
            break;
          case "Completed":
            break;
        }
        return;
      }

      yield* Effect.logInfo(
        `Polling every ${Duration.format(settings.interval)}`,
      );
      yield* orchestrator.run;
    })
  ),
);

// --- Layers ---
// SCREENER_SOURCE: "finviz" (default) or "file".
// SNAPSHOT_STORE: "sqlite" (default), "json" or "memory".

const SourceLive = Layer.unwrapEffect<
  ScreenerSource,
  ConfigError.ConfigError,
  HttpClient.HttpClient | FileSystem.FileSystem,
  ConfigError.ConfigError,
  never
>(
  Effect.gen(function* () {
    const kind = yield* SourceKind;
    return kind === "file" ? StaticPageSourceLive : FinvizSourceLive;
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

const StoreLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const kind = yield* StoreKind;
    switch (kind) {
      case "json":
        return JsonFileSnapshotStoreLive;
      case "memory":
        return MemorySnapshotStoreLive;
      case "sqlite":
        return SqliteSnapshotStoreLive;
    }
  }),
);

const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const level = yield* Config.logLevel("LOG_LEVEL").pipe(
      Config.withDefault(LogLevel.Info),
    );
    return Layer.merge(Logger.pretty, Logger.minimumLogLevel(level));
  }),
);

// --- Run ---

const cli = Command.run(command, {
  name: "screener-watch",
  version: "0.1.0",
});

const logStartupError = (e: PersistenceError) => Console.error(formatFailure(e));

// A store that cannot be opened surfaces while the layers are built.
cli(process.argv).pipe(
  Effect.provide(Layer.mergeAll(SourceLive, StoreLive, ConsoleReporterLive)),
  Effect.catchTags({
    PersistenceError: logStartupError,
  }),
  Effect.provide(LoggerLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
