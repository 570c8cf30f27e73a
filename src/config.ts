// Monitor configuration: read once from the environment at startup.

import { Config, Duration } from "effect";
import { DEFAULT_COUNT_SELECTOR } from "./count-estimator.ts";
import { defaultParserOptions } from "./parser.ts";
import type { OrchestratorConfig } from "./orchestrator.ts";

export const OrchestratorSettings: Config.Config<OrchestratorConfig> = Config.all({
  interval: Config.duration("POLL_INTERVAL").pipe(
    Config.withDefault(Duration.minutes(5)),
  ),
  parser: Config.all({
    minColumns: Config.integer("MIN_COLUMNS").pipe(
      Config.withDefault(defaultParserOptions.minColumns),
      // The symbol lives in the second cell.
      Config.validate({
        message: "MIN_COLUMNS must be at least 2",
        validation: (n) => n >= 2,
      }),
    ),
    rowSelector: Config.string("ROW_SELECTOR").pipe(
      Config.withDefault(defaultParserOptions.rowSelector),
    ),
  }),
  countSelector: Config.string("COUNT_SELECTOR").pipe(
    Config.withDefault(DEFAULT_COUNT_SELECTOR),
  ),
});

export const SourceKind = Config.literal("finviz", "file")("SCREENER_SOURCE").pipe(
  Config.withDefault("finviz" as const),
);

export const StoreKind = Config.literal("sqlite", "json", "memory")(
  "SNAPSHOT_STORE",
).pipe(Config.withDefault("sqlite" as const));
