// Static page: ScreenerSource backed by a saved HTML file, for offline runs.

import { FileSystem } from "@effect/platform";
import { Config, Effect, Layer } from "effect";
import { FetchError, ScreenerSource } from "../screener-api.ts";

export const StaticPageSourceLive = Layer.effect(
  ScreenerSource,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* Config.string("SCREENER_FILE").pipe(
      Config.withDefault("fixtures/screener-page.html"),
    );

    return ScreenerSource.of({
      fetchPage: fs.readFileString(file).pipe(
        Effect.mapError(
          (e) =>
            new FetchError({
              reason: "Transport",
              message: `Cannot read ${file}: ${e.message}`,
            }),
        ),
      ),
    });
  }),
);
