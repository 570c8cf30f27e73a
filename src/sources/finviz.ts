// Finviz screener: live implementation of ScreenerSource.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Duration, Effect, Layer, Schedule } from "effect";
import { FetchError, ScreenerSource } from "../screener-api.ts";

export const DEFAULT_SCREENER_URL =
  "https://finviz.com/screener.ashx?v=111&f=sh_opt_optionshort%2Csh_outstanding_u20%2Csh_relvol_o1.5%2Csh_short_o30";

/** Transport hiccups and timeouts are worth another try; a status answer is not. */
export const isRetryable = (e: FetchError): boolean => e.reason !== "Status";

// --- Finviz layer ---

export const FinvizSourceLive = Layer.effect(
  ScreenerSource,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
      ),
    );
    const url = yield* Config.string("SCREENER_URL").pipe(
      Config.withDefault(DEFAULT_SCREENER_URL),
    );
    const timeout = yield* Config.duration("FETCH_TIMEOUT").pipe(
      Config.withDefault(Duration.seconds(10)),
    );

    return ScreenerSource.of({
      fetchPage: client.get(url).pipe(
        Effect.flatMap((response) => response.text),
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new FetchError({ reason: "Transport", message: e.message })),
          ResponseError: (e) =>
            e.reason === "StatusCode"
              ? Effect.fail(
                  new FetchError({
                    reason: "Status",
                    message: `HTTP ${e.response.status}`,
                    status: e.response.status,
                  }),
                )
              : Effect.fail(
                  new FetchError({
                    reason: "Transport",
                    message: `Body read failed: ${e.message}`,
                  }),
                ),
        }),
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () =>
            new FetchError({
              reason: "Timeout",
              message: `No response within ${Duration.format(timeout)}`,
            }),
        }),
        Effect.retry({
          while: isRetryable,
          schedule: Schedule.exponential("1 second").pipe(
            Schedule.compose(Schedule.recurs(2)),
          ),
        }),
      ),
    });
  }),
);
