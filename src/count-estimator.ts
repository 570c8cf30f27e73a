// Count estimator: reads the "#1 / N Total" indicator off the screener page.
// Advisory: the page lists only its first screen of results.

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { Effect } from "effect";
import { CountEstimationError } from "./screener-api.ts";

export const DEFAULT_COUNT_SELECTOR = "#screener-total";

const TOTAL_PATTERN = /\/\s*(\d[\d,]*)\s*Total/i;

/** Number after the slash in "#1 / 10,458 Total", if present. */
export function extractTotal(text: string): number | undefined {
  const match = TOTAL_PATTERN.exec(text);
  if (match === null) return undefined;
  const total = Number.parseInt(match[1].replaceAll(",", ""), 10);
  return Number.isFinite(total) ? total : undefined;
}

/** Accepts raw HTML or a document already loaded by `loadDocument`. */
export function estimateTotalCount(
  page: string | CheerioAPI,
  selector: string = DEFAULT_COUNT_SELECTOR,
): Effect.Effect<number, CountEstimationError> {
  return Effect.try({
    try: () => {
      const $ = typeof page === "string" ? cheerio.load(page) : page;
      return extractTotal($(selector).text()) ?? extractTotal($.root().text());
    },
    catch: (e) =>
      new CountEstimationError({ message: `Count lookup failed: ${String(e)}` }),
  }).pipe(
    Effect.flatMap((total) =>
      total === undefined
        ? Effect.fail(
            new CountEstimationError({ message: "No total indicator on page" }),
          )
        : Effect.succeed(total),
    ),
  );
}
