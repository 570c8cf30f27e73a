// Record parser: screener HTML in, typed ticker records out.

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { Effect } from "effect";
import { NOT_AVAILABLE, type TickerRecord } from "./domain.ts";
import { ParseError } from "./screener-api.ts";

// --- Options ---

export interface ParserOptions {
  /** Rows with fewer cells are dropped. */
  readonly minColumns: number;
  readonly rowSelector: string;
}

export const defaultParserOptions: ParserOptions = {
  minColumns: 11,
  rowSelector: "table.screener_table tbody tr",
};

/** Cell positions in a listing row. Column 0 is the row number. */
const Column = {
  symbol: 1,
  companyName: 2,
  sector: 3,
  industry: 4,
  country: 5,
  marketCap: 6,
  peRatio: 7,
  price: 8,
  changePercent: 9,
  volume: 10,
} as const;

const PLACEHOLDER = "-";

// --- Row mapping ---

/** Map one row's cell texts to a record, or `undefined` if the row is unusable. */
export function toRecord(
  cells: ReadonlyArray<string>,
  minColumns: number,
): TickerRecord | undefined {
  if (cells.length < minColumns) return undefined;

  const cell = (index: number) => (cells[index] ?? "").trim();
  const symbol = cell(Column.symbol);
  if (symbol.length === 0) return undefined;

  const peRatio = cell(Column.peRatio);

  return {
    symbol,
    companyName: cell(Column.companyName),
    sector: cell(Column.sector),
    industry: cell(Column.industry),
    country: cell(Column.country),
    marketCap: cell(Column.marketCap),
    peRatio: peRatio === PLACEHOLDER ? NOT_AVAILABLE : peRatio,
    price: cell(Column.price),
    changePercent: cell(Column.changePercent),
    volume: cell(Column.volume),
  };
}

// --- Document parsing ---

/** Load a page once; the parser and the count estimator share the result. */
export function loadDocument(html: string): Effect.Effect<CheerioAPI, ParseError> {
  return Effect.try({
    try: () => cheerio.load(html),
    catch: (e) =>
      new ParseError({ message: `Unparseable document: ${String(e)}` }),
  });
}

/**
 * Parse the listing table. Fails with `ParseError` when the document or the
 * selector is unusable, or when no row matches at all. Short rows are skipped.
 *
 * Rows sharing a symbol collapse into one record: the last row wins, placed
 * where the symbol first appeared.
 */
export function parseRecords(
  html: string,
  options: ParserOptions = defaultParserOptions,
): Effect.Effect<ReadonlyArray<TickerRecord>, ParseError> {
  return loadDocument(html).pipe(
    Effect.flatMap(($) => extractRecords($, options)),
  );
}

export function extractRecords(
  $: CheerioAPI,
  options: ParserOptions = defaultParserOptions,
): Effect.Effect<ReadonlyArray<TickerRecord>, ParseError> {
  return Effect.gen(function* () {
    const rows = yield* Effect.try({
      try: () => $(options.rowSelector).toArray(),
      catch: (e) =>
        new ParseError({
          message: `Invalid row selector "${options.rowSelector}": ${String(e)}`,
        }),
    });

    if (rows.length === 0) {
      return yield* Effect.fail(
        new ParseError({
          message: `No rows match "${options.rowSelector}"`,
        }),
      );
    }

    const bySymbol = new Map<string, TickerRecord>();

    for (const row of rows) {
      const cells = $(row)
        .children("td")
        .toArray()
        .map((td, index) => {
          const cell = $(td);
          // The symbol usually sits inside a quote link.
          const link = cell.find("a").first();
          return index === Column.symbol && link.length > 0
            ? link.text()
            : cell.text();
        });

      const record = toRecord(cells, options.minColumns);
      if (record !== undefined) bySymbol.set(record.symbol, record);
    }

    return Array.from(bySymbol.values());
  });
}
