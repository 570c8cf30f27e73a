// Diff engine: pure set difference and report assembly. No I/O.

import type { ChangeReport, TickerRecord } from "./domain.ts";

export interface SymbolDiff {
  readonly added: ReadonlySet<string>;
  readonly dropped: ReadonlySet<string>;
}

/** `added = current \ previous`, `dropped = previous \ current`. */
export function diff(
  previous: ReadonlySet<string>,
  current: ReadonlySet<string>,
): SymbolDiff {
  const added = new Set<string>();
  const dropped = new Set<string>();

  for (const symbol of current) {
    if (!previous.has(symbol)) added.add(symbol);
  }
  for (const symbol of previous) {
    if (!current.has(symbol)) dropped.add(symbol);
  }

  return { added, dropped };
}

/** Code-unit order, so output does not depend on the host locale. */
export function sortSymbols(symbols: Iterable<string>): ReadonlyArray<string> {
  return Array.from(symbols).sort();
}

export function buildReport(params: {
  readonly diff: SymbolDiff;
  readonly records: ReadonlyArray<TickerRecord>;
  readonly timestamp: number;
  readonly estimatedSourceTotal: number;
}): ChangeReport {
  const added = sortSymbols(params.diff.added);
  const bySymbol = new Map(params.records.map((r) => [r.symbol, r] as const));

  return {
    added,
    dropped: sortSymbols(params.diff.dropped),
    addedDetails: added.flatMap((symbol) => {
      const record = bySymbol.get(symbol);
      return record === undefined ? [] : [record];
    }),
    timestamp: params.timestamp,
    totalObserved: bySymbol.size,
    estimatedSourceTotal: params.estimatedSourceTotal,
  };
}
