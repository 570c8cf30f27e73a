// Pure domain types: no framework dependency, no I/O.

/** Marker stored in place of a placeholder P/E cell. */
export const NOT_AVAILABLE = "N/A";

/** One row of the screener listing. Values are kept as the page shows them. */
export interface TickerRecord {
  readonly symbol: string;
  readonly companyName: string;
  readonly sector: string;
  readonly industry: string;
  readonly country: string;
  readonly marketCap: string;
  readonly peRatio: string;
  readonly price: string;
  readonly changePercent: string;
  readonly volume: string;
}

export interface ChangeReport {
  readonly added: ReadonlyArray<string>; // lexicographic
  readonly dropped: ReadonlyArray<string>; // lexicographic
  readonly addedDetails: ReadonlyArray<TickerRecord>;
  readonly timestamp: number; // epoch ms
  readonly totalObserved: number;
  readonly estimatedSourceTotal: number; // 0 when unknown
}
