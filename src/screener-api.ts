// Screener monitor: collaborator services and domain errors.

import { Context, Data, Effect } from "effect";
import type { ChangeReport } from "./domain.ts";

// --- Errors ---

export type FetchFailureReason = "Transport" | "Status" | "Timeout";

export class FetchError extends Data.TaggedError("FetchError")<{
  readonly reason: FetchFailureReason;
  readonly message: string;
  readonly status?: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class EmptyResultError extends Data.TaggedError("EmptyResultError")<{
  readonly message: string;
}> {}

export class PersistenceError extends Data.TaggedError("PersistenceError")<{
  readonly message: string;
}> {}

/** Advisory only; callers downgrade it to an unknown total. */
export class CountEstimationError extends Data.TaggedError(
  "CountEstimationError",
)<{
  readonly message: string;
}> {}

export type CycleError =
  | FetchError
  | ParseError
  | EmptyResultError
  | PersistenceError;

// --- Services ---

export class ScreenerSource extends Context.Tag("ScreenerSource")<
  ScreenerSource,
  {
    /** Raw page text, or a transport failure. Timeouts and retries live here. */
    readonly fetchPage: Effect.Effect<string, FetchError>;
  }
>() {}

export class SnapshotStore extends Context.Tag("SnapshotStore")<
  SnapshotStore,
  {
    readonly load: Effect.Effect<ReadonlySet<string>, PersistenceError>;
    /** Replaces the whole snapshot; readers never see a partial set. */
    readonly replaceAll: (
      symbols: ReadonlySet<string>,
    ) => Effect.Effect<void, PersistenceError>;
  }
>() {}

export class Reporter extends Context.Tag("Reporter")<
  Reporter,
  {
    readonly report: (report: ChangeReport) => Effect.Effect<void>;
  }
>() {}
