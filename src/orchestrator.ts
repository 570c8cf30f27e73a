// Poll orchestrator: Effect shell around the cycle phase machine.
//
// Wires the pure pieces (parser, count estimator, diff, cycle-state.ts)
// to the collaborator services, a Ref for the current phase and a
// single-permit semaphore so cycles never overlap.

import { Cause, Clock, Duration, Effect, Ref, Schedule } from "effect";
import type { ChangeReport } from "./domain.ts";
import {
  type CyclePhase,
  advance,
  fail,
  initialPhase,
} from "./cycle-state.ts";
import { buildReport, diff } from "./diff.ts";
import { estimateTotalCount } from "./count-estimator.ts";
import { type ParserOptions, extractRecords, loadDocument } from "./parser.ts";
import {
  type CycleError,
  EmptyResultError,
  type PersistenceError,
  Reporter,
  ScreenerSource,
  SnapshotStore,
} from "./screener-api.ts";

// --- Config ---

export interface OrchestratorConfig {
  readonly interval: Duration.DurationInput;
  readonly parser: ParserOptions;
  readonly countSelector: string;
}

// --- Outcome ---

export type Completed = {
  readonly _tag: "Completed";
  readonly report: ChangeReport;
};
export type Aborted = {
  readonly _tag: "Aborted";
  readonly phase: CyclePhase;
  readonly error: CycleError;
};
/** The report went out, but the snapshot was not replaced. */
export type CommitFailed = {
  readonly _tag: "CommitFailed";
  readonly report: ChangeReport;
  readonly error: PersistenceError;
};

/** A collaborator died with a defect instead of a typed failure. */
export type Crashed = {
  readonly _tag: "Crashed";
  readonly phase: CyclePhase;
  readonly defect: unknown;
};

export type CycleOutcome = Completed | Aborted | CommitFailed | Crashed;

export const Completed = (report: ChangeReport): CycleOutcome => ({
  _tag: "Completed",
  report,
});

export const Aborted = (phase: CyclePhase, error: CycleError): CycleOutcome => ({
  _tag: "Aborted",
  phase,
  error,
});

export const CommitFailed = (
  report: ChangeReport,
  error: PersistenceError,
): CycleOutcome => ({ _tag: "CommitFailed", report, error });

export const Crashed = (phase: CyclePhase, defect: unknown): CycleOutcome => ({
  _tag: "Crashed",
  phase,
  defect,
});

// --- Orchestrator ---

export interface Orchestrator {
  /** One fetch → parse → diff → report → commit pass. Never fails. */
  readonly runCycle: Effect.Effect<CycleOutcome>;

  /** Run a cycle now and then on every interval tick, forever. Ticks that
   *  elapse while a cycle is still running are coalesced. */
  readonly run: Effect.Effect<void>;

  /** Observe the current phase (useful for testing / diagnostics). */
  readonly phase: Effect.Effect<CyclePhase>;
}

export function makeOrchestrator(
  config: OrchestratorConfig,
): Effect.Effect<Orchestrator, never, ScreenerSource | SnapshotStore | Reporter> {
  return Effect.gen(function* () {
    const source = yield* ScreenerSource;
    const store = yield* SnapshotStore;
    const reporter = yield* Reporter;
    const phaseRef = yield* Ref.make<CyclePhase>(initialPhase);
    const mutex = yield* Effect.makeSemaphore(1);

    const step = Ref.update(phaseRef, advance);

    const cycle: Effect.Effect<CycleOutcome, CycleError> = Effect.gen(
      function* () {
        // Restart from the top even if the previous cycle was interrupted.
        yield* Ref.set(phaseRef, "Fetching");
        const html = yield* source.fetchPage;

        yield* step; // Parsing
        const $ = yield* loadDocument(html);
        const records = yield* extractRecords($, config.parser);
        if (records.length === 0) {
          return yield* Effect.fail(
            new EmptyResultError({
              message: `No rows with at least ${config.parser.minColumns} cells`,
            }),
          );
        }
        const estimatedSourceTotal = yield* estimateTotalCount(
          $,
          config.countSelector,
        ).pipe(
          Effect.catchTag("CountEstimationError", (e) =>
            Effect.logDebug(`Source total unknown: ${e.message}`).pipe(
              Effect.as(0),
            ),
          ),
        );

        yield* step; // Diffing
        const previous = yield* store.load;
        const current = new Set(records.map((r) => r.symbol));
        const report = buildReport({
          diff: diff(previous, current),
          records,
          timestamp: yield* Clock.currentTimeMillis,
          estimatedSourceTotal,
        });

        yield* step; // Reporting
        yield* Effect.logInfo(
          `+${report.added.length} -${report.dropped.length} (${report.totalObserved} observed)`,
        );
        yield* reporter.report(report).pipe(
          Effect.catchAllCause((cause) =>
            Effect.logWarning("Report delivery failed", cause),
          ),
        );
        if (estimatedSourceTotal > report.totalObserved) {
          yield* Effect.logWarning(
            `Observed ${report.totalObserved} of ${estimatedSourceTotal} listed tickers; only the first page is monitored`,
          );
        }

        // Unconditional, even for an empty diff.
        yield* step; // Committing
        return yield* store.replaceAll(current).pipe(
          Effect.matchEffect({
            onFailure: (error) =>
              Ref.update(phaseRef, fail).pipe(
                Effect.zipRight(
                  Effect.logError(`Snapshot commit failed: ${error.message}`),
                ),
                Effect.as(CommitFailed(report, error)),
              ),
            onSuccess: () => step.pipe(Effect.as(Completed(report))),
          }),
        );
      },
    );

    const runCycle = cycle.pipe(
      Effect.catchAll((error) =>
        Ref.modify(phaseRef, (p) => [p, fail(p)] as const).pipe(
          Effect.tap((phase) =>
            Effect.logWarning(
              `Cycle aborted while ${phase.toLowerCase()}: ${error._tag}: ${error.message}`,
            ),
          ),
          Effect.map((phase) => Aborted(phase, error)),
        ),
      ),
      // A defect must not end the schedule in `run`.
      Effect.catchAllDefect((defect) =>
        Ref.modify(phaseRef, (p) => [p, fail(p)] as const).pipe(
          Effect.tap((phase) =>
            Effect.logError(
              `Cycle crashed while ${phase.toLowerCase()}`,
              Cause.die(defect),
            ),
          ),
          Effect.map((phase) => Crashed(phase, defect)),
        ),
      ),
      Effect.withLogSpan("cycle"),
      mutex.withPermits(1),
    );

    const run = runCycle.pipe(
      Effect.repeat(Schedule.fixed(config.interval)),
      Effect.asVoid,
    );

    return {
      runCycle,
      run,
      phase: Ref.get(phaseRef),
    } satisfies Orchestrator;
  });
}
