// Snapshot store — Effect shell.
//
// Wires the pure transitions (feed-state.ts) to a SynchronizedRef and the
// Clock. Each write is one critical section: read the clock, replace the
// state. Fetching and parsing never happen inside it.

import { Clock, Console, Effect, SynchronizedRef } from "effect";
import type { IndexQuote, Snapshot } from "./domain.ts";
import {
  type FailureResolution,
  type FeedState,
  initialState,
  onFailure,
  onSuccess,
} from "./feed-state.ts";

export type { FeedState } from "./feed-state.ts";

export interface SnapshotStore {
  /** The current state, as one consistent value. */
  readonly read: Effect.Effect<FeedState>;

  /** Publish a freshly fetched quote as the current snapshot. */
  readonly write: (quote: IndexQuote, origin: string) => Effect.Effect<Snapshot>;

  /** Apply the fallback policy for a failed refresh. */
  readonly recordFailure: (
    error: string,
  ) => Effect.Effect<readonly [FailureResolution, Snapshot]>;
}

export const makeSnapshotStore: Effect.Effect<SnapshotStore> = Effect.gen(function* () {
  const ref = yield* SynchronizedRef.make<FeedState>(initialState);

  const write = (quote: IndexQuote, origin: string): Effect.Effect<Snapshot> =>
    SynchronizedRef.modifyEffect(ref, (state) =>
      Clock.currentTimeMillis.pipe(
        Effect.map((now) => {
          const next = onSuccess(state, quote, origin, now);
          return [next.current, next] as const;
        }),
      ),
    ).pipe(
      Effect.tap((s) =>
        Console.info(
          `[store] updated | price ${s.price.toFixed(2)} | change ${signed(s.change)} (${signed(s.changePercent)}%) | futures ${s.derivedPrice} (${signed(s.derivedOffset, 0)}) | ${s.origin}`,
        ),
      ),
    );

  const recordFailure = (
    error: string,
  ): Effect.Effect<readonly [FailureResolution, Snapshot]> =>
    SynchronizedRef.modifyEffect(ref, (state) =>
      Clock.currentTimeMillis.pipe(
        Effect.map((now) => {
          const [resolution, next] = onFailure(state, error, now);
          return [[resolution, next.current] as const, next] as const;
        }),
      ),
    ).pipe(
      Effect.tap(([resolution, s]) =>
        resolution === "reused"
          ? Console.info("[store] keeping last valid snapshot")
          : Console.info(`[store] using default snapshot (price ${s.price})`),
      ),
    );

  return {
    read: SynchronizedRef.get(ref),
    write,
    recordFailure,
  } satisfies SnapshotStore;
});

function signed(n: number, digits = 2): string {
  return `${n >= 0 ? "+" : ""}${n.toFixed(digits)}`;
}
