// Background updater — refreshes on a timer, independent of readers.

import { Cause, Clock, Console, Duration, Effect } from "effect";
import { isMarketOpen } from "./market-hours.ts";

export const OPEN_INTERVAL: Duration.DurationInput = "10 seconds";
export const CLOSED_INTERVAL: Duration.DurationInput = "60 seconds";
export const FAULT_BACKOFF: Duration.DurationInput = "5 seconds";

export function updateInterval(marketOpen: boolean): Duration.DurationInput {
  return marketOpen ? OPEN_INTERVAL : CLOSED_INTERVAL;
}

/**
 * Sleep for the current interval, refresh, repeat. A defect escaping one
 * iteration is logged and followed by a fixed backoff; the loop itself only
 * ends when its fiber is interrupted.
 */
export function runUpdater<A>(refresh: Effect.Effect<A>): Effect.Effect<never> {
  const iteration = Effect.gen(function* () {
    const interval = updateInterval(isMarketOpen(yield* Clock.currentTimeMillis));
    yield* Effect.sleep(interval);
    yield* Console.debug(`[updater] refreshing (interval ${Duration.format(interval)})`);
    yield* refresh;
  });

  return iteration.pipe(
    Effect.catchAllDefect((defect) =>
      Console.error(`[updater] iteration failed: ${Cause.pretty(Cause.die(defect))}`).pipe(
        Effect.zipRight(Effect.sleep(FAULT_BACKOFF)),
      ),
    ),
    Effect.forever,
  );
}
