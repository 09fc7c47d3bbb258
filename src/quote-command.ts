// One-shot quote for the terminal, outside the feed.

import { Clock, Effect, Schedule } from "effect";
import type { Snapshot } from "./domain.ts";
import { QuoteSource, type QuoteSourceError } from "./quote-source.ts";
import { liveSnapshot } from "./snapshot.ts";

/** Network failures are retried twice with exponential backoff. */
export const fetchSnapshot: Effect.Effect<Snapshot, QuoteSourceError, QuoteSource> =
  Effect.gen(function* () {
    const source = yield* QuoteSource;
    const fetched = yield* source.fetchQuote.pipe(
      Effect.retry({
        while: (e) => e._tag === "NetworkError",
        schedule: Schedule.exponential("1 second").pipe(
          Schedule.compose(Schedule.recurs(2)),
        ),
      }),
    );
    const now = yield* Clock.currentTimeMillis;
    return liveSnapshot(fetched, source.name, now);
  });
