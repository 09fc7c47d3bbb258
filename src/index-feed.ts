// Index feed — refresh orchestration and the read path.

import { Clock, Console, Context, Effect, Layer, type Scope } from "effect";
import type { Snapshot } from "./domain.ts";
import { type FeedState, isDue } from "./feed-state.ts";
import {
  QuoteSource,
  type RefreshError,
  UnexpectedError,
} from "./quote-source.ts";
import { makeSnapshotStore } from "./snapshot-store.ts";
import { runUpdater } from "./updater.ts";

// --- Types ---

export type RefreshResolution = "live" | "reused" | "default";

export interface RefreshOutcome {
  readonly resolution: RefreshResolution;
  readonly snapshot: Snapshot;
}

// --- Service ---

export class IndexFeed extends Context.Tag("IndexFeed")<
  IndexFeed,
  {
    /** One fetch attempt; failures are absorbed by the fallback policy. */
    readonly refresh: Effect.Effect<RefreshOutcome>;

    /** The current snapshot, triggering a background refresh when due. */
    readonly current: Effect.Effect<Snapshot>;

    /** Observe the store (useful for testing / diagnostics). */
    readonly state: Effect.Effect<FeedState>;
  }
>() {}

// --- Error normalization ---

export function describeFailure(error: RefreshError): string {
  switch (error._tag) {
    case "NetworkError":
      return `Network error: ${error.message}`;
    case "HttpError":
      return `Network error: HTTP ${error.status}`;
    case "ParseError":
      return error.message;
    case "ValueError":
      return `Data format error: ${error.message}`;
    case "UnexpectedError":
      return `System error: ${error.message}`;
  }
}

function describeDefect(defect: unknown): string {
  return defect instanceof Error ? defect.message : String(defect);
}

// --- Feed ---

/**
 * Build a feed over the ambient QuoteSource. Reader-triggered refreshes are
 * forked into the surrounding scope: fire-and-forget, possibly superseded by
 * a later write, and interrupted when the scope closes.
 */
export const makeIndexFeed: Effect.Effect<
  Context.Tag.Service<IndexFeed>,
  never,
  QuoteSource | Scope.Scope
> = Effect.gen(function* () {
  const source = yield* QuoteSource;
  const store = yield* makeSnapshotStore;
  const scope = yield* Effect.scope;

  const refresh: Effect.Effect<RefreshOutcome> = source.fetchQuote.pipe(
    Effect.flatMap((quote) => store.write(quote, source.name)),
    Effect.catchAllDefect((defect) =>
      Effect.fail(new UnexpectedError({ message: describeDefect(defect) })),
    ),
    Effect.map((snapshot): RefreshOutcome => ({ resolution: "live", snapshot })),
    Effect.catchAll((error) => {
      const message = describeFailure(error);
      return Console.error(`[feed] refresh failed (${error._tag}): ${message}`).pipe(
        Effect.zipRight(store.recordFailure(message)),
        Effect.map(([resolution, snapshot]): RefreshOutcome => ({ resolution, snapshot })),
      );
    }),
  );

  const current: Effect.Effect<Snapshot> = Effect.gen(function* () {
    const state = yield* store.read;

    if (state.current === undefined) {
      yield* Console.info("[feed] no snapshot yet, fetching");
      return (yield* refresh).snapshot;
    }

    const now = yield* Clock.currentTimeMillis;
    if (isDue(state, now)) {
      yield* Console.debug(
        `[feed] last attempt ${Math.round((now - state.lastAttemptAt) / 1000)}s ago, refreshing in background`,
      );
      yield* Effect.forkIn(refresh, scope);
    }
    return state.current;
  });

  return { refresh, current, state: store.read };
});

// --- Layer ---

/** Feed with a blocking first fetch and the background updater running. */
export const IndexFeedLive = Layer.scoped(
  IndexFeed,
  Effect.gen(function* () {
    const feed = yield* makeIndexFeed;

    yield* Console.info("[feed] starting, initial fetch");
    yield* feed.refresh;

    yield* Effect.forkScoped(runUpdater(feed.refresh));
    yield* Console.info("[feed] background updater started");

    return IndexFeed.of(feed);
  }),
);
