// Tests for refresh orchestration and the read path:
// - error normalization into fallback messages
// - blocking first read, non-blocking stale reads
// - concurrent readers during an in-flight refresh

import { Effect, Fiber, Layer, Ref, TestClock, TestContext } from "effect";
import { expect, test } from "vitest";
import type { IndexQuote, Snapshot } from "./domain.ts";
import {
  describeFailure,
  IndexFeed,
  IndexFeedLive,
  makeIndexFeed,
} from "./index-feed.ts";
import { decodeHiStockPage, HiStockLive } from "./providers/histock.ts";
import {
  fakeHttpClient,
  fallingPage,
  pageOk,
  type SeenRequest,
} from "./providers/histock-fake.ts";
import { QuoteSourceTestLive } from "./providers/quote-source-mock.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  QuoteSource,
  type QuoteSourceError,
  UnexpectedError,
  ValueError,
} from "./quote-source.ts";
import type { FeedState } from "./feed-state.ts";

// --- Helpers ---

// Tuesday 20:00 Taipei: outside the session, refresh threshold 300s.
const CLOSED_T = Date.parse("2024-06-04T20:00:00+08:00");

const first: IndexQuote = { price: 1712.37, change: 12.5, changePercent: 0.74 };
const second: IndexQuote = { price: 1720.9, change: 21.03, changePercent: 1.24 };

type Fetch = Effect.Effect<IndexQuote, QuoteSourceError>;

const makeSource = Effect.gen(function* () {
  const behaviour = yield* Ref.make<Fetch>(Effect.succeed(first));
  const calls = yield* Ref.make(0);
  const service = QuoteSource.of({
    name: "fake",
    fetchQuote: Ref.update(calls, (n) => n + 1).pipe(
      Effect.zipRight(Effect.flatten(Ref.get(behaviour))),
    ),
  });
  return { service, behaviour, calls };
});

function run<A, E>(effect: Effect.Effect<A, E, never>): Promise<A> {
  return Effect.runPromise(
    effect.pipe(Effect.provide(TestContext.TestContext)),
  );
}

/** Feed over a fake source, starting at CLOSED_T with nothing fetched yet. */
function withFeed<A, E>(
  body: (
    feed: Effect.Effect.Success<typeof makeIndexFeed>,
    source: Effect.Effect.Success<typeof makeSource>,
  ) => Effect.Effect<A, E>,
): Promise<A> {
  return run(
    Effect.scoped(
      Effect.gen(function* () {
        yield* TestClock.setTime(CLOSED_T);
        const source = yield* makeSource;
        const feed = yield* makeIndexFeed.pipe(
          Effect.provideService(QuoteSource, source.service),
        );
        return yield* body(feed, source);
      }),
    ),
  );
}

function awaitState(
  read: Effect.Effect<FeedState>,
  until: (state: FeedState) => boolean,
): Effect.Effect<FeedState> {
  return Effect.yieldNow().pipe(
    Effect.zipRight(read),
    Effect.repeat({ until }),
  );
}

function assertConsistent(s: Snapshot) {
  expect([0, 0.25, 0.5, 0.75]).toContain(s.price % 1);
  expect(s.derivedPrice).toBe(Math.round(s.price * 12.28065515714918));
  expect(s.derivedOffset).toBe(s.derivedPrice - 27556);
}

// --- describeFailure ---

test("describeFailure: each error kind gets its own prefix", () => {
  expect(describeFailure(new NetworkError({ message: "Request timed out" })))
    .toBe("Network error: Request timed out");
  expect(describeFailure(new HttpError({ status: 503 })))
    .toBe("Network error: HTTP 503");
  expect(describeFailure(new ParseError({ message: "Could not find price element" })))
    .toBe("Could not find price element");
  expect(describeFailure(new ValueError({ message: 'Could not parse price from "N/A"' })))
    .toBe('Data format error: Could not parse price from "N/A"');
  expect(describeFailure(new UnexpectedError({ message: "boom" })))
    .toBe("System error: boom");
});

// --- refresh ---

test("refresh: success publishes a live snapshot", async () => {
  const outcome = await withFeed((feed) => feed.refresh);

  expect(outcome.resolution).toBe("live");
  expect(outcome.snapshot.price).toBe(1712.25);
  expect(outcome.snapshot.origin).toBe("fake");
  expect(outcome.snapshot.error).toBeUndefined();
});

test("refresh: first failure publishes the default with the message", async () => {
  const outcome = await withFeed((feed, source) =>
    Ref.set(source.behaviour, Effect.fail(new NetworkError({ message: "down" }))).pipe(
      Effect.zipRight(feed.refresh),
    ),
  );

  expect(outcome.resolution).toBe("default");
  expect(outcome.snapshot.source).toBe("default-fallback");
  expect(outcome.snapshot.error).toBe("Network error: down");
});

test("refresh: a defect in the source becomes a system error", async () => {
  const outcome = await withFeed((feed, source) =>
    Ref.set(source.behaviour, Effect.die(new Error("boom"))).pipe(
      Effect.zipRight(feed.refresh),
    ),
  );

  expect(outcome.resolution).toBe("default");
  expect(outcome.snapshot.error).toBe("System error: boom");
});

test("refresh: price-only parse failure falls back without mixing fields", async () => {
  const badPrice = `<ul class="priceinfo">
    <li><span id="Price1_lbTPrice"><span class="clr-rd">N/A</span></span></li>
    <li><span id="Price1_lbTChange"><span class="clr-rd">▲99.00</span></span></li>
    <li><span id="Price1_lbTPercent"><span class="clr-rd">+5.00%</span></span></li>
  </ul>`;

  const { before, outcome } = await withFeed((feed, source) =>
    Effect.gen(function* () {
      const before = (yield* feed.refresh).snapshot;
      yield* TestClock.adjust("30 seconds");
      yield* Ref.set(source.behaviour, decodeHiStockPage(badPrice));
      return { before, outcome: yield* feed.refresh };
    }),
  );

  expect(outcome.resolution).toBe("reused");
  expect(outcome.snapshot).toEqual({
    ...before,
    error: 'Data format error: Could not parse price from "N/A"',
  });
});

// --- current ---

test("current: first read blocks on a fetch", async () => {
  const { snapshot, calls } = await withFeed((feed, source) =>
    Effect.gen(function* () {
      const snapshot = yield* feed.current;
      return { snapshot, calls: yield* Ref.get(source.calls) };
    }),
  );

  expect(calls).toBe(1);
  expect(snapshot.source).toBe("live");
  expect(snapshot.capturedAtEpoch).toBe(CLOSED_T);
});

test("current: fresh snapshot is served without fetching", async () => {
  const calls = await withFeed((feed, source) =>
    Effect.gen(function* () {
      yield* feed.current;
      yield* TestClock.adjust("299 seconds");
      yield* feed.current;
      yield* Effect.yieldNow();
      return yield* Ref.get(source.calls);
    }),
  );

  expect(calls).toBe(1);
});

test("current: stale read returns immediately and refreshes in the background", async () => {
  const { served, state } = await withFeed((feed, source) =>
    Effect.gen(function* () {
      yield* feed.current;
      yield* Ref.set(source.behaviour, Effect.succeed(second));
      yield* TestClock.adjust("301 seconds");

      const served = yield* feed.current;
      const state = yield* awaitState(
        feed.state,
        (s) => s.lastAttemptAt === CLOSED_T + 301_000,
      );
      return { served, state };
    }),
  );

  expect(served.price).toBe(1712.25);
  expect(served.capturedAtEpoch).toBe(CLOSED_T);
  expect(state.current?.price).toBe(1721.0);
  expect(state.current?.capturedAtEpoch).toBe(CLOSED_T + 301_000);
});

test("current: stale read does not wait for a slow fetch", async () => {
  const served = await withFeed((feed, source) =>
    Effect.gen(function* () {
      yield* feed.current;
      yield* Ref.set(
        source.behaviour,
        Effect.sleep("5 seconds").pipe(Effect.as(second)),
      );
      yield* TestClock.adjust("301 seconds");
      return yield* feed.current;
    }),
  );

  expect(served.price).toBe(1712.25);
});

test("current: concurrent readers during a refresh see whole snapshots", async () => {
  const observed = await withFeed((feed, source) =>
    Effect.gen(function* () {
      yield* feed.current;
      yield* Ref.set(
        source.behaviour,
        Effect.sleep("1 second").pipe(Effect.as(second)),
      );
      const inFlight = yield* Effect.fork(feed.refresh);
      const during = yield* Effect.all(
        Array.from({ length: 50 }, () => feed.current),
        { concurrency: "unbounded" },
      );
      yield* TestClock.adjust("1 second");
      yield* Fiber.join(inFlight);
      const after = yield* feed.current;
      return [...during, after];
    }),
  );

  expect(observed).toHaveLength(51);
  observed.forEach(assertConsistent);
  expect(observed[0]?.price).toBe(1712.25);
  expect(observed[50]?.price).toBe(1721.0);
});

// --- IndexFeedLive ---

test("IndexFeedLive: fetches on start and keeps refreshing in the background", async () => {
  const { initial, calls } = await run(
    Effect.gen(function* () {
      const source = yield* makeSource;
      return yield* Effect.gen(function* () {
        const feed = yield* IndexFeed;
        const initial = yield* feed.state;
        yield* Effect.yieldNow();
        // Clock starts at the epoch: outside the session, so a 60s interval.
        yield* TestClock.adjust("60 seconds");
        yield* awaitState(feed.state, (s) => s.lastAttemptAt === 60_000);
        return { initial, calls: yield* Ref.get(source.calls) };
      }).pipe(
        Effect.provide(IndexFeedLive),
        Effect.provideService(QuoteSource, source.service),
      );
    }),
  );

  expect(initial.current?.source).toBe("live");
  expect(initial.lastAttemptAt).toBe(0);
  expect(calls).toBe(2);
});

test("IndexFeedLive: serves the canned quote source", async () => {
  const snapshot = await run(
    IndexFeed.pipe(
      Effect.flatMap((feed) => feed.current),
      Effect.provide(IndexFeedLive),
      Effect.provide(QuoteSourceTestLive),
    ),
  );

  expect(snapshot.price).toBe(1712.25);
  expect(snapshot.origin).toBe("test");
  expect(snapshot.source).toBe("live");
});

test("IndexFeedLive: refreshes through HiStockLive over an in-process client", async () => {
  const seen: SeenRequest[] = [];
  const outcome = await run(
    IndexFeed.pipe(
      Effect.flatMap((feed) => feed.refresh),
      Effect.provide(IndexFeedLive),
      Effect.provide(HiStockLive.pipe(Layer.provide(fakeHttpClient(seen, pageOk(fallingPage))))),
    ),
  );

  expect(outcome.resolution).toBe("live");
  expect(outcome.snapshot.origin).toBe("histock");
  expect(outcome.snapshot.price).toBe(1688.25);
  // Initial fetch on start plus the explicit refresh.
  expect(seen).toHaveLength(2);
});
