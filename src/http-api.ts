// HTTP API — thin handlers over IndexFeed.

import {
  HttpMiddleware,
  HttpRouter,
  HttpServerRequest,
  HttpServerResponse,
} from "@effect/platform";
import { Cause, Clock, Console, Effect } from "effect";
import { refreshThresholdMs } from "./feed-state.ts";
import { toWireResponse, type WireResponse } from "./format.ts";
import { IndexFeed } from "./index-feed.ts";
import { formatServerTime, isMarketOpen } from "./market-hours.ts";

/**
 * Current snapshot for a request. Refreshes in the foreground when asked to,
 * or when the snapshot's data is already older than the refresh threshold.
 */
export function readQuote(
  forceRefresh: boolean,
): Effect.Effect<WireResponse, never, IndexFeed> {
  return Effect.gen(function* () {
    const feed = yield* IndexFeed;
    let snapshot = yield* feed.current;

    const now = yield* Clock.currentTimeMillis;
    const threshold = refreshThresholdMs(isMarketOpen(now));
    if (forceRefresh || now - snapshot.capturedAtEpoch > threshold) {
      yield* Console.info(`[api] refreshing before response (forced: ${forceRefresh})`);
      yield* feed.refresh;
      snapshot = yield* feed.current;
    }

    return toWireResponse(snapshot, yield* Clock.currentTimeMillis);
  });
}

function describeCause(cause: Cause.Cause<unknown>): string {
  const squashed = Cause.squash(cause);
  return squashed instanceof Error ? squashed.message : String(squashed);
}

const quoteHandler = Effect.gen(function* () {
  const request = yield* HttpServerRequest.HttpServerRequest;
  const refresh = new URL(request.url, "http://localhost").searchParams.get("refresh");
  const body = yield* readQuote(refresh?.toLowerCase() === "true");
  return yield* HttpServerResponse.json(body);
}).pipe(
  Effect.catchAllCause((cause) =>
    Effect.gen(function* () {
      yield* Console.error(`[api] request failed: ${Cause.pretty(cause)}`);
      const now = yield* Clock.currentTimeMillis;
      return HttpServerResponse.unsafeJson(
        {
          error: describeCause(cause),
          timestamp: now / 1000,
          server_time: formatServerTime(now),
        },
        { status: 500 },
      );
    }),
  ),
);

const healthHandler = Clock.currentTimeMillis.pipe(
  Effect.flatMap((now) =>
    HttpServerResponse.json({ status: "healthy", timestamp: now / 1000 }),
  ),
);

export const ApiRouter = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/",
    HttpServerResponse.json({ status: "ok", message: "FTSE Taiwan feed is running" }),
  ),
  HttpRouter.get("/health", healthHandler),
  HttpRouter.get("/api/ftse", quoteHandler),
);

export const ApiApp = ApiRouter.pipe(HttpMiddleware.cors());
