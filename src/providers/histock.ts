// HiStock — implementation of QuoteSource, scraping the FTSE Taiwan page.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import * as cheerio from "cheerio";
import { Clock, Config, Effect, Layer } from "effect";
import type { IndexQuote } from "../domain.ts";
import { extractQuote } from "../extract.ts";
import {
  type ExtractError,
  HttpError,
  NetworkError,
  QuoteSource,
} from "../quote-source.ts";

export const HISTOCK_SOURCE = "histock";

/** Upper bound on one page fetch, after which it counts as a network failure. */
const FETCH_TIMEOUT = "10 seconds";

// The page serves different markup to clients that don't look like a browser.
const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  "Cache-Control": "no-cache, no-store, must-revalidate",
  Pragma: "no-cache",
  Expires: "0",
};

// --- Decode page into IndexQuote ---

export function decodeHiStockPage(
  html: string,
): Effect.Effect<IndexQuote, ExtractError> {
  return Effect.suspend(() => extractQuote(cheerio.load(html)));
}

// --- HiStock layer ---

export const HiStockLive = Layer.effect(
  QuoteSource,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(HttpClientRequest.setHeaders(BROWSER_HEADERS)),
    );
    const pageUrl = yield* Config.string("INDEX_PAGE_URL").pipe(
      Config.withDefault("https://histock.tw/index-tw/TWN"),
    );

    return QuoteSource.of({
      name: HISTOCK_SOURCE,
      fetchQuote: Effect.gen(function* () {
        const nocache = Math.floor((yield* Clock.currentTimeMillis) / 1000);
        const html = yield* client
          .get(pageUrl, { urlParams: { _nocache: String(nocache) } })
          .pipe(
            Effect.flatMap((response) => response.text),
            // Releases the request once the body is read.
            Effect.scoped,
            Effect.timeoutFail({
              duration: FETCH_TIMEOUT,
              onTimeout: () => new NetworkError({ message: "Request timed out" }),
            }),
          );
        return yield* decodeHiStockPage(html);
      }).pipe(
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new NetworkError({ message: e.message })),
          ResponseError: (e) =>
            e.reason === "StatusCode"
              ? Effect.fail(new HttpError({ status: e.response.status }))
              : Effect.fail(
                  new NetworkError({
                    message: `Could not read response body: ${e.message}`,
                  }),
                ),
        }),
      ),
    });
  }),
);
