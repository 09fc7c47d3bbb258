// QuoteSourceTest — canned implementation of QuoteSource for development.

import { Effect, Layer } from "effect";
import type { IndexQuote } from "../domain.ts";
import { QuoteSource } from "../quote-source.ts";

export const TEST_SOURCE = "test";

// --- Sample data ---

export const sampleQuote: IndexQuote = {
  price: 1712.37,
  change: 12.5,
  changePercent: 0.74,
};

// --- Mock layer ---

export const QuoteSourceTestLive = Layer.succeed(
  QuoteSource,
  QuoteSource.of({
    name: TEST_SOURCE,
    fetchQuote: Effect.succeed(sampleQuote),
  }),
);
